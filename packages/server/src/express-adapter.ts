import { createServer, type Server } from "node:http";
import express, { type Express, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import multer from "multer";
import {
  type ApplicationContext,
  type CompiledRoute,
  type Container,
  ValidationException,
  createApplicationContext,
  findEnhancer,
  joinPaths,
} from "@vitrine/core";
import {
  LOGGER,
  StructuredLogger,
  consoleSink,
  createCorrelationId,
  runWithCorrelation,
} from "@vitrine/observability";
import { CACHE_MANAGER, type CacheManager, type QueryValue, responseCacheKey } from "@vitrine/cache";
import { HttpError } from "./errors";
import type { HttpAdapterOptions, HttpContext, UploadedFile } from "./types";

interface AdapterConfig extends HttpAdapterOptions {
  globalPrefix: string;
  jsonLimit: string | number;
  maxUploadBytes: number;
  middlewares: RequestHandler[];
}

interface CachedResponse {
  status: number;
  body: unknown;
}

const correlationIds = new WeakMap<Request, string>();

const requestOrigin = (req: Request): string | undefined => {
  const host = req.get("host");
  return host ? `${req.protocol}://${host}` : undefined;
};

export class ExpressHttpAdapter {
  private readonly context: ApplicationContext;
  private readonly app: Express;
  private readonly options: AdapterConfig;
  private readonly logger: StructuredLogger;
  private server?: Server;

  constructor(options: HttpAdapterOptions) {
    this.context = createApplicationContext(options.module, { overrides: options.overrides });
    this.app = express();
    this.options = {
      ...options,
      globalPrefix: options.globalPrefix ?? "",
      jsonLimit: options.jsonLimit ?? "1mb",
      maxUploadBytes: options.maxUploadBytes ?? 5 * 1024 * 1024,
      middlewares: options.middlewares ?? [],
    };
    const { container } = this.context;
    this.logger = (
      container.has(LOGGER)
        ? container.resolve(LOGGER)
        : new StructuredLogger({ serviceName: "vitrine" }, consoleSink)
    ).child({ component: "http" });
    this.configure();
  }

  getApp(): Express {
    return this.app;
  }

  getContainer(): Container {
    return this.context.container;
  }

  getRoutes(): CompiledRoute[] {
    return this.context.routes;
  }

  getMappedRoutes(): Array<{ method: string; path: string }> {
    return this.context.routes.map((route) => ({
      method: route.method,
      path: this.composePath(route),
    }));
  }

  /** Starts listening; port 0 picks a free port. */
  async listen(port: number, host?: string): Promise<Server> {
    const server = createServer(this.app);
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;
    const address = server.address();
    this.logger.info("Application started", {
      port: address && typeof address === "object" ? address.port : port,
      routes: this.getMappedRoutes().map(({ method, path }) => `${method} ${path}`),
    });
    return server;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
  }

  private configure(): void {
    this.app.disable("x-powered-by");
    this.app.use((req, res, next) => this.trackRequest(req, res, next));
    this.app.use(express.json({ limit: this.options.jsonLimit }));
    this.app.use(express.urlencoded({ extended: false, limit: this.options.jsonLimit }));
    (this.options.staticAssets ?? []).forEach(({ prefix, directory }) => {
      this.app.use(joinPaths(prefix), express.static(directory, { fallthrough: true, index: false }));
    });
    this.options.middlewares.forEach((middleware) => this.app.use(middleware));
    this.registerRoutes();
    this.app.use((_req, res) => {
      res.status(404).json({ message: "Not Found" });
    });
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.handleError(error, req, res);
    });
  }

  private trackRequest(req: Request, res: Response, next: NextFunction): void {
    const correlationId = req.get("x-request-id") ?? createCorrelationId();
    correlationIds.set(req, correlationId);
    res.setHeader("x-request-id", correlationId);
    const startedAt = Date.now();
    res.on("finish", () => {
      runWithCorrelation(correlationId, () =>
        this.logger.info("Request completed", {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        }),
      );
    });
    runWithCorrelation(correlationId, next);
  }

  private registerRoutes(): void {
    this.context.routes.forEach((route) => {
      const handler: RequestHandler = (req, res, next) => {
        const correlationId = correlationIds.get(req) ?? createCorrelationId();
        runWithCorrelation(correlationId, () => this.handleRequest(route, req, res)).catch(next);
      };
      const path = this.composePath(route);
      const chain = [...this.uploadMiddleware(route), handler];
      if (route.method === "GET") {
        this.app.get(path, chain);
      } else {
        this.app.post(path, chain);
      }
    });
  }

  private uploadMiddleware(route: CompiledRoute): RequestHandler[] {
    const upload = findEnhancer(route.enhancers, "upload");
    if (!upload) {
      return [];
    }
    const parser = multer({
      storage: multer.memoryStorage(),
      limits: { fileSize: this.options.maxUploadBytes, files: upload.maxCount },
    });
    return [parser.array(upload.field, upload.maxCount)];
  }

  private composePath(route: CompiledRoute): string {
    return joinPaths(this.options.globalPrefix, route.path);
  }

  private async handleRequest(route: CompiledRoute, req: Request, res: Response): Promise<void> {
    const { container } = this.context.beginRequest();

    const responseCache = findEnhancer(route.enhancers, "response-cache");
    const cache = responseCache && container.has(CACHE_MANAGER) ? container.resolve(CACHE_MANAGER) : undefined;
    if (!responseCache || !cache) {
      const result = await this.invokeController(route, container, req, res);
      this.send(res, route.status, result);
      return;
    }

    const key = responseCacheKey(req.method, req.path, normalizeQuery(req.query), requestOrigin(req));
    const hit = await cache.get<CachedResponse>(key);
    if (hit) {
      res.setHeader("X-Cache", "HIT");
      res.status(hit.status).json(hit.body);
      return;
    }
    res.setHeader("X-Cache", "MISS");
    const result = await this.invokeController(route, container, req, res);
    const ttlMs =
      responseCache.ttlToken && container.has(responseCache.ttlToken)
        ? container.resolve(responseCache.ttlToken)
        : responseCache.ttlMs;
    await this.storeResponse(cache, key, route.status, result, ttlMs);
    this.send(res, route.status, result);
  }

  private async storeResponse(
    cache: CacheManager,
    key: string,
    status: number,
    body: unknown,
    ttlMs: number,
  ): Promise<void> {
    if (status !== 200 || body === undefined) {
      return;
    }
    await cache.set<CachedResponse>(key, { status, body }, { ttlMs });
  }

  private send(res: Response, status: number, result: unknown): void {
    if (res.headersSent) {
      return;
    }
    if (result === undefined) {
      res.status(204).end();
      return;
    }
    res.status(status).json(result);
  }

  private async invokeController(
    route: CompiledRoute,
    container: Container,
    req: Request,
    res: Response,
  ): Promise<unknown> {
    const controller = container.resolve(route.controller);
    const handler: unknown =
      typeof controller === "object" && controller !== null ? Reflect.get(controller, route.handlerKey) : undefined;
    if (typeof handler !== "function") {
      throw new Error(`Handler ${String(route.handlerKey)} on ${route.controller.name} is not callable`);
    }
    const httpContext: HttpContext = {
      request: req,
      response: res,
      container,
      params: req.params,
      query: req.query,
      body: req.body,
      files: collectFiles(req),
      origin: requestOrigin(req),
    };
    const payload = route.method === "GET" ? req.query : (req.body ?? {});
    return await handler.call(controller, payload, httpContext);
  }

  private handleError(error: unknown, req: Request, res: Response): void {
    if (res.headersSent) {
      return;
    }
    if (error instanceof ValidationException) {
      res.status(400).json(error.fields);
      return;
    }
    if (error instanceof HttpError) {
      res.status(error.status).json({ message: error.message, details: error.details });
      return;
    }
    if (error instanceof multer.MulterError) {
      res.status(400).json({ [error.field ?? "non_field_errors"]: [error.message] });
      return;
    }
    if (isBodyParseError(error)) {
      res.status(400).json({ message: "Malformed request body" });
      return;
    }
    runWithCorrelation(correlationIds.get(req) ?? createCorrelationId(), () =>
      this.logger.error("Unhandled request error", { method: req.method, path: req.originalUrl, error }),
    );
    res.status(500).json({ message: "Internal server error" });
  }
}

const collectFiles = (req: Request): UploadedFile[] => {
  const files = req.files;
  if (!files) {
    return [];
  }
  const list = Array.isArray(files) ? files : Object.values(files).flat();
  return list.map((file) => ({
    fieldName: file.fieldname,
    originalName: file.originalname,
    mimeType: file.mimetype,
    size: file.size,
    buffer: file.buffer,
  }));
};

const normalizeQuery = (query: Request["query"]): Record<string, QueryValue> =>
  Object.fromEntries(
    Object.entries(query).map(([name, value]): [string, QueryValue] => {
      if (typeof value === "string") return [name, value];
      if (Array.isArray(value)) {
        const items: unknown[] = value;
        return [name, items.filter((item): item is string => typeof item === "string")];
      }
      return [name, undefined];
    }),
  );

const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && "status" in error && error.status === 400;
