import type { Constructor, Container, ProviderLike } from "@vitrine/core";
import type { Request, RequestHandler, Response } from "express";

/** A multipart file held in memory for the duration of the request. */
export interface UploadedFile {
  fieldName: string;
  originalName: string;
  mimeType: string;
  size: number;
  buffer: Buffer;
}

export interface HttpContext {
  readonly request: Request;
  readonly response: Response;
  readonly container: Container;
  readonly params: Record<string, string>;
  readonly query: Record<string, unknown>;
  readonly body?: unknown;
  readonly files: UploadedFile[];
  /** `<protocol>://<host>` of the request, when the Host header is present. */
  readonly origin?: string;
}

export interface StaticAssetsOptions {
  prefix: string;
  directory: string;
}

export interface HttpAdapterOptions {
  module: Constructor;
  /** Providers registered after the module's own, e.g. config or test doubles. */
  overrides?: ProviderLike[];
  globalPrefix?: string;
  jsonLimit?: string | number;
  maxUploadBytes?: number;
  middlewares?: RequestHandler[];
  staticAssets?: StaticAssetsOptions[];
}
