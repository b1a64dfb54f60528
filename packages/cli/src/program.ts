import { promises as fs } from "node:fs";
import path from "node:path";
import { Command } from "commander";
import kleur from "kleur";
import { type ProviderLike, ValidationException } from "@vitrine/core";
import {
  type AppConfig,
  CategoryService,
  ProductService,
  TypeService,
  createCatalogApplication,
  createCatalogContext,
  loadAppConfig,
} from "@vitrine/catalog";

/** A failure reported to the user without a stack trace. */
export class CliError extends Error {
  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
    this.name = "CliError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface CliOutput {
  write(line: string): void;
}

export interface ProgramOptions {
  loadConfig?: () => AppConfig;
  /** Providers layered over the configured ones, e.g. test doubles. */
  overrides?: ProviderLike[];
  output?: CliOutput;
}

const consoleOutput: CliOutput = {
  write: (line) => console.log(line),
};

const IMAGE_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".svg": "image/svg+xml",
};

export const createProgram = (options: ProgramOptions = {}): Command => {
  const output = options.output ?? consoleOutput;
  const config = options.loadConfig ?? (() => loadAppConfig());
  const openContext = () => createCatalogContext(config(), options.overrides);

  const program = new Command();
  program
    .name("vitrine")
    .description("Catalog service: serve the HTTP API and manage categories and types")
    .version("0.1.0");

  program
    .command("serve")
    .description("Start the catalog HTTP API")
    .option("--port <port>", "Port to listen on (defaults to PORT)")
    .action(async (opts: { port?: string }) => {
      const base = config();
      const port = opts.port === undefined ? base.PORT : parseId(opts.port, "port", 0);
      const { adapter } = await createCatalogApplication({ ...base, PORT: port }, options.overrides);
      await adapter.listen(port);
      output.write(kleur.green(`Catalog API listening on port ${port}${base.API_PREFIX}`));
      const stop = () => {
        adapter.close().then(
          () => output.write(kleur.gray("Server stopped")),
          (error: unknown) => output.write(kleur.red(`Shutdown failed: ${String(error)}`)),
        );
      };
      process.once("SIGINT", stop);
      process.once("SIGTERM", stop);
    });

  program
    .command("category:create")
    .description("Create a category")
    .requiredOption("--title <title>", "Category title")
    .option("--image <file>", "Image file shown for the category")
    .action(async (opts: { title: string; image?: string }) => {
      const { container } = await openContext();
      const image = opts.image ? await readImage(opts.image) : undefined;
      const category = await reportValidation(() =>
        container.resolve(CategoryService).create({ title: opts.title, image }),
      );
      output.write(kleur.green(`Created category #${category.id} ${category.title}`));
    });

  program
    .command("type:create")
    .description("Create a product type inside a category")
    .requiredOption("--title <title>", "Type title")
    .requiredOption("--description <text>", "Type description")
    .requiredOption("--category <id>", "Id of the owning category")
    .action(async (opts: { title: string; description: string; category: string }) => {
      const { container } = await openContext();
      const type = await reportValidation(() =>
        container.resolve(TypeService).create({
          title: opts.title,
          description: opts.description,
          category: opts.category,
        }),
      );
      output.write(kleur.green(`Created type #${type.id} ${type.title} in ${type.category_title ?? "?"}`));
    });

  program
    .command("category:delete")
    .description("Delete a category with its types, products and product images")
    .argument("<id>", "Category id")
    .action(async (id: string) => {
      const categoryId = parseId(id, "category id", 1);
      const { container } = await openContext();
      if (!(await container.resolve(CategoryService).delete(categoryId))) {
        throw new CliError(`Category #${categoryId} does not exist`);
      }
      output.write(kleur.yellow(`Deleted category #${categoryId} with its types and products`));
    });

  program
    .command("catalog:list")
    .description("Print categories, types and products")
    .action(async () => {
      const { container } = await openContext();
      const categories = await container.resolve(CategoryService).list();
      const types = await container.resolve(TypeService).list();
      const products = await container.resolve(ProductService).list();

      printSection(
        output,
        "Categories",
        categories.map((category) => `#${category.id} ${category.title}`),
      );
      printSection(
        output,
        "Types",
        types.map((type) => `#${type.id} ${type.title} (${type.category_title ?? "?"})`),
      );
      printSection(
        output,
        "Products",
        products.map((product) =>
          [
            `#${product.id} ${product.title}`,
            product.price,
            `${product.category_title ?? "?"} / ${product.types_title ?? "?"}`,
            product.is_active ? "active" : "inactive",
            `${product.images.length} images`,
          ].join("  "),
        ),
      );
    });

  return program;
};

const printSection = (output: CliOutput, title: string, rows: string[]) => {
  output.write(kleur.cyan(title));
  if (!rows.length) {
    output.write(kleur.gray("  (none)"));
    return;
  }
  rows.forEach((row) => output.write(`  ${row}`));
};

const parseId = (value: string, label: string, min: number): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new CliError(`Invalid ${label} "${value}"`);
  }
  return parsed;
};

const readImage = async (file: string) => {
  const mimeType = IMAGE_TYPES[path.extname(file).toLowerCase()];
  if (!mimeType) {
    throw new CliError(`Unsupported image type: ${path.basename(file)}`);
  }
  return {
    originalName: path.basename(file),
    mimeType,
    buffer: await fs.readFile(file),
  };
};

const reportValidation = async <T>(action: () => Promise<T>): Promise<T> => {
  try {
    return await action();
  } catch (error) {
    if (error instanceof ValidationException) {
      throw new CliError(
        "Validation failed",
        Object.entries(error.fields).flatMap(([field, messages]) =>
          messages.map((message) => `${field}: ${message}`),
        ),
      );
    }
    throw error;
  }
};
