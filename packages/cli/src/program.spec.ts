import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import kleur from "kleur";
import { ProductService, createCatalogContext, loadAppConfig } from "@vitrine/catalog";
import { CliError, createProgram } from "./program";

kleur.enabled = false;

const workspace = async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "vitrine-cli-"));
  const config = loadAppConfig({
    DATA_DRIVER: "json",
    DATA_FILE: path.join(dir, "catalog.json"),
    MEDIA_ROOT: path.join(dir, "media"),
    LOG_LEVEL: "error",
  });
  const lines: string[] = [];
  const run = (...args: string[]) =>
    createProgram({ loadConfig: () => config, output: { write: (line) => lines.push(line) } }).parseAsync(args, {
      from: "user",
    });
  return { dir, config, lines, run };
};

test("manages categories and types across separate invocations", async () => {
  const { dir, config, lines, run } = await workspace();
  try {
    await fs.writeFile(path.join(dir, "logo.png"), "png-bytes");
    await run("category:create", "--title", "Phones", "--image", path.join(dir, "logo.png"));
    await run("type:create", "--title", "Smartphones", "--description", "Touchscreen handsets", "--category", "1");

    const { container } = await createCatalogContext(config);
    await container.resolve(ProductService).create(
      {
        title: "Pixel 9",
        description: "A phone with a good camera",
        price: "19.99",
        category: 1,
        types_product: 1,
        is_active: "true",
      },
      [],
    );
    await run("catalog:list");

    assert.deepEqual(lines, [
      "Created category #1 Phones",
      "Created type #1 Smartphones in Phones",
      "Categories",
      "  #1 Phones",
      "Types",
      "  #1 Smartphones (Phones)",
      "Products",
      "  #1 Pixel 9  19.99  Phones / Smartphones  active  0 images",
    ]);
    const stored = await fs.readdir(path.join(dir, "media", "category"));
    assert.equal(stored.length, 1);
    assert.equal(path.extname(stored[0]), ".png");
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("category:delete cascades and refuses unknown ids", async () => {
  const { dir, lines, run } = await workspace();
  try {
    await run("category:create", "--title", "Phones");
    await run("type:create", "--title", "Smartphones", "--description", "Touchscreen handsets", "--category", "1");
    lines.length = 0;

    await run("category:delete", "1");
    await run("catalog:list");
    await assert.rejects(run("category:delete", "1"), { name: "CliError", message: "Category #1 does not exist" });
    await assert.rejects(run("category:delete", "one"), { message: 'Invalid category id "one"' });

    assert.deepEqual(lines, [
      "Deleted category #1 with its types and products",
      "Categories",
      "  (none)",
      "Types",
      "  (none)",
      "Products",
      "  (none)",
    ]);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("validation failures list every field message", async () => {
  const { dir, run } = await workspace();
  try {
    await assert.rejects(run("type:create", "--title", "S", "--description", "short", "--category", "4"), (error) => {
      assert.ok(error instanceof CliError);
      assert.deepEqual(error.details, [
        "title: Type title must contain at least 2 characters",
        "description: Type description must contain at least 10 characters",
        "category: The specified category does not exist",
      ]);
      return true;
    });
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
