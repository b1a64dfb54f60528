import test from "node:test";
import assert from "node:assert/strict";
import { createTestApp } from "@vitrine/testing";
import { CatalogModule } from "../catalog.module";
import { Category, Product, ProductImage, ProductType } from "../entities";
import { CatalogValidationError } from "../errors";
import { ProductService } from "../product/product.service";
import { createCatalogFixture, imageFile } from "../testing/catalog-fixture";
import { TypeService } from "../type/type.service";
import { CategoryService } from "./category.service";

const setup = () => {
  const fixture = createCatalogFixture();
  const { container } = createTestApp(CatalogModule, fixture.providers).context;
  return {
    fixture,
    categories: container.resolve(CategoryService),
    types: container.resolve(TypeService),
    products: container.resolve(ProductService),
  };
};

test("validates the title and the image media type", async () => {
  const { categories } = setup();

  await assert.rejects(categories.create({ title: " a ", image: imageFile("logo.svg", "text/xml") }), (error) => {
    assert.ok(error instanceof CatalogValidationError);
    assert.deepEqual(error.fields, {
      title: ["Category title must contain at least 2 characters"],
      image: ['Upload a valid image. "logo.svg" is not an image.'],
    });
    return true;
  });
});

test("stores the image and resolves its URL against the request origin", async () => {
  const { fixture, categories } = setup();

  const created = await categories.create({ title: "Phones", image: imageFile("logo.png") });
  await categories.create({ title: "Tablets" });

  assert.equal(created.image, "/media/category/img-1.png");
  assert.deepEqual(fixture.storage.keys(), ["category/img-1.png"]);
  assert.deepEqual(
    (await categories.list("http://shop.test")).map(({ id, title, image }) => ({ id, title, image })),
    [
      { id: 1, title: "Phones", image: "http://shop.test/media/category/img-1.png" },
      { id: 2, title: "Tablets", image: null },
    ],
  );
});

test("deleting a category removes its types, products and images", async () => {
  const { fixture, categories, types, products } = setup();
  const phones = await categories.create({ title: "Phones" });
  const books = await categories.create({ title: "Books" });
  const handsets = await types.create({ title: "Handsets", description: "Phones you hold", category: phones.id });
  const novels = await types.create({ title: "Novels", description: "Long fiction titles", category: books.id });
  const product = {
    description: "Ten characters at least",
    price: "10",
  };
  await products.create(
    { ...product, title: "Pixel", category: phones.id, types_product: handsets.id },
    [imageFile("front.png"), imageFile("back.png")],
  );
  await products.create({ ...product, title: "Dune", category: books.id, types_product: novels.id }, [
    imageFile("cover.png"),
  ]);

  assert.equal(await categories.delete(phones.id), true);
  assert.equal(await categories.delete(phones.id), false);

  const { connection } = fixture;
  assert.deepEqual(
    (await connection.getRepository(Category).find()).map((category) => category.title),
    ["Books"],
  );
  assert.deepEqual(
    (await connection.getRepository(ProductType).find()).map((type) => type.title),
    ["Novels"],
  );
  assert.deepEqual(
    (await connection.getRepository(Product).find()).map((item) => item.title),
    ["Dune"],
  );
  assert.deepEqual(
    (await connection.getRepository(ProductImage).find()).map((image) => image.image),
    ["product/img-3.png"],
  );
});

test("deleting a category invalidates the cached product list", async () => {
  const { categories, types, products } = setup();
  const phones = await categories.create({ title: "Phones" });
  const handsets = await types.create({ title: "Handsets", description: "Phones you hold", category: phones.id });
  await products.create(
    { title: "Pixel", description: "Ten characters at least", price: "10", category: phones.id, types_product: handsets.id },
    [],
  );
  assert.equal((await products.list()).length, 1);

  await categories.delete(phones.id);

  assert.deepEqual(await products.list(), []);
});
