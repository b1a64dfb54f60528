import test from "node:test";
import assert from "node:assert/strict";
import { startHttpTestServer } from "@vitrine/testing";
import { CatalogModule } from "./catalog.module";
import { CategoryService } from "./category/category.service";
import { Product } from "./entities";
import type { CategoryRepresentation, ProductRepresentation, TypeRepresentation } from "./serializers";
import { createCatalogFixture } from "./testing/catalog-fixture";
import { TypeService } from "./type/type.service";

const start = async () => {
  const fixture = createCatalogFixture();
  const server = await startHttpTestServer({
    module: CatalogModule,
    globalPrefix: "/api",
    overrides: fixture.providers,
  });
  const container = server.adapter.getContainer();
  const category = await container.resolve(CategoryService).create({ title: "Phones" });
  const type = await container.resolve(TypeService).create({
    title: "Smartphones",
    description: "Touchscreen handsets",
    category: category.id,
  });
  return { ...server, fixture, categoryId: category.id, typeId: type.id };
};

const postJson = (url: string, body: unknown) =>
  fetch(url, { method: "POST", headers: { "content-type": "application/json" }, body: JSON.stringify(body) });

test("product-create answers 201 with the first submitted image as first_image", async () => {
  const { baseUrl, close, fixture, categoryId, typeId } = await start();
  try {
    const form = new FormData();
    form.append("title", "Pixel 9");
    form.append("description", "A phone with a good camera");
    form.append("price", "799.00");
    form.append("category", String(categoryId));
    form.append("types_product", String(typeId));
    form.append("is_active", "true");
    form.append("images", new Blob(["front"], { type: "image/png" }), "front.png");
    form.append("images", new Blob(["back"], { type: "image/jpeg" }), "back.jpg");

    const response = await fetch(`${baseUrl}/api/product-create`, { method: "POST", body: form });
    const body: ProductRepresentation = await response.json();

    assert.equal(response.status, 201);
    assert.equal(body.first_image, `${baseUrl}/media/product/img-1.png`);
    assert.deepEqual(body.images, [
      {
        id: 1,
        image: `${baseUrl}/media/product/img-1.png`,
        image_url: `${baseUrl}/media/product/img-1.png`,
        product: body.id,
      },
      {
        id: 2,
        image: `${baseUrl}/media/product/img-2.jpg`,
        image_url: `${baseUrl}/media/product/img-2.jpg`,
        product: body.id,
      },
    ]);
    assert.deepEqual(
      {
        title: body.title,
        price: body.price,
        category: body.category,
        category_title: body.category_title,
        types_product: body.types_product,
        types_title: body.types_title,
        is_active: body.is_active,
      },
      {
        title: "Pixel 9",
        price: "799.00",
        category: categoryId,
        category_title: "Phones",
        types_product: typeId,
        types_title: "Smartphones",
        is_active: true,
      },
    );
    assert.deepEqual(fixture.storage.keys(), ["product/img-1.png", "product/img-2.jpg"]);
  } finally {
    await close();
  }
});

test("product-create rejects a short title with a field report", async () => {
  const { baseUrl, close, categoryId, typeId } = await start();
  try {
    const response = await postJson(`${baseUrl}/api/product-create`, {
      title: "  ab ",
      description: "A phone with a good camera",
      price: "19.99",
      category: categoryId,
      types_product: typeId,
    });

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), { title: ["Product title must contain at least 3 characters"] });
  } finally {
    await close();
  }
});

test("product-create rejects a category that does not exist", async () => {
  const { baseUrl, close, typeId } = await start();
  try {
    const response = await postJson(`${baseUrl}/api/product-create`, {
      title: "Pixel 9",
      description: "A phone with a good camera",
      price: "19.99",
      category: 999,
      types_product: typeId,
    });

    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), { category: ["The specified category does not exist"] });
  } finally {
    await close();
  }
});

test("product-list replays its cached payload until a product is created", async () => {
  const { baseUrl, close, fixture, categoryId, typeId } = await start();
  try {
    const product = { description: "A phone with a good camera", price: "19.99", category: categoryId, types_product: typeId };
    assert.equal((await postJson(`${baseUrl}/api/product-create`, { ...product, title: "Pixel 9" })).status, 201);

    const first = await (await fetch(`${baseUrl}/api/product-list`)).text();
    const repository = fixture.connection.getRepository(Product);
    await repository.save(
      repository.create({
        title: "Written behind the cache",
        description: "Inserted straight into the store",
        price: "5",
        categoryId,
        typesProductId: typeId,
      }),
    );
    const second = await (await fetch(`${baseUrl}/api/product-list`)).text();

    assert.equal(second, first);
    assert.equal(JSON.parse(first).length, 1);

    assert.equal((await postJson(`${baseUrl}/api/product-create`, { ...product, title: "Pixel 10" })).status, 201);
    const fresh: ProductRepresentation[] = await (await fetch(`${baseUrl}/api/product-list`)).json();

    assert.deepEqual(
      fresh.map((item) => item.title),
      ["Pixel 9", "Written behind the cache", "Pixel 10"],
    );
  } finally {
    await close();
  }
});

test("category-list is served from the response cache until its ttl passes", async () => {
  const { baseUrl, close, adapter, fixture } = await start();
  try {
    const first = await fetch(`${baseUrl}/api/category-list`);
    const firstBody = await first.text();
    await adapter.getContainer().resolve(CategoryService).create({ title: "Tablets" });
    const second = await fetch(`${baseUrl}/api/category-list`);
    const secondBody = await second.text();

    assert.equal(first.headers.get("x-cache"), "MISS");
    assert.equal(second.headers.get("x-cache"), "HIT");
    assert.equal(secondBody, firstBody);

    fixture.clock.now += 15 * 60_000;
    const third = await fetch(`${baseUrl}/api/category-list`);
    const thirdBody: CategoryRepresentation[] = await third.json();

    assert.equal(third.headers.get("x-cache"), "MISS");
    assert.deepEqual(
      thirdBody.map((category) => category.title),
      ["Phones", "Tablets"],
    );
    assert.notEqual(JSON.stringify(thirdBody), firstBody);
  } finally {
    await close();
  }
});

test("type-list includes the category title", async () => {
  const { baseUrl, close, categoryId, typeId } = await start();
  try {
    const response = await fetch(`${baseUrl}/api/type-list`);
    const [type]: TypeRepresentation[] = await response.json();

    assert.equal(response.headers.get("x-cache"), "MISS");
    assert.deepEqual(
      { id: type.id, title: type.title, category: type.category, category_title: type.category_title },
      { id: typeId, title: "Smartphones", category: categoryId, category_title: "Phones" },
    );
  } finally {
    await close();
  }
});

test("unknown routes answer 404", async () => {
  const { baseUrl, close } = await start();
  try {
    const response = await fetch(`${baseUrl}/api/product-delete`);

    assert.equal(response.status, 404);
    assert.deepEqual(await response.json(), { message: "Not Found" });
  } finally {
    await close();
  }
});
