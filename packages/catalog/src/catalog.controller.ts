import { Controller, Get, Inject, Post } from "@vitrine/core";
import { CacheResponse } from "@vitrine/cache";
import { type HttpContext, UploadFiles } from "@vitrine/server";
import { CategoryService } from "./category/category.service";
import { ProductService } from "./product/product.service";
import { CATEGORY_LIST_TTL, TYPE_LIST_TTL } from "./tokens";
import { TypeService } from "./type/type.service";

const toFields = (payload: unknown): Record<string, unknown> =>
  typeof payload === "object" && payload !== null && !Array.isArray(payload)
    ? Object.fromEntries(Object.entries(payload))
    : {};

@Controller()
export class CatalogController {
  constructor(
    @Inject(CategoryService) private readonly categories: CategoryService,
    @Inject(TypeService) private readonly types: TypeService,
    @Inject(ProductService) private readonly products: ProductService,
  ) {}

  @Get("category-list")
  @CacheResponse({ ttlMs: 15 * 60_000, ttlToken: CATEGORY_LIST_TTL })
  listCategories(_query: unknown, context: HttpContext) {
    return this.categories.list(context.origin);
  }

  @Get("type-list")
  @CacheResponse({ ttlMs: 10 * 60_000, ttlToken: TYPE_LIST_TTL })
  listTypes() {
    return this.types.list();
  }

  @Get("product-list")
  listProducts(_query: unknown, context: HttpContext) {
    return this.products.list(context.origin);
  }

  @Post("product-create", { status: 201 })
  @UploadFiles("images", { maxCount: 10 })
  createProduct(body: unknown, context: HttpContext) {
    return this.products.create(toFields(body), context.files, context.origin);
  }
}
