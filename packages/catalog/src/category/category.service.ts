import { Inject, Injectable, evaluateRules } from "@vitrine/core";
import { CACHE_MANAGER, type CacheManager } from "@vitrine/cache";
import { LOGGER, type StructuredLogger } from "@vitrine/observability";
import type { Connection } from "@vitrine/orm";
import { IMAGE_STORE, type ImageStore } from "@vitrine/storage";
import { Category } from "../entities";
import { CatalogValidationError } from "../errors";
import { PRODUCT_LIST_KEY } from "../product/product.service";
import { type CategoryRepresentation, mediaUrl, serializeCategory } from "../serializers";
import { DB_CONNECTION } from "../tokens";
import { createCategoryRules } from "./dto/create-category.dto";

@Injectable()
export class CategoryService {
  private readonly logger: StructuredLogger;

  constructor(
    @Inject(DB_CONNECTION) private readonly connection: Connection,
    @Inject(IMAGE_STORE) private readonly images: ImageStore,
    @Inject(CACHE_MANAGER) private readonly cache: CacheManager,
    @Inject(LOGGER) logger: StructuredLogger,
  ) {
    this.logger = logger.child({ component: "category" });
  }

  async list(origin?: string): Promise<CategoryRepresentation[]> {
    const categories = await this.connection.getRepository(Category).find();
    return categories.map((category) => serializeCategory(category, mediaUrl(this.images, origin)));
  }

  async create(input: Record<string, unknown>, origin?: string): Promise<CategoryRepresentation> {
    const outcome = await evaluateRules(createCategoryRules, input);
    if (!outcome.success) {
      throw new CatalogValidationError(outcome.errors);
    }
    const { title, image } = outcome.data;
    const reference = image
      ? await this.images.put("category", { originalName: image.originalName, contentType: image.mimeType, data: image.buffer })
      : null;
    const repository = this.connection.getRepository(Category);
    const category = await repository.save(repository.create({ title, image: reference }));
    this.logger.info("Category created", { id: category.id });
    return serializeCategory(category, mediaUrl(this.images, origin));
  }

  /**
   * Removes the category with its types, products and product images.
   * Returns false when no category has that id.
   */
  async delete(id: number): Promise<boolean> {
    const removed = await this.connection.transaction((manager) => manager.getRepository(Category).delete({ id }));
    if (!removed) {
      return false;
    }
    await this.cache.delete(PRODUCT_LIST_KEY);
    this.logger.info("Category deleted with its dependents", { id });
    return true;
  }
}
