import { Inject, Injectable, evaluateRules } from "@vitrine/core";
import { CACHE_MANAGER, type CacheManager } from "@vitrine/cache";
import { LOGGER, type StructuredLogger } from "@vitrine/observability";
import type { Connection, WhereCondition } from "@vitrine/orm";
import { IMAGE_STORE, type ImageStore } from "@vitrine/storage";
import type { AppConfig } from "../config/app-config";
import { Category, Product, ProductImage, ProductType } from "../entities";
import { CatalogValidationError } from "../errors";
import type { ImageFile } from "../rules";
import { type ProductRepresentation, mediaUrl, serializeProduct } from "../serializers";
import { APP_CONFIG, DB_CONNECTION } from "../tokens";
import { createProductRules } from "./dto/create-product.dto";

/**
 * The product list is cached under one global key: the endpoint takes no
 * filters, so every request shares the same payload.
 */
export const PRODUCT_LIST_KEY = "product_list";

const PRODUCT_RELATIONS = ["category", "typesProduct", "images"];

@Injectable()
export class ProductService {
  private readonly logger: StructuredLogger;

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(DB_CONNECTION) private readonly connection: Connection,
    @Inject(IMAGE_STORE) private readonly images: ImageStore,
    @Inject(CACHE_MANAGER) private readonly cache: CacheManager,
    @Inject(LOGGER) logger: StructuredLogger,
  ) {
    this.logger = logger.child({ component: "product" });
  }

  /** Read-through: a hit returns the payload stored by the request that filled it. */
  async list(origin?: string): Promise<ProductRepresentation[]> {
    return this.cache.getOrSet(PRODUCT_LIST_KEY, () => this.logger.profile("Product list query", () => this.load({}, origin)), {
      ttlMs: this.config.PRODUCT_LIST_TTL_SECONDS * 1000,
    });
  }

  async create(input: Record<string, unknown>, files: ImageFile[], origin?: string): Promise<ProductRepresentation> {
    const categories = this.connection.getRepository(Category);
    const types = this.connection.getRepository(ProductType);
    const outcome = await evaluateRules(
      createProductRules({
        categoryExists: (id) => categories.exists({ id }),
        typeExists: (id) => types.exists({ id }),
      }),
      { ...input, images: files },
    );
    if (!outcome.success) {
      throw new CatalogValidationError(outcome.errors);
    }
    const data = outcome.data;
    const references = await this.storeImages(data.images);

    let productId: number;
    try {
      productId = await this.connection.transaction(async (manager) => {
        const products = manager.getRepository(Product);
        const product = await products.save(
          products.create({
            title: data.title,
            description: data.description,
            price: data.price,
            categoryId: data.category,
            typesProductId: data.types_product,
            isActive: data.is_active,
          }),
        );
        const images = manager.getRepository(ProductImage);
        for (const reference of references) {
          await images.save(images.create({ image: reference, productId: product.id }));
        }
        return product.id;
      });
    } catch (error) {
      await this.discardImages(references);
      throw error;
    }

    await this.cache.delete(PRODUCT_LIST_KEY);
    this.logger.info("Product created", { id: productId, images: references.length });

    const [created] = await this.load({ id: productId }, origin);
    if (!created) {
      throw new Error(`Product ${productId} is missing after commit`);
    }
    return created;
  }

  private async load(where: WhereCondition<Product>, origin?: string): Promise<ProductRepresentation[]> {
    const repository = this.connection.getRepository(Product);
    const products = await repository.prefetch(await repository.find({ where }), PRODUCT_RELATIONS);
    const url = mediaUrl(this.images, origin);
    return products.map((product) => serializeProduct(product, url));
  }

  private async storeImages(files: ImageFile[]): Promise<string[]> {
    const references: string[] = [];
    try {
      for (const file of files) {
        references.push(
          await this.images.put("product", {
            originalName: file.originalName,
            contentType: file.mimeType,
            data: file.buffer,
          }),
        );
      }
    } catch (error) {
      await this.discardImages(references);
      throw error;
    }
    return references;
  }

  private async discardImages(references: string[]): Promise<void> {
    for (const reference of references) {
      try {
        await this.images.remove(reference);
      } catch (error) {
        this.logger.warn("Failed to remove orphaned image", { reference, error });
      }
    }
  }
}
