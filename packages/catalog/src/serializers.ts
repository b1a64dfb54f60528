import type { ImageStore } from "@vitrine/storage";
import type { Category, Product, ProductImage, ProductType } from "./entities";

/** Turns a stored image reference into the URL clients fetch it from. */
export type MediaUrl = (reference: string) => string;

/** Absolute URLs when the request origin is known, `<MEDIA_URL><reference>` otherwise. */
export const mediaUrl =
  (store: ImageStore, origin?: string): MediaUrl =>
  (reference) =>
    store.url(reference, origin);

export interface CategoryRepresentation {
  id: number;
  title: string;
  image: string | null;
  crated_at: string;
}

export interface TypeRepresentation {
  id: number;
  title: string;
  description: string;
  category: number;
  category_title: string | null;
  crated_at: string;
}

export interface ProductImageRepresentation {
  id: number;
  image: string;
  image_url: string;
  product: number;
}

export interface ProductRepresentation {
  id: number;
  uuid: string;
  title: string;
  description: string;
  category: number;
  category_title: string | null;
  types_product: number;
  types_title: string | null;
  created_at: string;
  price: string;
  first_image: string | null;
  images: ProductImageRepresentation[];
  is_active: boolean;
}

export const serializeCategory = (category: Category, url: MediaUrl): CategoryRepresentation => ({
  id: category.id,
  title: category.title,
  image: category.image ? url(category.image) : null,
  crated_at: category.createdAt,
});

/** Expects `category` to be prefetched. */
export const serializeType = (type: ProductType): TypeRepresentation => ({
  id: type.id,
  title: type.title,
  description: type.description,
  category: type.categoryId,
  category_title: type.category?.title ?? null,
  crated_at: type.createdAt,
});

export const serializeProductImage = (image: ProductImage, url: MediaUrl): ProductImageRepresentation => {
  const location = url(image.image);
  return {
    id: image.id,
    image: location,
    image_url: location,
    product: image.productId,
  };
};

/** Expects `category`, `typesProduct` and `images` to be prefetched. */
export const serializeProduct = (product: Product, url: MediaUrl): ProductRepresentation => {
  // insertion order is id order
  const images = [...(product.images ?? [])].sort((left, right) => left.id - right.id);
  const [first] = images;
  return {
    id: product.id,
    uuid: product.uuid,
    title: product.title,
    description: product.description,
    category: product.categoryId,
    category_title: product.category?.title ?? null,
    types_product: product.typesProductId,
    types_title: product.typesProduct?.title ?? null,
    created_at: product.createdAt,
    price: product.price,
    first_image: first ? url(first.image) : null,
    images: images.map((image) => serializeProductImage(image, url)),
    is_active: product.isActive,
  };
};
