import { type InferRules, boolean, field, numericString, optional, reference } from "@vitrine/core";
import { description, identifier, images, title } from "../../rules";

export interface ProductLookups {
  categoryExists(id: number): Promise<boolean>;
  typeExists(id: number): Promise<boolean>;
}

/** Evaluated in declaration order; every failure is reported. */
export const createProductRules = (lookups: ProductLookups) => ({
  title: field(title(3, "Product")),
  description: field(description("Product")),
  price: field(
    numericString({
      maxLength: 30,
      positive: true,
      messages: {
        type: "Price must be a number",
        positive: "Price must be a positive number",
        maxLength: "Price must contain at most 30 characters",
      },
    }),
  ),
  category: reference(identifier("Category"), (id) => lookups.categoryExists(id), "The specified category does not exist"),
  types_product: reference(identifier("Type"), (id) => lookups.typeExists(id), "The specified type does not exist"),
  is_active: field(optional(boolean(), false)),
  images,
});

export type CreateProductInput = InferRules<ReturnType<typeof createProductRules>>;
