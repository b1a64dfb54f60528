import { type InferRules, field, reference } from "@vitrine/core";
import { description, identifier, title } from "../../rules";

export interface TypeLookups {
  categoryExists(id: number): Promise<boolean>;
}

export const createTypeRules = (lookups: TypeLookups) => ({
  title: field(title(2, "Type")),
  description: field(description("Type")),
  category: reference(identifier("Category"), (id) => lookups.categoryExists(id), "The specified category does not exist"),
});

export type CreateTypeInput = InferRules<ReturnType<typeof createTypeRules>>;
