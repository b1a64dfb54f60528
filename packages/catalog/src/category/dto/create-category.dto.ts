import { type InferRules, field } from "@vitrine/core";
import { optionalImage, title } from "../../rules";

export const createCategoryRules = {
  title: field(title(2, "Category")),
  image: optionalImage,
};

export type CreateCategoryInput = InferRules<typeof createCategoryRules>;
