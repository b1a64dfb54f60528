export * from "./config/app-config";
export * from "./tokens";
export * from "./entities";
export * from "./errors";
export * from "./rules";
export * from "./serializers";
export * from "./category/dto/create-category.dto";
export * from "./category/category.service";
export * from "./type/dto/create-type.dto";
export * from "./type/type.service";
export * from "./product/dto/create-product.dto";
export * from "./product/product.service";
export * from "./catalog.controller";
export * from "./catalog.module";
export * from "./bootstrap";
