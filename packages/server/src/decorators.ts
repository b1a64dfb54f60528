import { registerRouteEnhancer } from "@vitrine/core";
import type { Constructor } from "@vitrine/core";

export interface UploadFilesOptions {
  maxCount?: number;
}

/** Accepts `multipart/form-data` with up to `maxCount` files under `field`. */
export const UploadFiles = (field: string, options: UploadFilesOptions = {}): MethodDecorator => {
  return (target, propertyKey) => {
    registerRouteEnhancer(target.constructor as Constructor, propertyKey, {
      kind: "upload",
      field,
      maxCount: options.maxCount ?? 10,
    });
  };
};
