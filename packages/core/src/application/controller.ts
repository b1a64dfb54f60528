import { markInjectable } from "../di/decorators";
import { Constructor } from "../di/types";

const basePaths = new WeakMap<Constructor, string>();

/** Mounts the class's routes under `basePath` and makes it injectable. */
export const Controller =
  (basePath = "/"): ClassDecorator =>
  (target) => {
    const ctor = target as unknown as Constructor;
    basePaths.set(ctor, basePath.startsWith("/") ? basePath : `/${basePath}`);
    markInjectable(ctor);
  };

export const getControllerBasePath = (target: Constructor): string => {
  const basePath = basePaths.get(target);
  if (basePath === undefined) {
    throw new Error(`${target.name} is listed as a controller but has no @Controller()`);
  }
  return basePath;
};
