import { createToken } from "@vitrine/core";
import type { ImageStore, ImageStoreOptions } from "./image-store";
import type { StorageClient } from "./storage-client";

export const STORAGE_CLIENT = createToken<StorageClient>("VITRINE_STORAGE_CLIENT");
export const IMAGE_STORE_OPTIONS = createToken<ImageStoreOptions>("VITRINE_IMAGE_STORE_OPTIONS");
export const IMAGE_STORE = createToken<ImageStore>("VITRINE_IMAGE_STORE");
