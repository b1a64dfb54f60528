import { Module } from "@vitrine/core";
import { ImageStore } from "./image-store";
import { MemoryStorageClient } from "./storage-client";
import { IMAGE_STORE, IMAGE_STORE_OPTIONS, STORAGE_CLIENT } from "./tokens";

@Module({
  providers: [
    {
      token: STORAGE_CLIENT,
      useClass: MemoryStorageClient,
    },
    {
      token: IMAGE_STORE_OPTIONS,
      useValue: { mediaUrl: "/media/" },
    },
    {
      token: IMAGE_STORE,
      useFactory: ({ container }) =>
        new ImageStore(container.resolve(STORAGE_CLIENT), container.resolve(IMAGE_STORE_OPTIONS)),
    },
  ],
})
export class StorageModule {}
