import { randomUUID } from "node:crypto";
import path from "node:path";
import { StorageClient } from "./storage-client";

export interface ImageUpload {
  originalName: string;
  contentType: string;
  data: Buffer;
}

export interface ImageStoreOptions {
  /** Base the media URL of a reference starts with, e.g. `/media/`. */
  mediaUrl: string;
  generateId?: () => string;
}

/**
 * Stores uploads under a folder and hands back an opaque reference
 * (`product/<id>.<ext>`). References resolve to URLs under the media base.
 */
export class ImageStore {
  private readonly mediaUrl: string;
  private readonly generateId: () => string;

  constructor(
    private readonly client: StorageClient,
    options: ImageStoreOptions,
  ) {
    this.mediaUrl = options.mediaUrl.endsWith("/") ? options.mediaUrl : `${options.mediaUrl}/`;
    this.generateId = options.generateId ?? randomUUID;
  }

  async put(folder: string, upload: ImageUpload): Promise<string> {
    const reference = `${folder}/${this.generateId()}${safeExtension(upload.originalName)}`;
    await this.client.putObject(reference, upload.data);
    return reference;
  }

  async read(reference: string): Promise<Buffer | undefined> {
    return this.client.getObject(reference);
  }

  async remove(reference: string): Promise<void> {
    await this.client.deleteObject(reference);
  }

  /** `origin` is `<protocol>://<host>`; without it the URL stays relative to the site. */
  url(reference: string, origin?: string): string {
    const relative = `${this.mediaUrl}${reference.split("/").map(encodeURIComponent).join("/")}`;
    if (!origin || /^https?:\/\//.test(this.mediaUrl)) {
      return relative;
    }
    return `${origin.replace(/\/+$/, "")}${relative.startsWith("/") ? "" : "/"}${relative}`;
  }
}

const safeExtension = (name: string): string => {
  const extension = path.extname(name).toLowerCase();
  return /^\.[a-z0-9]{1,8}$/.test(extension) ? extension : "";
};
