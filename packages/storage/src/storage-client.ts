import { promises as fs } from "node:fs";
import path from "node:path";

export interface StorageClient {
  putObject(key: string, data: Buffer | string): Promise<void>;
  getObject(key: string): Promise<Buffer | undefined>;
  deleteObject(key: string): Promise<void>;
}

export class MemoryStorageClient implements StorageClient {
  private readonly blobs = new Map<string, Buffer>();

  async putObject(key: string, data: Buffer | string): Promise<void> {
    const buffer = Buffer.isBuffer(data) ? data : Buffer.from(data);
    this.blobs.set(key, buffer);
  }

  async getObject(key: string): Promise<Buffer | undefined> {
    return this.blobs.get(key);
  }

  async deleteObject(key: string): Promise<void> {
    this.blobs.delete(key);
  }

  keys(): string[] {
    return Array.from(this.blobs.keys());
  }
}

/** Objects live as files under `root`; keys map to relative paths. */
export class FileSystemStorageClient implements StorageClient {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async putObject(key: string, data: Buffer | string): Promise<void> {
    const target = this.resolveKey(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
  }

  async getObject(key: string): Promise<Buffer | undefined> {
    try {
      return await fs.readFile(this.resolveKey(key));
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw error;
    }
  }

  async deleteObject(key: string): Promise<void> {
    await fs.rm(this.resolveKey(key), { force: true });
  }

  private resolveKey(key: string): string {
    const target = path.resolve(this.root, key);
    if (!target.startsWith(this.root + path.sep)) {
      throw new Error(`Storage key ${key} escapes the storage root`);
    }
    return target;
  }
}
