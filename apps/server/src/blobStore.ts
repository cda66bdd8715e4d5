import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import { BlobNotFoundError } from "./errors.js";

export interface BlobCallOptions {
  signal?: AbortSignal;
}

export interface BlobStore {
  put(key: string, bytes: Buffer, options?: BlobCallOptions): Promise<void>;
  get(key: string, options?: BlobCallOptions): Promise<Buffer>;
  delete(key: string): Promise<void>;
}

/** Object key of one segment. Existing data depends on this exact layout. */
export function segmentKey(fileId: string, orderIndex: number): string {
  return `segments/${fileId}/${orderIndex}`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class LocalBlobStore implements BlobStore {
  private readonly rootDir: string;

  constructor(rootDir: string) {
    this.rootDir = resolve(rootDir);
  }

  async put(key: string, bytes: Buffer, options: BlobCallOptions = {}): Promise<void> {
    const path = this.pathFor(key);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, bytes, { signal: options.signal });
  }

  async get(key: string, options: BlobCallOptions = {}): Promise<Buffer> {
    try {
      return await readFile(this.pathFor(key), { signal: options.signal });
    } catch (error) {
      if (isMissingFile(error)) {
        throw new BlobNotFoundError(key, { cause: error });
      }
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  private pathFor(key: string): string {
    const path = resolve(join(this.rootDir, "blobs", key));
    if (!path.startsWith(`${this.rootDir}${sep}`)) {
      throw new Error(`Blob key escapes the data directory: ${key}`);
    }
    return path;
  }
}
