import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createLogger } from "../utils/logger.js";
import type { KeyValueStore, PutOptions } from "./types.js";

const logger = createLogger("disk-store");

interface DiskEntry {
  value: unknown;
  expiresAt?: number;
}

type DiskCollection = Record<string, DiskEntry>;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * File-backed store: one JSON file per collection under `directory`.
 * Used by the chat client to keep OAuth state between runs.
 */
export class DiskStore implements KeyValueStore {
  readonly directory: string;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(directory: string) {
    this.directory = directory;
  }

  /** Runs read-modify-write operations one at a time. */
  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.pending.then(operation, operation);
    this.pending = result.catch(() => undefined);
    return result;
  }

  private collectionPath(collection: string): string {
    return join(this.directory, `${encodeURIComponent(collection)}.json`);
  }

  private async readCollection(collection: string): Promise<DiskCollection> {
    try {
      const raw = await readFile(this.collectionPath(collection), "utf-8");
      return JSON.parse(raw) as DiskCollection;
    } catch (error) {
      if (isNotFound(error)) return {};
      throw error;
    }
  }

  private async writeCollection(collection: string, data: DiskCollection): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.collectionPath(collection), JSON.stringify(data, null, 2), {
      mode: 0o600,
    });
  }

  get<T>(collection: string, key: string): Promise<T | undefined> {
    return this.serialize(() => this.readEntry<T>(collection, key, false));
  }

  take<T>(collection: string, key: string): Promise<T | undefined> {
    return this.serialize(() => this.readEntry<T>(collection, key, true));
  }

  private async readEntry<T>(collection: string, key: string, remove: boolean): Promise<T | undefined> {
    const data = await this.readCollection(collection);
    const entry = data[key];
    if (!entry) return undefined;
    const expired = entry.expiresAt !== undefined && entry.expiresAt <= Date.now();
    if (expired || remove) {
      delete data[key];
      await this.writeCollection(collection, data);
    }
    return expired ? undefined : (entry.value as T);
  }

  put(collection: string, key: string, value: unknown, options?: PutOptions): Promise<void> {
    return this.serialize(async () => {
      const data = await this.readCollection(collection);
      const ttl = options?.ttlSeconds;
      data[key] = {
        value,
        expiresAt: ttl !== undefined ? Date.now() + ttl * 1000 : undefined,
      };
      await this.writeCollection(collection, data);
    });
  }

  delete(collection: string, key: string): Promise<boolean> {
    return this.serialize(async () => {
      const data = await this.readCollection(collection);
      if (!(key in data)) return false;
      delete data[key];
      await this.writeCollection(collection, data);
      return true;
    });
  }

  /** Removes every collection file by deleting the directory. */
  async clear(): Promise<void> {
    await this.serialize(() => rm(this.directory, { recursive: true, force: true }));
    logger.info({ directory: this.directory }, "Disk store cleared");
  }

  async close(): Promise<void> {}
}
