import type { KeyValueStore, PutOptions } from "./types.js";

interface MemoryEntry {
  json: string;
  expiresAt?: number;
}

/**
 * In-process store. Expired entries are dropped lazily on read.
 * Suitable for a single server instance and for tests.
 */
export class MemoryStore implements KeyValueStore {
  private readonly entries = new Map<string, MemoryEntry>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  private buildKey(collection: string, key: string): string {
    return `${collection}::${key}`;
  }

  async get<T>(collection: string, key: string): Promise<T | undefined> {
    const fullKey = this.buildKey(collection, key);
    const entry = this.entries.get(fullKey);
    if (!entry) return undefined;
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.entries.delete(fullKey);
      return undefined;
    }
    return JSON.parse(entry.json) as T;
  }

  async put(collection: string, key: string, value: unknown, options?: PutOptions): Promise<void> {
    const ttl = options?.ttlSeconds;
    this.entries.set(this.buildKey(collection, key), {
      json: JSON.stringify(value),
      expiresAt: ttl !== undefined ? this.now() + ttl * 1000 : undefined,
    });
  }

  async take<T>(collection: string, key: string): Promise<T | undefined> {
    const fullKey = this.buildKey(collection, key);
    const entry = this.entries.get(fullKey);
    if (!entry) return undefined;
    this.entries.delete(fullKey);
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      return undefined;
    }
    return JSON.parse(entry.json) as T;
  }

  async delete(collection: string, key: string): Promise<boolean> {
    return this.entries.delete(this.buildKey(collection, key));
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
