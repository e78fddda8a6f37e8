/** Options accepted by {@link KeyValueStore.put}. */
export interface PutOptions {
  /** Entry lifetime in seconds. Omit for entries that never expire. */
  ttlSeconds?: number;
}

/**
 * Collection-scoped JSON key-value store.
 *
 * Values are serialised with JSON, so class instances come back as plain objects.
 */
export interface KeyValueStore {
  get<T>(collection: string, key: string): Promise<T | undefined>;
  put(collection: string, key: string, value: unknown, options?: PutOptions): Promise<void>;
  /** Reads and removes an entry in one step; concurrent callers never both receive it. */
  take<T>(collection: string, key: string): Promise<T | undefined>;
  /** Returns true when an entry was removed. */
  delete(collection: string, key: string): Promise<boolean>;
  close(): Promise<void>;
}
