import { Redis } from "ioredis";
import type { RedisConfig } from "../config.js";
import { createLogger } from "../utils/logger.js";
import type { KeyValueStore, PutOptions } from "./types.js";

const logger = createLogger("redis-store");

/**
 * Redis-backed store shared by every server instance.
 *
 * Keys are laid out as `<collection>::<key>`; TTLs use `SET ... EX`.
 */
export class RedisStore implements KeyValueStore {
  private readonly redis: Redis;

  constructor(source: RedisConfig | Redis) {
    if (source instanceof Redis) {
      this.redis = source;
    } else {
      this.redis = new Redis({
        host: source.host,
        port: source.port,
        db: source.db,
        maxRetriesPerRequest: 3,
        lazyConnect: true,
        connectTimeout: 5000,
      });
    }

    this.redis.on("connect", () => {
      logger.info("Redis connected");
    });
    this.redis.on("error", (error: Error) => {
      logger.warn({ error }, "Redis connection error");
    });
  }

  private buildKey(collection: string, key: string): string {
    return `${collection}::${key}`;
  }

  /** Opens the connection eagerly so startup fails fast when Redis is unreachable. */
  async connect(): Promise<void> {
    if (this.redis.status === "wait") {
      await this.redis.connect();
    }
  }

  async get<T>(collection: string, key: string): Promise<T | undefined> {
    const raw = await this.redis.get(this.buildKey(collection, key));
    if (raw === null) return undefined;
    return JSON.parse(raw) as T;
  }

  async put(collection: string, key: string, value: unknown, options?: PutOptions): Promise<void> {
    const fullKey = this.buildKey(collection, key);
    const json = JSON.stringify(value);
    const ttl = options?.ttlSeconds;
    if (ttl !== undefined) {
      await this.redis.set(fullKey, json, "EX", Math.max(1, Math.ceil(ttl)));
    } else {
      await this.redis.set(fullKey, json);
    }
  }

  /** GETDEL, so a value is handed to exactly one caller across instances. */
  async take<T>(collection: string, key: string): Promise<T | undefined> {
    const raw = await this.redis.getdel(this.buildKey(collection, key));
    if (raw === null) return undefined;
    return JSON.parse(raw) as T;
  }

  async delete(collection: string, key: string): Promise<boolean> {
    const removed = await this.redis.del(this.buildKey(collection, key));
    return removed > 0;
  }

  async close(): Promise<void> {
    await this.redis.quit();
    logger.info("Redis connection closed");
  }
}
