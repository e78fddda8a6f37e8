import { beforeEach, describe, expect, it, vi } from "vitest";

const { FakeRedis } = vi.hoisted(() => {
  class FakeRedis {
    static instances: FakeRedis[] = [];
    readonly options: unknown;
    status = "wait";
    readonly data = new Map<string, string>();
    readonly handlers = new Map<string, (...args: unknown[]) => void>();

    constructor(options?: unknown) {
      this.options = options;
      FakeRedis.instances.push(this);
    }

    on(event: string, handler: (...args: unknown[]) => void): this {
      this.handlers.set(event, handler);
      return this;
    }

    connect = vi.fn(async () => {
      this.status = "ready";
    });

    get = vi.fn(async (key: string) => this.data.get(key) ?? null);

    set = vi.fn(async (key: string, value: string, ..._args: unknown[]) => {
      this.data.set(key, value);
      return "OK";
    });

    del = vi.fn(async (key: string) => (this.data.delete(key) ? 1 : 0));

    getdel = vi.fn(async (key: string) => {
      const value = this.data.get(key) ?? null;
      this.data.delete(key);
      return value;
    });

    quit = vi.fn(async () => "OK");
  }
  return { FakeRedis };
});

vi.mock("ioredis", () => ({ Redis: FakeRedis }));

vi.mock("../src/utils/logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn().mockReturnThis(),
  }),
}));

const { RedisStore } = await import("../src/storage/redis-store.js");

function lastClient(): InstanceType<typeof FakeRedis> {
  const client = FakeRedis.instances.at(-1);
  if (!client) throw new Error("no redis client created");
  return client;
}

describe("RedisStore", () => {
  beforeEach(() => {
    FakeRedis.instances = [];
  });

  it("should create a lazily connecting client from config", async () => {
    const store = new RedisStore({ host: "redis", port: 6380, db: 2 });
    const client = lastClient();

    expect(client.options).toEqual({
      host: "redis",
      port: 6380,
      db: 2,
      maxRetriesPerRequest: 3,
      lazyConnect: true,
      connectTimeout: 5000,
    });
    expect(client.connect).not.toHaveBeenCalled();

    await store.connect();
    await store.connect();
    expect(client.connect).toHaveBeenCalledTimes(1);
  });

  it("should namespace keys by collection and serialise values as JSON", async () => {
    const store = new RedisStore({ host: "localhost", port: 6379, db: 0 });
    const client = lastClient();

    await store.put("oauth-clients", "abc", { client_id: "abc" });

    expect(client.set).toHaveBeenCalledWith("oauth-clients::abc", '{"client_id":"abc"}');
    expect(await store.get("oauth-clients", "abc")).toEqual({ client_id: "abc" });
    expect(await store.get("oauth-clients", "missing")).toBeUndefined();
  });

  it("should set an expiry in whole seconds when a TTL is given", async () => {
    const store = new RedisStore({ host: "localhost", port: 6379, db: 0 });
    const client = lastClient();

    await store.put("oauth-verified-tokens", "h", { ok: true }, { ttlSeconds: 12.2 });
    await store.put("oauth-codes", "c", "x", { ttlSeconds: 0 });

    expect(client.set).toHaveBeenNthCalledWith(1, "oauth-verified-tokens::h", '{"ok":true}', "EX", 13);
    expect(client.set).toHaveBeenNthCalledWith(2, "oauth-codes::c", '"x"', "EX", 1);
  });

  it("should report whether delete removed a key", async () => {
    const store = new RedisStore({ host: "localhost", port: 6379, db: 0 });
    await store.put("c", "k", 1);

    expect(await store.delete("c", "k")).toBe(true);
    expect(await store.delete("c", "k")).toBe(false);
  });

  it("should read and remove an entry with a single GETDEL", async () => {
    const store = new RedisStore({ host: "localhost", port: 6379, db: 0 });
    const client = lastClient();
    await store.put("oauth-codes", "c", { clientId: "client-1" });

    expect(await store.take("oauth-codes", "c")).toEqual({ clientId: "client-1" });
    expect(await store.take("oauth-codes", "c")).toBeUndefined();
    expect(client.getdel).toHaveBeenCalledWith("oauth-codes::c");
    expect(client.get).not.toHaveBeenCalled();
    expect(client.del).not.toHaveBeenCalled();
  });

  it("should quit the connection on close", async () => {
    const store = new RedisStore({ host: "localhost", port: 6379, db: 0 });
    await store.close();
    expect(lastClient().quit).toHaveBeenCalledTimes(1);
  });
});
