import { MemoryStore } from "../src/storage/memory-store.js";

describe("MemoryStore", () => {
  it("should round-trip JSON values per collection", async () => {
    const store = new MemoryStore();
    await store.put("clients", "abc", { name: "cli", uris: ["http://localhost/cb"] });

    expect(await store.get("clients", "abc")).toEqual({ name: "cli", uris: ["http://localhost/cb"] });
    expect(await store.get("tokens", "abc")).toBeUndefined();
  });

  it("should return copies, not the stored object", async () => {
    const store = new MemoryStore();
    const value = { count: 1 };
    await store.put("c", "k", value);
    value.count = 2;

    expect(await store.get("c", "k")).toEqual({ count: 1 });
  });

  it("should expire entries once their TTL has passed", async () => {
    let now = 1_000_000;
    const store = new MemoryStore(() => now);
    await store.put("codes", "one-time", "value", { ttlSeconds: 300 });

    now += 299_999;
    expect(await store.get("codes", "one-time")).toBe("value");

    now += 1;
    expect(await store.get("codes", "one-time")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("should report whether delete removed an entry", async () => {
    const store = new MemoryStore();
    await store.put("c", "k", 1);

    expect(await store.delete("c", "k")).toBe(true);
    expect(await store.delete("c", "k")).toBe(false);
  });

  it("should hand a taken entry to exactly one caller", async () => {
    const store = new MemoryStore();
    await store.put("codes", "one-time", { clientId: "client-1" });

    const [first, second] = await Promise.all([store.take("codes", "one-time"), store.take("codes", "one-time")]);

    expect(first).toEqual({ clientId: "client-1" });
    expect(second).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it("should not hand out an expired entry from take", async () => {
    let now = 1_000_000;
    const store = new MemoryStore(() => now);
    await store.put("codes", "one-time", "value", { ttlSeconds: 1 });

    now += 1_000;
    expect(await store.take("codes", "one-time")).toBeUndefined();
  });

  it("should drop everything on close", async () => {
    const store = new MemoryStore();
    await store.put("c", "a", 1);
    await store.put("c", "b", 2);
    await store.close();

    expect(store.size).toBe(0);
  });
});
