import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  jest,
  test,
} from "@jest/globals";
import { CacheStore, snapshotFileFor } from "./cacheStore";
import { CACHE_TTL_MS } from "./types";

const t1 = 1_700_000_000_000;
const t2 = 1_700_000_500_000;

function createLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

describe("CacheStore", () => {
  let cacheDir: string;
  let logger: ReturnType<typeof createLogger>;

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), "peer-dns-cache-"));
    logger = createLogger();
  });

  afterEach(() => {
    fs.rmSync(cacheDir, { recursive: true, force: true });
  });

  function openStore(clientId = "alpha", cacheMaxEntries?: number) {
    return new CacheStore({ clientId, cacheDir, cacheMaxEntries, logger });
  }

  test("treats an entry as stale exactly at the TTL boundary", () => {
    const store = openStore();
    const entry = { domain: "a.com.", address: "1.2.3.4", observedAt: t1 };

    expect(store.isFresh(entry, t1)).toBe(true);
    expect(store.isFresh(entry, t1 + CACHE_TTL_MS - 1)).toBe(true);
    expect(store.isFresh(entry, t1 + CACHE_TTL_MS)).toBe(false);
    expect(store.isFresh(entry, t1 + CACHE_TTL_MS + 1)).toBe(false);
  });

  test("normalizes domains to lowercase fully-qualified keys", async () => {
    const store = openStore();
    await store.put("Example.COM", "192.0.2.1", t1);

    expect(store.get("example.com.")).toEqual({
      domain: "example.com.",
      address: "192.0.2.1",
      observedAt: t1,
    });
    expect(store.get("EXAMPLE.com")).toBe(store.get("example.com."));
    expect(store.size).toBe(1);
  });

  test("refuses to cache an empty or unqualified domain", () => {
    const store = openStore();

    expect(() => store.put("", "1.2.3.4", t1)).toThrow(TypeError);
    expect(() => store.put(".", "1.2.3.4", t1)).toThrow(TypeError);
    expect(() => store.put("a..com", "1.2.3.4", t1)).toThrow(TypeError);
    expect(store.size).toBe(0);
    expect(store.get("")).toBeUndefined();
  });

  test("round-trips entries through the snapshot file", async () => {
    const store = openStore();
    await store.put("a.com", "1.2.3.4", t1);
    await store.put("b.com", "5.6.7.8", t2);

    const reloaded = openStore();
    await reloaded.load();

    expect(reloaded.size).toBe(2);
    expect(reloaded.get("a.com")).toEqual({
      domain: "a.com.",
      address: "1.2.3.4",
      observedAt: t1,
    });
    expect(reloaded.get("b.com")).toEqual({
      domain: "b.com.",
      address: "5.6.7.8",
      observedAt: t2,
    });
  });

  test("writes one JSON snapshot per client id", async () => {
    const store = openStore("bravo");
    await store.put("a.com", "1.2.3.4", t1);

    const file = snapshotFileFor(cacheDir, "bravo");
    expect(store.file).toBe(file);
    expect(path.basename(file)).toBe("bravo_cache.json");
    expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual({
      "a.com.": { address: "1.2.3.4", observedAt: t1 },
    });
    expect(fs.readdirSync(cacheDir)).toEqual(["bravo_cache.json"]);
  });

  test("starts empty without warning when there is no snapshot", async () => {
    const store = openStore();
    await store.load();

    expect(store.size).toBe(0);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test("starts empty when the snapshot is not valid JSON", async () => {
    fs.writeFileSync(snapshotFileFor(cacheDir, "alpha"), '{"a.com.": {"addr');

    const store = openStore();
    await store.load();

    expect(store.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringContaining("snapshot is not valid JSON"),
      { label: "CacheStore", code: "CACHE_LOAD" }
    );
  });

  test("starts empty when the snapshot has the wrong shape", async () => {
    fs.writeFileSync(
      snapshotFileFor(cacheDir, "alpha"),
      JSON.stringify({
        "a.com.": { address: "1.2.3.4", observedAt: "yesterday" },
      })
    );

    const store = openStore();
    await store.load();

    expect(store.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  test("skips snapshot keys that are not valid domains", async () => {
    fs.writeFileSync(
      snapshotFileFor(cacheDir, "alpha"),
      JSON.stringify({
        "": { address: "1.2.3.4", observedAt: t1 },
        "b.com.": { address: "5.6.7.8", observedAt: t2 },
      })
    );

    const store = openStore();
    await store.load();

    expect(store.size).toBe(1);
    expect(store.get("b.com")?.address).toBe("5.6.7.8");
  });

  test("keeps the in-memory entry when the snapshot can't be written", async () => {
    const blocker = path.join(cacheDir, "blocker");
    fs.writeFileSync(blocker, "");
    const store = new CacheStore({
      clientId: "alpha",
      cacheDir: blocker,
      logger,
    });

    await expect(store.put("a.com", "1.2.3.4", t1)).resolves.toBeUndefined();

    expect(store.get("a.com")?.address).toBe("1.2.3.4");
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith(
      expect.stringContaining("Failed to persist DNS cache to"),
      { label: "CacheStore", code: "CACHE_PERSIST" }
    );
  });

  test("persists every entry when puts overlap", async () => {
    const store = openStore();
    await Promise.all([
      store.put("a.com", "1.2.3.4", t1),
      store.put("b.com", "5.6.7.8", t2),
      store.put("c.com", "9.9.9.9", t2),
    ]);

    const reloaded = openStore();
    await reloaded.load();
    expect(reloaded.entries().map((entry) => entry.domain).sort()).toEqual([
      "a.com.",
      "b.com.",
      "c.com.",
    ]);
  });

  test("persists deletes and clears", async () => {
    const store = openStore();
    await store.put("a.com", "1.2.3.4", t1);
    await store.put("b.com", "5.6.7.8", t2);

    expect(await store.delete("a.com")).toBe(true);
    expect(await store.delete("missing.com")).toBe(false);

    let reloaded = openStore();
    await reloaded.load();
    expect(reloaded.get("a.com")).toBeUndefined();
    expect(reloaded.get("b.com")?.address).toBe("5.6.7.8");

    await store.clear();
    reloaded = openStore();
    await reloaded.load();
    expect(reloaded.size).toBe(0);
  });

  test("peeks without changing which entry is evicted next", async () => {
    const store = openStore("alpha", 2);
    await store.put("a.com", "1.1.1.1", t1);
    await store.put("b.com", "2.2.2.2", t1);

    expect(store.peek("A.com.")?.address).toBe("1.1.1.1");
    await store.put("c.com", "3.3.3.3", t1);

    expect(store.peek("a.com")).toBeUndefined();
    expect(store.peek("b.com")?.address).toBe("2.2.2.2");
  });

  test("writes the snapshot from least to most recently used", async () => {
    const store = openStore();
    await store.put("a.com", "1.1.1.1", t1);
    await store.put("b.com", "2.2.2.2", t1);
    store.get("a.com");
    await store.put("c.com", "3.3.3.3", t1);

    const persisted: unknown = JSON.parse(fs.readFileSync(store.file, "utf8"));
    expect(Object.keys(persisted ?? {})).toEqual([
      "b.com.",
      "a.com.",
      "c.com.",
    ]);
  });

  test("evicts the least recently used entry beyond the entry limit", async () => {
    const store = openStore("alpha", 2);
    await store.put("a.com", "1.1.1.1", t1);
    await store.put("b.com", "2.2.2.2", t1);
    store.get("a.com");
    await store.put("c.com", "3.3.3.3", t1);

    expect(store.maxEntries).toBe(2);
    expect(store.size).toBe(2);
    expect(store.get("b.com")).toBeUndefined();
    expect(store.get("a.com")?.address).toBe("1.1.1.1");
    expect(store.get("c.com")?.address).toBe("3.3.3.3");
  });
});
