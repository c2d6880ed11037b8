import { LRUCache } from "lru-cache";
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { normalizeDomain } from "./domain";
import {
  CacheLoadError,
  CachePersistError,
  errorCode,
  errorMessage,
} from "./errors";
import { getDefaultLogger } from "./logger";
import {
  CACHE_TTL_MS,
  DEFAULT_CACHE_MAX_ENTRIES,
  type CacheEntry,
  type CacheSnapshot,
  type Logger,
} from "./types";

const snapshotSchema = z.record(
  z.string(),
  z.object({
    address: z.string().min(1),
    observedAt: z.number().finite(),
  })
);

export interface CacheStoreOptions {
  clientId: string;
  cacheDir: string;
  cacheMaxEntries?: number;
  ttlMs?: number;
  logger?: Logger;
}

export function snapshotFileFor(cacheDir: string, clientId: string): string {
  return path.join(cacheDir, `${clientId}_cache.json`);
}

/**
 * A single client's domain -> address cache, persisted as a full JSON
 * snapshot after every mutation. Keys are normalized fully-qualified names.
 */
export class CacheStore {
  readonly file: string;
  readonly ttlMs: number;
  private cache: LRUCache<string, CacheEntry>;
  private logger: Logger;
  private writeChain: Promise<void> = Promise.resolve();
  private queuedWrite: Promise<void> | null = null;

  constructor({
    clientId,
    cacheDir,
    cacheMaxEntries = DEFAULT_CACHE_MAX_ENTRIES,
    ttlMs = CACHE_TTL_MS,
    logger = getDefaultLogger(),
  }: CacheStoreOptions) {
    this.file = snapshotFileFor(cacheDir, clientId);
    this.ttlMs = ttlMs;
    this.cache = new LRUCache<string, CacheEntry>({ max: cacheMaxEntries });
    this.logger = logger;
  }

  get size(): number {
    return this.cache.size;
  }

  get maxEntries(): number {
    return this.cache.max;
  }

  get(domain: string): CacheEntry | undefined {
    const key = normalizeDomain(domain);
    return key === null ? undefined : this.cache.get(key);
  }

  /** Reads an entry without touching its recency, for peers and inspection. */
  peek(domain: string): CacheEntry | undefined {
    const key = normalizeDomain(domain);
    return key === null ? undefined : this.cache.peek(key);
  }

  isFresh(entry: CacheEntry, now: number): boolean {
    return now - entry.observedAt < this.ttlMs;
  }

  /**
   * Records `address` for `domain` as observed at `observedAt` and writes the
   * snapshot. Resolves once the write has finished or failed; it never rejects.
   */
  put(domain: string, address: string, observedAt: number): Promise<void> {
    const key = normalizeDomain(domain);
    if (key === null) {
      throw new TypeError(`Refusing to cache unqualified domain "${domain}"`);
    }

    this.cache.set(key, { domain: key, address, observedAt });
    return this.save();
  }

  delete(domain: string): Promise<boolean> {
    const key = normalizeDomain(domain);
    if (key === null || !this.cache.delete(key)) {
      return Promise.resolve(false);
    }
    return this.save().then(() => true);
  }

  clear(): Promise<void> {
    this.cache.clear();
    return this.save();
  }

  entries(): CacheEntry[] {
    return [...this.cache.values()];
  }

  toSnapshot(): CacheSnapshot {
    const snapshot: CacheSnapshot = {};
    // least- to most-recently used, so a reload keeps LRU order
    for (const entry of [...this.cache.values()].reverse()) {
      snapshot[entry.domain] = {
        address: entry.address,
        observedAt: entry.observedAt,
      };
    }
    return snapshot;
  }

  /**
   * Replaces the in-memory map with the snapshot on disk. A missing or
   * corrupt snapshot leaves the cache empty.
   */
  async load(): Promise<void> {
    this.cache.clear();

    let raw: string;
    try {
      raw = await fs.readFile(this.file, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug(`No DNS cache snapshot at ${this.file}`, {
          label: "CacheStore",
        });
      } else {
        this.reportLoadFailure(
          new CacheLoadError(this.file, errorMessage(error), { cause: error })
        );
      }
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.reportLoadFailure(
        new CacheLoadError(this.file, "snapshot is not valid JSON", {
          cause: error,
        })
      );
      return;
    }

    const result = snapshotSchema.safeParse(parsed);
    if (!result.success) {
      this.reportLoadFailure(
        new CacheLoadError(
          this.file,
          result.error.issues[0]?.message ?? "invalid snapshot"
        )
      );
      return;
    }

    let skipped = 0;
    for (const [domain, entry] of Object.entries(result.data)) {
      const { address, observedAt } = entry;
      const key = normalizeDomain(domain);
      if (key === null) {
        skipped++;
        continue;
      }
      this.cache.set(key, { domain: key, address, observedAt });
    }

    this.logger.debug(`Loaded DNS cache snapshot from ${this.file}`, {
      label: "CacheStore",
      entries: this.cache.size,
      skipped,
    });
  }

  /**
   * Writes the current map to disk. Writes are serialized; while one is
   * running at most one more is queued, and it captures the map when it starts.
   */
  save(): Promise<void> {
    if (this.queuedWrite) {
      return this.queuedWrite;
    }

    const write = this.writeChain.then(() => {
      this.queuedWrite = null;
      return this.writeSnapshot();
    });
    this.queuedWrite = write;
    this.writeChain = write;
    return write;
  }

  private async writeSnapshot(): Promise<void> {
    const data = JSON.stringify(this.toSnapshot());
    const tmpFile = `${this.file}.${process.pid}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.file), { recursive: true });
      await fs.writeFile(tmpFile, data, "utf8");
      await fs.rename(tmpFile, this.file);
    } catch (error) {
      const failure = new CachePersistError(this.file, errorMessage(error), {
        cause: error,
      });
      this.logger.error(failure.message, {
        label: "CacheStore",
        code: failure.code,
      });
    }
  }

  private reportLoadFailure(failure: CacheLoadError): void {
    this.logger.warn(`${failure.message}, starting with an empty cache`, {
      label: "CacheStore",
      code: failure.code,
    });
  }
}

function isNotFound(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}
