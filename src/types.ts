export interface Logger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
}

export type Clock = () => number;

/** Entries older than this are stale. */
export const CACHE_TTL_MS = 60 * 60 * 1000;

export const GROUP_SIZE = 15;

export const DEFAULT_CACHE_MAX_ENTRIES = 500;

export interface CacheEntry {
  domain: string;
  address: string;
  /** Epoch milliseconds of the resolution that produced this address. */
  observedAt: number;
}

export type CacheSnapshot = Record<
  string,
  { address: string; observedAt: number }
>;

export type DnsEntry = {
  address: string;
  observedAt: number;
  age: number;
  ttl: number;
  fresh: boolean;
};

export type DnsEntries = Record<string, DnsEntry>;

export interface ClientStats {
  size: number;
  cacheMaxEntries: number;
  localHits: number;
  peerHits: number;
  upstreamResolutions: number;
  failures: number;
  hitRate: number;
}

/** Where an inbound query came from, used to pick the client that serves it. */
export interface QueryContext {
  clientId?: string;
  sourceAddress?: string;
}

/** An address together with how many more seconds it stays fresh. */
export interface DnsAnswer {
  address: string;
  ttlSeconds: number;
}
