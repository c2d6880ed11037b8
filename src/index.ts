export {
  CacheStore,
  snapshotFileFor,
  type CacheStoreOptions,
} from "./cacheStore";
export {
  Client,
  type ClientOptions,
  type CreateClientOptions,
  type PeerDirectory,
} from "./client";
export {
  loadConfig,
  parseConfig,
  resolveConfigPath,
  type ClientConfig,
  type Config,
} from "./config";
export { normalizeDomain } from "./domain";
export {
  CacheLoadError,
  CachePersistError,
  ConfigError,
  PeerCacheError,
  UpstreamResolutionFailure,
  type ResolutionFailureReason,
} from "./errors";
export { Group } from "./group";
export { GroupManager, type GroupManagerOptions } from "./groupManager";
export { createLogger, type LogLevel } from "./logger";
export { ResolverPool, type ResolverPoolOptions } from "./pool";
export {
  DnsProtocolServer,
  type DnsQuery,
  type QueryHandler,
} from "./server";
export {
  CACHE_TTL_MS,
  GROUP_SIZE,
  type CacheEntry,
  type ClientStats,
  type DnsAnswer,
  type DnsEntries,
  type DnsEntry,
  type Logger,
  type QueryContext,
} from "./types";
export {
  DnsUpstreamResolver,
  withRetry,
  type RetryOptions,
  type UpstreamResolver,
} from "./upstream";
