export type PeerCacheErrorCode =
  | "CACHE_LOAD"
  | "CACHE_PERSIST"
  | "UPSTREAM_RESOLUTION"
  | "CONFIG";

export class PeerCacheError extends Error {
  readonly code: PeerCacheErrorCode;

  constructor(
    code: PeerCacheErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The snapshot file could not be read or parsed. Always recovered as an
 * empty cache.
 */
export class CacheLoadError extends PeerCacheError {
  constructor(
    readonly file: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      "CACHE_LOAD",
      `Failed to load DNS cache from ${file}: ${reason}`,
      options
    );
  }
}

export class CachePersistError extends PeerCacheError {
  constructor(
    readonly file: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      "CACHE_PERSIST",
      `Failed to persist DNS cache to ${file}: ${reason}`,
      options
    );
  }
}

export type ResolutionFailureReason =
  | "invalid-domain"
  | "upstream-error"
  | "timeout"
  | "no-address";

export class UpstreamResolutionFailure extends PeerCacheError {
  constructor(
    readonly domain: string,
    readonly reason: ResolutionFailureReason,
    message: string,
    readonly endpoint?: string,
    options?: { cause?: unknown }
  ) {
    super("UPSTREAM_RESOLUTION", message, options);
  }
}

export class ConfigError extends PeerCacheError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
  }
}

// errors raised inside Node's built-ins may come from another realm, so these
// check the shape rather than `instanceof Error`
export function errorMessage(error: unknown): string {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}

/** The `code` property of a system error, if there is one. */
export function errorCode(error: unknown): unknown {
  return typeof error === "object" && error !== null && "code" in error
    ? error.code
    : undefined;
}
