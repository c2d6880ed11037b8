import dns from "node:dns";
import { toHostname } from "./domain";
import {
  UpstreamResolutionFailure,
  errorCode,
  errorMessage,
  type ResolutionFailureReason,
} from "./errors";
import { getDefaultLogger } from "./logger";
import type { Logger } from "./types";

/**
 * The query path of the DNS protocol service: ask `endpoint` once for an
 * address of `domain`. Rejects with an UpstreamResolutionFailure.
 */
export interface UpstreamResolver {
  resolve(domain: string, endpoint: string): Promise<string>;
}

/** The part of `dns.promises.Resolver` used for upstream queries. */
export interface Resolve4Client {
  setServers(servers: readonly string[]): void;
  resolve4(hostname: string): Promise<string[]>;
}

export interface DnsUpstreamResolverOptions {
  timeoutMs?: number;
  logger?: Logger;
  createResolver?: (options: dns.ResolverOptions) => Resolve4Client;
}

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 5000;

export class DnsUpstreamResolver implements UpstreamResolver {
  private resolvers = new Map<string, Resolve4Client>();
  private timeoutMs: number;
  private logger: Logger;
  private createResolver: (options: dns.ResolverOptions) => Resolve4Client;

  constructor({
    timeoutMs = DEFAULT_UPSTREAM_TIMEOUT_MS,
    logger = getDefaultLogger(),
    createResolver = (options) => new dns.promises.Resolver(options),
  }: DnsUpstreamResolverOptions = {}) {
    this.timeoutMs = timeoutMs;
    this.logger = logger;
    this.createResolver = createResolver;
  }

  async resolve(domain: string, endpoint: string): Promise<string> {
    const hostname = toHostname(domain);

    let addresses: string[];
    try {
      addresses = await this.resolverFor(endpoint).resolve4(hostname);
    } catch (error) {
      const reason = failureReason(error);
      this.logger.debug(`Upstream lookup failed for ${hostname}`, {
        label: "Upstream",
        endpoint,
        reason,
        error: errorMessage(error),
      });
      throw new UpstreamResolutionFailure(
        domain,
        reason,
        `DNS lookup failed for ${hostname} via ${endpoint}: ` +
          errorMessage(error),
        endpoint,
        { cause: error }
      );
    }

    const [address] = addresses;
    if (address === undefined) {
      throw new UpstreamResolutionFailure(
        domain,
        "no-address",
        `No A record found for ${hostname} via ${endpoint}`,
        endpoint
      );
    }

    this.logger.debug(`Resolved ${hostname} upstream`, {
      label: "Upstream",
      endpoint,
      address,
    });
    return address;
  }

  private resolverFor(endpoint: string): Resolve4Client {
    const existing = this.resolvers.get(endpoint);
    if (existing) {
      return existing;
    }

    const resolver = this.createResolver({ timeout: this.timeoutMs, tries: 1 });
    resolver.setServers([endpoint]);
    this.resolvers.set(endpoint, resolver);
    return resolver;
  }
}

function failureReason(error: unknown): ResolutionFailureReason {
  switch (errorCode(error)) {
    case dns.TIMEOUT:
      return "timeout";
    case dns.NOTFOUND:
    case dns.NODATA:
      return "no-address";
    default:
      return "upstream-error";
  }
}

export interface RetryOptions {
  maxRetries: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export function retryBackoff(attempt: number): number {
  return Math.min(100 * Math.pow(2, attempt), 2000);
}

/**
 * Wraps a resolver so transient failures (timeouts, server errors) are
 * retried with exponential backoff. Missing records are not retried.
 */
export function withRetry(
  resolver: UpstreamResolver,
  {
    maxRetries,
    logger = getDefaultLogger(),
    sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  }: RetryOptions
): UpstreamResolver {
  if (maxRetries <= 0) {
    return resolver;
  }

  return {
    async resolve(domain, endpoint) {
      for (let attempt = 0; ; attempt++) {
        try {
          return await resolver.resolve(domain, endpoint);
        } catch (error) {
          const retryable =
            !(error instanceof UpstreamResolutionFailure) ||
            error.reason === "timeout" ||
            error.reason === "upstream-error";
          if (attempt >= maxRetries || !retryable) {
            throw error;
          }

          const backoff = retryBackoff(attempt);
          logger.debug(
            `DNS lookup failed for ${domain}, retrying ` +
              `(${attempt + 1}/${maxRetries}) after ${backoff}ms`,
            {
              label: "Upstream",
              endpoint,
              error: errorMessage(error),
            }
          );
          await sleep(backoff);
        }
      }
    },
  };
}
