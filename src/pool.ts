import { Client } from "./client";
import type { Config } from "./config";
import { GroupManager } from "./groupManager";
import { getDefaultLogger } from "./logger";
import {
  DnsUpstreamResolver,
  withRetry,
  type UpstreamResolver,
} from "./upstream";
import type {
  ClientStats,
  Clock,
  DnsAnswer,
  Logger,
  QueryContext,
} from "./types";

export interface ResolverPoolOptions {
  upstream?: UpstreamResolver;
  groupSize?: number;
  clock?: Clock;
  logger?: Logger;
}

/**
 * The running topology: every configured client, grouped, plus the routing
 * that picks which client serves an inbound query.
 */
export class ResolverPool {
  readonly manager: GroupManager;
  private defaultClient: Client;
  private clientsByAddress: Map<string, Client>;
  private logger: Logger;

  private constructor(
    manager: GroupManager,
    defaultClient: Client,
    clientsByAddress: Map<string, Client>,
    logger: Logger
  ) {
    this.manager = manager;
    this.defaultClient = defaultClient;
    this.clientsByAddress = clientsByAddress;
    this.logger = logger;
  }

  /** Creates each configured client, loads its cache and assigns it a group. */
  static async create(
    config: Config,
    {
      upstream,
      groupSize,
      clock,
      logger = getDefaultLogger(),
    }: ResolverPoolOptions = {}
  ): Promise<ResolverPool> {
    const resolver = withRetry(
      upstream ??
        new DnsUpstreamResolver({
          timeoutMs: config.upstreamTimeoutMs,
          logger,
        }),
      { maxRetries: config.upstreamRetries, logger }
    );

    const manager = new GroupManager({ groupSize, logger });
    const clientsByAddress = new Map<string, Client>();

    const clients = await Promise.all(
      config.clients.map((clientConfig) =>
        Client.create({
          id: clientConfig.id,
          upstreamEndpoint: clientConfig.upstreamEndpoint,
          upstream: resolver,
          cacheDir: config.cacheDir,
          cacheMaxEntries: config.cacheMaxEntries,
          clock,
          logger,
        })
      )
    );

    // assigned in config order so membership doesn't depend on load timing
    clients.forEach((client, index) => {
      manager.assign(client);
      for (const address of config.clients[index]?.addresses ?? []) {
        if (clientsByAddress.has(address)) {
          logger.warn(`Address ${address} is claimed by more than one client`, {
            label: "ResolverPool",
            client: client.id,
          });
          continue;
        }
        clientsByAddress.set(address, client);
      }
    });

    const [defaultClient] = clients;
    if (!defaultClient) {
      throw new RangeError("A resolver pool needs at least one client");
    }

    logger.info(`All ${clients.length} clients added`, {
      label: "ResolverPool",
      groups: manager.groups.length,
    });
    return new ResolverPool(manager, defaultClient, clientsByAddress, logger);
  }

  /**
   * Picks the serving client: explicit id, then source address, then the
   * first configured client.
   */
  clientFor(context: QueryContext = {}): Client {
    if (context.clientId !== undefined) {
      const client = this.manager.getClient(context.clientId);
      if (client) {
        return client;
      }
      this.logger.debug(`Unknown client ${context.clientId}, using default`, {
        label: "ResolverPool",
      });
    }

    if (context.sourceAddress !== undefined) {
      const client = this.clientsByAddress.get(context.sourceAddress);
      if (client) {
        return client;
      }
    }

    return this.defaultClient;
  }

  resolve(domain: string, context?: QueryContext): Promise<string> {
    return this.clientFor(context).resolve(domain);
  }

  answer(domain: string, context?: QueryContext): Promise<DnsAnswer> {
    return this.clientFor(context).answer(domain);
  }

  getStats(): Record<string, ClientStats> {
    const stats: Record<string, ClientStats> = {};
    for (const client of this.manager.clients()) {
      stats[client.id] = client.getStats();
    }
    return stats;
  }
}
