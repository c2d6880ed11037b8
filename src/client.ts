import { CacheStore } from "./cacheStore";
import { normalizeDomain } from "./domain";
import { UpstreamResolutionFailure } from "./errors";
import { getDefaultLogger } from "./logger";
import type { UpstreamResolver } from "./upstream";
import type {
  CacheEntry,
  ClientStats,
  Clock,
  DnsAnswer,
  DnsEntries,
  DnsEntry,
  Logger,
} from "./types";

/** Looks up a group's members by id, so a client never holds its group. */
export interface PeerDirectory {
  membersOf(groupId: string): readonly Client[];
}

export interface ClientOptions {
  id: string;
  upstreamEndpoint: string;
  cache: CacheStore;
  upstream: UpstreamResolver;
  clock?: Clock;
  logger?: Logger;
}

export interface CreateClientOptions
  extends Omit<ClientOptions, "cache"> {
  cacheDir: string;
  cacheMaxEntries?: number;
}

interface Membership {
  groupId: string;
  directory: PeerDirectory;
}

interface ResolveStats {
  localHits: number;
  peerHits: number;
  upstreamResolutions: number;
  failures: number;
}

export class Client {
  readonly id: string;
  readonly upstreamEndpoint: string;
  private cache: CacheStore;
  private upstream: UpstreamResolver;
  private clock: Clock;
  private logger: Logger;
  private membership: Membership | null = null;
  private stats: ResolveStats = {
    localHits: 0,
    peerHits: 0,
    upstreamResolutions: 0,
    failures: 0,
  };

  constructor({
    id,
    upstreamEndpoint,
    cache,
    upstream,
    clock = Date.now,
    logger = getDefaultLogger(),
  }: ClientOptions) {
    this.id = id;
    this.upstreamEndpoint = upstreamEndpoint;
    this.cache = cache;
    this.upstream = upstream;
    this.clock = clock;
    this.logger = logger;
  }

  /** Builds a client and loads its cache snapshot from `cacheDir`. */
  static async create({
    cacheDir,
    cacheMaxEntries,
    ...options
  }: CreateClientOptions): Promise<Client> {
    const cache = new CacheStore({
      clientId: options.id,
      cacheDir,
      cacheMaxEntries,
      logger: options.logger,
    });
    await cache.load();
    return new Client({ ...options, cache });
  }

  get groupId(): string | undefined {
    return this.membership?.groupId;
  }

  /** Called by the group manager when this client is placed in a group. */
  joinGroup(groupId: string, directory: PeerDirectory): void {
    if (this.membership) {
      throw new Error(
        `Client ${this.id} already belongs to ${this.membership.groupId}`
      );
    }
    this.membership = { groupId, directory };
  }

  /**
   * A single read of this client's cache, as seen by a peer. It leaves the
   * entry's eviction order alone.
   */
  lookup(domain: string): CacheEntry | undefined {
    return this.cache.peek(domain);
  }

  async resolve(domain: string): Promise<string> {
    const entry = await this.resolveEntry(domain);
    return entry.address;
  }

  /** Resolves `domain` and reports how long the answer stays fresh. */
  async answer(domain: string): Promise<DnsAnswer> {
    const entry = await this.resolveEntry(domain);
    const remainingMs = entry.observedAt + this.cache.ttlMs - this.clock();
    return {
      address: entry.address,
      ttlSeconds: Math.max(1, Math.ceil(remainingMs / 1000)),
    };
  }

  /**
   * Resolves `domain` from the local cache, then from the first group peer
   * holding a fresh entry, then upstream. Rejects with an
   * UpstreamResolutionFailure only when all three come up empty.
   */
  async resolveEntry(domain: string): Promise<CacheEntry> {
    const name = normalizeDomain(domain);
    if (name === null) {
      this.stats.failures++;
      throw new UpstreamResolutionFailure(
        domain,
        "invalid-domain",
        `Cannot resolve invalid domain "${domain}"`
      );
    }

    const now = this.clock();

    const local = this.cache.get(name);
    if (local && this.cache.isFresh(local, now)) {
      this.stats.localHits++;
      this.logger.debug(`Domain ${name} found in cache`, {
        label: "Client",
        client: this.id,
      });
      return local;
    }

    for (const peer of this.peers()) {
      const entry = peer.lookup(name);
      if (entry && this.cache.isFresh(entry, now)) {
        this.stats.peerHits++;
        this.logger.debug(`Domain ${name} found in peer cache`, {
          label: "Client",
          client: this.id,
          peer: peer.id,
        });
        // keep the peer's observation time so the copy expires with its source
        await this.cache.put(name, entry.address, entry.observedAt);
        return entry;
      }
    }

    let address: string;
    try {
      address = await this.upstream.resolve(name, this.upstreamEndpoint);
    } catch (error) {
      this.stats.failures++;
      throw error instanceof UpstreamResolutionFailure
        ? error
        : new UpstreamResolutionFailure(
            name,
            "upstream-error",
            `DNS lookup failed for ${name}`,
            this.upstreamEndpoint,
            { cause: error }
          );
    }

    this.stats.upstreamResolutions++;
    const observedAt = this.clock();
    await this.cache.put(name, address, observedAt);
    return { domain: name, address, observedAt };
  }

  getStats(): ClientStats {
    const hits = this.stats.localHits + this.stats.peerHits;
    const total = hits + this.stats.upstreamResolutions + this.stats.failures;
    return {
      size: this.cache.size,
      cacheMaxEntries: this.cache.maxEntries,
      ...this.stats,
      hitRate: hits / (total || 1),
    };
  }

  getCacheEntries(): DnsEntries {
    const entries: DnsEntries = {};
    const now = this.clock();
    for (const entry of this.cache.entries()) {
      entries[entry.domain] = this.describe(entry, now);
    }
    return entries;
  }

  getCacheEntry(domain: string): DnsEntry | null {
    const entry = this.cache.peek(domain);
    return entry ? this.describe(entry, this.clock()) : null;
  }

  async clearHostname(domain: string): Promise<void> {
    if (await this.cache.delete(domain)) {
      this.logger.debug(`Cleared DNS cache entry for ${domain}`, {
        label: "Client",
        client: this.id,
      });
    }
  }

  async clear(): Promise<void> {
    await this.cache.clear();
    this.stats = {
      localHits: 0,
      peerHits: 0,
      upstreamResolutions: 0,
      failures: 0,
    };
    this.logger.debug("DNS cache cleared", {
      label: "Client",
      client: this.id,
    });
  }

  private peers(): Client[] {
    if (!this.membership) {
      return [];
    }
    return this.membership.directory
      .membersOf(this.membership.groupId)
      .filter((member) => member !== this);
  }

  private describe(entry: CacheEntry, now: number): DnsEntry {
    const age = now - entry.observedAt;
    return {
      address: entry.address,
      observedAt: entry.observedAt,
      age,
      ttl: Math.max(0, this.cache.ttlMs - age),
      fresh: this.cache.isFresh(entry, now),
    };
  }
}
