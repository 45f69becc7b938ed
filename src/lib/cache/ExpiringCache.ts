import NodeCache from 'node-cache';
import logger from '../../utils/logger';

export interface ExpiringCacheOptions {
  ttlSeconds: number;
  maxEntries: number;
}

/**
 * TTL cache with a size bound and in-flight request sharing.
 *
 * Values are stored by reference, so repeated reads within the TTL
 * return the same object. Expired entries are dropped lazily on access;
 * no background check timer is started. When the cache is full the
 * entry closest to expiry makes room for the new one.
 */
export class ExpiringCache<T> {
  private readonly cache: NodeCache;

  private readonly pending = new Map<string, Promise<T>>();

  constructor(
    private readonly name: string,
    private readonly options: ExpiringCacheOptions,
  ) {
    this.cache = new NodeCache({
      stdTTL: options.ttlSeconds,
      checkperiod: 0,
      useClones: false,
    });
  }

  get(key: string): T | undefined {
    return this.cache.get<T>(key);
  }

  set(key: string, value: T): void {
    if (!this.cache.has(key) && this.size() >= this.options.maxEntries) {
      this.evictSoonestExpiring();
    }
    this.cache.set(key, value);
  }

  /**
   * Returns the cached value or runs `loader` once, sharing the pending
   * promise with concurrent callers for the same key.
   */
  async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      logger.debug('Reusing pending cache load', { cache: this.name, key });
      return inFlight;
    }

    const load = loader()
      .then((value) => {
        this.set(key, value);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, load);
    return load;
  }

  /**
   * Live entry count. Reading each TTL also purges expired keys.
   */
  size(): number {
    return this.cache.keys().filter((key) => this.cache.getTtl(key) !== undefined).length;
  }

  private evictSoonestExpiring(): void {
    let victim: string | null = null;
    let victimExpiry = Number.POSITIVE_INFINITY;

    for (const key of this.cache.keys()) {
      const expiresAt = this.cache.getTtl(key);
      if (expiresAt !== undefined && expiresAt < victimExpiry) {
        victim = key;
        victimExpiry = expiresAt;
      }
    }

    if (victim !== null) {
      this.cache.del(victim);
      logger.debug('Evicted cache entry to stay within bounds', {
        cache: this.name,
        key: victim,
        maxEntries: this.options.maxEntries,
      });
    }
  }
}

export default ExpiringCache;
