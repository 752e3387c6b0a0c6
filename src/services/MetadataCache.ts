import NodeCache from 'node-cache';
import type { AircraftMetadata, CacheEntry } from '../types/Aircraft';
import { normalizeAircraftId } from '../utils/aircraftId';
import { InvalidInputError } from '../utils/errors';
import { createLogger } from '../utils/logger';

export interface MetadataCacheOptions {
  defaultTtlMs?: number;
}

export interface MetadataCacheStats {
  entries: number;
  hits: number;
  misses: number;
  expired: number;
  sets: number;
  hitRate: number; // percent, two decimals
}

/**
 * Aircraft metadata keyed by ICAO24 with lazy TTL expiry.
 *
 * Expiry is only evaluated on read; nothing sweeps in the background and
 * nothing is evicted by size, so the cache grows with the number of distinct
 * aircraft seen during the process lifetime.
 *
 * There is a single writer (the enrichment step). Entries are frozen and
 * replaced wholesale on `put`, so a reader such as the status API can never
 * observe a half-written entry.
 */
export class MetadataCache {
  static readonly DEFAULT_TTL_MS = 30 * 24 * 60 * 60 * 1000; // 30 days

  private readonly logger = createLogger({ component: 'MetadataCache' });
  private readonly cache: NodeCache;
  private readonly defaultTtlMs: number;
  private counters = {
    expired: 0,
    sets: 0,
  };

  constructor(options: MetadataCacheOptions = {}) {
    this.defaultTtlMs = options.defaultTtlMs ?? MetadataCache.DEFAULT_TTL_MS;
    assertTtl(this.defaultTtlMs);

    // No check period: expired keys are dropped when they are next read
    this.cache = new NodeCache({
      stdTTL: this.defaultTtlMs / 1000,
      checkperiod: 0,
      useClones: false,
    });

    this.cache.on('set', () => {
      this.counters.sets++;
    });

    this.cache.on('expired', (key: NodeCache.Key) => {
      this.counters.expired++;
      this.logger.debug({ id: key }, 'Cached metadata expired');
    });
  }

  /**
   * Get metadata for an aircraft, or undefined on a miss or an expired entry
   */
  get(id: string): AircraftMetadata | undefined {
    return this.cache.get<CacheEntry>(normalizeAircraftId(id))?.metadata;
  }

  /**
   * Store metadata, overwriting any existing entry
   */
  put(id: string, metadata: AircraftMetadata, ttlMs: number = this.defaultTtlMs): void {
    assertTtl(ttlMs);

    const entry: CacheEntry = Object.freeze({
      metadata: Object.freeze({ ...metadata }),
      expiresAt: Date.now() + ttlMs,
    });

    this.cache.set(normalizeAircraftId(id), entry, ttlMs / 1000);
  }

  /**
   * Check for a live entry without touching hit/miss statistics
   */
  has(id: string): boolean {
    return this.cache.has(normalizeAircraftId(id));
  }

  get size(): number {
    return this.cache.keys().length;
  }

  getStats(): MetadataCacheStats {
    const { keys, hits, misses } = this.cache.getStats();
    const lookups = hits + misses;
    const hitRate = lookups > 0 ? (hits / lookups) * 100 : 0;

    return {
      entries: keys,
      hits,
      misses,
      ...this.counters,
      hitRate: Math.round(hitRate * 100) / 100,
    };
  }

  /**
   * Drop every entry and reset statistics
   */
  clear(): void {
    this.cache.flushAll();
    this.counters = { expired: 0, sets: 0 };
    this.logger.info('Metadata cache cleared');
  }

  /**
   * Release the underlying store
   */
  close(): void {
    this.cache.close();
  }
}

function assertTtl(ttlMs: number): void {
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new InvalidInputError(`Cache TTL must be a positive number of milliseconds, got ${ttlMs}`);
  }
}
