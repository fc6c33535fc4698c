import { LRUCache } from 'lru-cache';
import { config } from './config.js';
import { logger } from './logging/index.js';

// ============================================
// PER-RESOLVER CANDIDATE CACHE
// ============================================

/**
 * Candidate lists keyed by scope (`all`, `board:<id>`, `id:<id>`, ...).
 *
 * One instance belongs to one resolver and lives as long as it does, so a
 * command that resolves several identifiers against the same scope fetches
 * that scope once. Single-entity lookups are stored as a list of zero or one
 * entries so a miss is remembered too. Entries never expire.
 */
export class ResolverCache<T> {
  private entries: LRUCache<string, T[]>;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly name: string,
    max: number = config.FAVRO_RESOLVER_CACHE_SIZE
  ) {
    this.entries = new LRUCache<string, T[]>({ max });
  }

  get(key: string): T[] | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    logger.debug(`Cache hit: ${this.name} (${key})`, { size: entry.length }, 'resolver-cache');
    return entry;
  }

  set(key: string, data: T[]): void {
    this.entries.set(key, data);
    logger.debug(`Cached ${this.name}: ${data.length} items (${key})`, undefined, 'resolver-cache');
  }

  async getOrLoad(key: string, load: () => Promise<T[]>): Promise<T[]> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const data = await load();
    this.set(key, data);
    return data;
  }

  clear(): void {
    this.entries.clear();
  }

  getStats() {
    return {
      name: this.name,
      size: this.entries.size,
      max: this.entries.max,
      hits: this.hits,
      misses: this.misses,
    };
  }
}
