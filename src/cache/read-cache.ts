/**
 * In-process TTL cache for graph reads
 * Entries of one bot share the key prefix `bot:<id>:` so a write can drop
 * all of them at once
 */

import { createHash } from 'crypto';
import { silentLogger, type Logger } from '../logger';

export type CacheLookup<V> = { found: true; value: V } | { found: false };

type Entry<V> = { value: V; expiresAt: number };

export type ReadCacheOptions = {
  /** Clock in milliseconds */
  now?: () => number;
  logger?: Logger;
};

/**
 * JSON serialization with object keys sorted at every level
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, current: unknown) => {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return current;
    }
    return Object.fromEntries(
      Object.entries(current).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    );
  });
}

/**
 * Deterministic key: the namespace plus an md5 of the arguments
 */
export function cacheKey(namespace: string, ...args: unknown[]): string {
  const digest = createHash('md5').update(stableStringify(args)).digest('hex');
  return `${namespace}:${digest}`;
}

export function botCachePrefix(botId: number): string {
  return `bot:${botId}:`;
}

export function botCacheKey(botId: number, view: string): string {
  return `${botCachePrefix(botId)}${view}`;
}

export class ReadCache<V = unknown> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly generations = new Map<number, number>();
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: ReadCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  set(key: string, value: V, ttlSeconds: number): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  /**
   * Expired entries are evicted on read and reported as not found
   */
  get(key: string): CacheLookup<V> {
    const entry = this.entries.get(key);
    if (!entry) return { found: false };
    if (this.now() > entry.expiresAt) {
      this.entries.delete(key);
      this.logger.debug('Cache entry expired', { key });
      return { found: false };
    }
    return { found: true, value: entry.value };
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * @returns Number of entries removed
   */
  clearByPrefix(prefix: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Counter bumped by every `invalidateBot`. A load that captured it
   * beforehand can tell whether a write committed while it ran.
   */
  generation(botId: number): number {
    return this.generations.get(botId) ?? 0;
  }

  /**
   * Store a value loaded under `generation`, unless the bot was
   * invalidated since
   * @returns Whether the value was stored
   */
  setIfCurrent(
    botId: number,
    generation: number,
    key: string,
    value: V,
    ttlSeconds: number
  ): boolean {
    if (this.generation(botId) !== generation) {
      this.logger.debug('Discarding a load that raced a write', { botId, key });
      return false;
    }
    this.set(key, value, ttlSeconds);
    return true;
  }

  invalidateBot(botId: number): number {
    this.generations.set(botId, this.generation(botId) + 1);
    const removed = this.clearByPrefix(botCachePrefix(botId));
    this.logger.debug('Bot cache invalidated', { botId, removed });
    return removed;
  }

  async getOrLoad(
    key: string,
    ttlSeconds: number,
    loader: () => Promise<V>
  ): Promise<{ value: V; hit: boolean }> {
    const cached = this.get(key);
    if (cached.found) return { value: cached.value, hit: true };

    const value = await loader();
    this.set(key, value, ttlSeconds);
    return { value, hit: false };
  }

  get size(): number {
    return this.entries.size;
  }
}
