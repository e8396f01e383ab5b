/**
 * Bounded LRU cache with per-entry TTL.
 *
 * Entries live in a Map whose iteration order is recency order: a hit
 * re-inserts the key at the tail, so the head is always the
 * least-recently-used entry. Expired entries are dropped on access and by
 * sweep(); they are never returned.
 *
 * The cache never loads anything itself. Callers fetch from the
 * authoritative snapshot on a miss and call put().
 */

/** A cached value, or a marker that the key is known to be absent */
interface CacheEntry<V> {
  value: V | typeof NEGATIVE
  /** Absolute timestamp (ms) when this entry was inserted or refreshed */
  insertedAt: number
  /** Absolute timestamp (ms) of the last hit or insert */
  lastAccessedAt: number
  /** Absolute timestamp (ms) when this entry expires */
  expiresAt: number
}

const NEGATIVE: unique symbol = Symbol('negative-cache-entry')

export type CacheLookup<V> =
  | { status: 'hit'; value: V }
  | { status: 'negative' }
  | { status: 'miss' }

export interface CacheStats {
  size: number
  capacity: number
  hits: number
  misses: number
  evictions: number
  expirations: number
  /** hits / (hits + misses) as a percentage, two decimals */
  hitRate: number
}

export interface LruTtlCacheOptions {
  capacity: number
  ttlMs: number
  getNow?: () => number
}

export class LruTtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>()
  private readonly capacity: number
  private readonly ttlMs: number
  private readonly getNow: () => number

  private hits = 0
  private misses = 0
  private evictions = 0
  private expirations = 0

  constructor(options: LruTtlCacheOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 0) {
      throw new RangeError(`Cache capacity must be a non-negative integer, got ${options.capacity}`)
    }
    if (!(options.ttlMs > 0)) {
      throw new RangeError(`Cache TTL must be positive, got ${options.ttlMs}`)
    }
    this.capacity = options.capacity
    this.ttlMs = options.ttlMs
    this.getNow = options.getNow ?? Date.now
  }

  /**
   * Look up a key. A live entry becomes most-recently-used; an expired one
   * is evicted and reported as a miss.
   */
  get(key: string): CacheLookup<V> {
    const entry = this.entries.get(key)
    if (!entry) {
      this.misses++
      return { status: 'miss' }
    }

    const now = this.getNow()
    if (entry.expiresAt <= now) {
      this.entries.delete(key)
      this.expirations++
      this.misses++
      return { status: 'miss' }
    }

    entry.lastAccessedAt = now
    this.entries.delete(key)
    this.entries.set(key, entry)
    this.hits++

    return entry.value === NEGATIVE ? { status: 'negative' } : { status: 'hit', value: entry.value }
  }

  /** Insert or refresh a value; expiry restarts at now + TTL. */
  put(key: string, value: V): void {
    this.insert(key, value)
  }

  /** Remember that a key does not exist, so repeated lookups skip the snapshot. */
  putNegative(key: string): void {
    this.insert(key, NEGATIVE)
  }

  /** Remove a key. Returns true if an entry was present. */
  invalidate(key: string): boolean {
    return this.entries.delete(key)
  }

  /** Remove every expired entry; returns how many were removed. */
  sweep(): number {
    const now = this.getNow()
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key)
        removed++
      }
    }
    this.expirations += removed
    return removed
  }

  clear(): void {
    this.entries.clear()
  }

  has(key: string): boolean {
    const entry = this.entries.get(key)
    return entry !== undefined && entry.expiresAt > this.getNow()
  }

  get size(): number {
    return this.entries.size
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
      hitRate: lookups === 0 ? 0 : Math.round((this.hits / lookups) * 10_000) / 100,
    }
  }

  private insert(key: string, value: V | typeof NEGATIVE): void {
    if (this.capacity === 0) return

    const now = this.getNow()
    const entry: CacheEntry<V> = {
      value,
      insertedAt: now,
      lastAccessedAt: now,
      expiresAt: now + this.ttlMs,
    }

    if (this.entries.delete(key)) {
      this.entries.set(key, entry)
      return
    }

    if (this.entries.size >= this.capacity) {
      this.sweep()
    }
    while (this.entries.size >= this.capacity) {
      this.evictLeastRecentlyUsed()
    }
    this.entries.set(key, entry)
  }

  /**
   * Evict the entry with the oldest last-access time. Entries sharing that
   * time form a prefix of the Map; among them the earliest insertion loses,
   * and recency order settles any remaining tie.
   */
  private evictLeastRecentlyUsed(): void {
    let victimKey: string | undefined
    let victim: CacheEntry<V> | undefined

    for (const [key, entry] of this.entries) {
      if (victim === undefined) {
        victimKey = key
        victim = entry
        continue
      }
      if (entry.lastAccessedAt !== victim.lastAccessedAt) break
      if (entry.insertedAt < victim.insertedAt) {
        victimKey = key
        victim = entry
      }
    }

    if (victimKey !== undefined) {
      this.entries.delete(victimKey)
      this.evictions++
    }
  }
}
