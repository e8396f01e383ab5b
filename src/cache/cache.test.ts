import { describe, it, expect } from 'vitest'
import { LruTtlCache } from './lru-cache.js'

function createClock(start = 1_000) {
  let now = start
  return {
    getNow: () => now,
    advance: (ms: number) => {
      now += ms
    },
  }
}

describe('LruTtlCache', () => {
  describe('construction', () => {
    it('should reject a negative or fractional capacity', () => {
      expect(() => new LruTtlCache({ capacity: -1, ttlMs: 1000 })).toThrow(RangeError)
      expect(() => new LruTtlCache({ capacity: 1.5, ttlMs: 1000 })).toThrow(RangeError)
    })

    it('should reject a non-positive TTL', () => {
      expect(() => new LruTtlCache({ capacity: 1, ttlMs: 0 })).toThrow(RangeError)
    })
  })

  describe('get/put', () => {
    it('should return a miss for an unknown key', () => {
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 1000 })
      expect(cache.get('a')).toEqual({ status: 'miss' })
    })

    it('should return a hit for a stored value', () => {
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 1000 })
      cache.put('a', 'alpha')
      expect(cache.get('a')).toEqual({ status: 'hit', value: 'alpha' })
    })

    it('should overwrite an existing key without evicting', () => {
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 1000 })
      cache.put('a', 'one')
      cache.put('b', 'two')
      cache.put('a', 'three')
      expect(cache.size).toBe(2)
      expect(cache.get('a')).toEqual({ status: 'hit', value: 'three' })
      expect(cache.stats().evictions).toBe(0)
    })

    it('should report negative entries without a value', () => {
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 1000 })
      cache.putNegative('ghost')
      expect(cache.get('ghost')).toEqual({ status: 'negative' })
    })
  })

  describe('TTL', () => {
    it('should serve an entry until just before its expiry', () => {
      const clock = createClock()
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 500, getNow: clock.getNow })
      cache.put('a', 'alpha')
      clock.advance(499)
      expect(cache.get('a').status).toBe('hit')
    })

    it('should treat an entry as expired exactly at insertedAt + ttl', () => {
      const clock = createClock()
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 500, getNow: clock.getNow })
      cache.put('a', 'alpha')
      clock.advance(500)
      expect(cache.get('a')).toEqual({ status: 'miss' })
      expect(cache.size).toBe(0)
      expect(cache.stats().expirations).toBe(1)
    })

    it('should not extend expiry on a hit', () => {
      const clock = createClock()
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 500, getNow: clock.getNow })
      cache.put('a', 'alpha')
      clock.advance(400)
      expect(cache.get('a').status).toBe('hit')
      clock.advance(100)
      expect(cache.get('a').status).toBe('miss')
    })

    it('should restart expiry when a key is put again', () => {
      const clock = createClock()
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 500, getNow: clock.getNow })
      cache.put('a', 'alpha')
      clock.advance(400)
      cache.put('a', 'alpha')
      clock.advance(400)
      expect(cache.get('a').status).toBe('hit')
    })

    it('has() should ignore expired entries', () => {
      const clock = createClock()
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 500, getNow: clock.getNow })
      cache.put('a', 'alpha')
      expect(cache.has('a')).toBe(true)
      clock.advance(500)
      expect(cache.has('a')).toBe(false)
    })

    it('sweep() should remove only expired entries', () => {
      const clock = createClock()
      const cache = new LruTtlCache<string>({ capacity: 3, ttlMs: 500, getNow: clock.getNow })
      cache.put('old', 'x')
      cache.putNegative('old-negative')
      clock.advance(300)
      cache.put('fresh', 'y')
      clock.advance(200)

      expect(cache.sweep()).toBe(2)
      expect(cache.size).toBe(1)
      expect(cache.get('fresh').status).toBe('hit')
      expect(cache.stats().expirations).toBe(2)
    })
  })

  describe('LRU eviction', () => {
    it('should evict the least recently accessed entry (A, B, get A, put C evicts B)', () => {
      const clock = createClock()
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 10_000, getNow: clock.getNow })
      cache.put('A', 'a')
      clock.advance(1)
      cache.put('B', 'b')
      clock.advance(1)
      cache.get('A')
      clock.advance(1)
      cache.put('C', 'c')

      expect(cache.has('A')).toBe(true)
      expect(cache.has('B')).toBe(false)
      expect(cache.has('C')).toBe(true)
      expect(cache.stats().evictions).toBe(1)
    })

    it('should evict by recency when every timestamp is equal', () => {
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 10_000, getNow: () => 5 })
      cache.put('A', 'a')
      cache.put('B', 'b')
      cache.get('A')
      cache.put('C', 'c')

      expect(cache.has('A')).toBe(true)
      expect(cache.has('B')).toBe(false)
    })

    it('should prefer dropping expired entries over evicting live ones', () => {
      const clock = createClock()
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 100, getNow: clock.getNow })
      cache.put('A', 'a')
      clock.advance(50)
      cache.put('B', 'b')
      clock.advance(60)
      cache.put('C', 'c')

      expect(cache.has('B')).toBe(true)
      expect(cache.has('C')).toBe(true)
      expect(cache.stats()).toMatchObject({ evictions: 0, expirations: 1 })
    })

    it('should never exceed capacity', () => {
      const cache = new LruTtlCache<number>({ capacity: 3, ttlMs: 10_000 })
      for (let i = 0; i < 20; i++) {
        cache.put(`k${i}`, i)
      }
      expect(cache.size).toBe(3)
      expect(cache.stats().evictions).toBe(17)
    })

    it('should store nothing at capacity 0', () => {
      const cache = new LruTtlCache<string>({ capacity: 0, ttlMs: 1000 })
      cache.put('a', 'alpha')
      cache.putNegative('b')
      expect(cache.size).toBe(0)
      expect(cache.get('a')).toEqual({ status: 'miss' })
    })
  })

  describe('invalidate and clear', () => {
    it('should report whether an entry was removed', () => {
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 1000 })
      cache.put('a', 'alpha')
      expect(cache.invalidate('a')).toBe(true)
      expect(cache.invalidate('a')).toBe(false)
      expect(cache.get('a').status).toBe('miss')
    })

    it('clear() should empty the cache', () => {
      const cache = new LruTtlCache<string>({ capacity: 2, ttlMs: 1000 })
      cache.put('a', 'alpha')
      cache.putNegative('b')
      cache.clear()
      expect(cache.size).toBe(0)
    })
  })

  describe('stats', () => {
    it('should report zero hit rate before any lookup', () => {
      const cache = new LruTtlCache<string>({ capacity: 4, ttlMs: 1000 })
      expect(cache.stats()).toEqual({
        size: 0,
        capacity: 4,
        hits: 0,
        misses: 0,
        evictions: 0,
        expirations: 0,
        hitRate: 0,
      })
    })

    it('should report hit rate as a percentage with two decimals', () => {
      const cache = new LruTtlCache<string>({ capacity: 4, ttlMs: 1000 })
      cache.put('a', 'alpha')
      cache.get('a')
      cache.get('a')
      cache.get('missing')

      expect(cache.stats()).toMatchObject({ hits: 2, misses: 1, hitRate: 66.67 })
    })

    it('should count negative entries as hits', () => {
      const cache = new LruTtlCache<string>({ capacity: 4, ttlMs: 1000 })
      cache.putNegative('ghost')
      cache.get('ghost')
      expect(cache.stats()).toMatchObject({ hits: 1, misses: 0, hitRate: 100 })
    })
  })
})
