/**
 * E2E: background maintenance running against a live store on real timers.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { readFileSync } from 'node:fs'
import { StoreTestHarness, bookingDraft } from './helpers/store-harness.js'

describe('E2E: Background Maintenance', { timeout: 10_000 }, () => {
  let harness: StoreTestHarness

  beforeEach(async () => {
    harness = new StoreTestHarness()
    await harness.start({ ttlMs: 150, sweepIntervalMs: 100, flushIntervalMs: 1_000 })
  })

  afterEach(async () => {
    await harness.stop()
  })

  it('sweeps expired cache entries in the background', async () => {
    const booked = await harness.store.create(bookingDraft('dr-okafor', '2026-12-01T09:00'))
    await harness.store.get(booked.id)
    expect((await harness.store.stats()).cache.size).toBe(1)

    harness.scheduler.start()
    await vi.waitFor(async () => {
      expect((await harness.store.stats()).cache.size).toBe(0)
    }, { timeout: 2_000, interval: 50 })
    expect(harness.scheduler.status().evicted).toBe(1)
    expect(harness.errors).toEqual([])
  })

  it('flushes the snapshot periodically', async () => {
    await harness.store.create(bookingDraft('dr-okafor', '2026-12-01T09:00'))

    harness.scheduler.start()
    await vi.waitFor(() => {
      expect(harness.scheduler.status().flushes).toBeGreaterThanOrEqual(1)
    }, { timeout: 3_000, interval: 100 })

    const actions = readFileSync(harness.auditPath, 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line).action)
    expect(actions).toContain('flush')
  })

  it('stops cleanly while maintenance is scheduled', async () => {
    harness.scheduler.start()
    await harness.scheduler.stop()
    expect(harness.scheduler.status().running).toBe(false)
  })
})
