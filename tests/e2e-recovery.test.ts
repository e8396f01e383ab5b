/**
 * E2E: damaged data directories, recovery from backups, and operator restore.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { readdirSync, readFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { StoreTestHarness, bookingDraft } from './helpers/store-harness.js'
import { PRIMARY_FILE, SnapshotFileStore } from '../src/durable/index.js'
import { UnrecoverableStoreError } from '../src/store/index.js'
import { verifyAuditChain } from '../src/audit/index.js'

describe('E2E: Recovery', () => {
  let harness: StoreTestHarness

  beforeEach(async () => {
    harness = new StoreTestHarness()
    await harness.start({ backupRetention: 2 })
  })

  afterEach(async () => {
    await harness.stop()
  })

  function primaryPath(): string {
    return join(harness.dataDir, PRIMARY_FILE)
  }

  function backupNames(): string[] {
    return readdirSync(harness.dataDir)
      .filter((name) => name.endsWith('.bak.json'))
      .sort()
  }

  function auditActions(): string[] {
    return readFileSync(harness.auditPath, 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line).action)
  }

  it('clears debris from a write that crashed before its rename', async () => {
    const booked = await harness.store.create(bookingDraft('dr-okafor', '2026-11-02T09:00'))
    writeFileSync(`${primaryPath()}.0b9c5d1e-0000-4000-8000-000000000000.tmp`, '{"format_version":1,"writ')

    const restarted = await harness.reopen()
    expect(await restarted.get(booked.id)).toEqual(booked)
    expect((await restarted.stats()).loadedFrom).toBe('primary')
    expect(readdirSync(harness.dataDir).filter((name) => name.endsWith('.tmp'))).toEqual([])
  })

  it('falls back to the newest valid backup when the primary is torn', async () => {
    const first = await harness.store.create(bookingDraft('dr-okafor', '2026-11-02T09:00'))
    await harness.store.create(bookingDraft('dr-okafor', '2026-11-02T10:00'))
    const primary = readFileSync(primaryPath(), 'utf-8')
    writeFileSync(primaryPath(), primary.slice(0, primary.length / 2))

    const restarted = await harness.reopen()
    expect((await restarted.list()).map((a) => a.id)).toEqual([first.id])
    expect(restarted.health()).toBe('ok')
    expect(auditActions().slice(-2)).toEqual(['restored_from_backup', 'store_opened'])
    expect(readdirSync(harness.dataDir).some((name) => name.endsWith('.corrupt.json'))).toBe(true)

    await restarted.create(bookingDraft('dr-okafor', '2026-11-02T10:00'))
    expect(await (await harness.reopen()).list()).toHaveLength(2)
  })

  it('keeps only the configured number of backups', async () => {
    for (const hour of ['09', '10', '11', '12', '13']) {
      await harness.store.create(bookingDraft('dr-varga', `2026-11-03T${hour}:00`))
    }
    expect(backupNames()).toHaveLength(2)
  })

  it('opens read-only when nothing is recoverable, then recovers after a restore', async () => {
    await harness.store.create(bookingDraft('dr-okafor', '2026-11-04T09:00'))
    await harness.store.create(bookingDraft('dr-okafor', '2026-11-04T10:00'))
    const [backup] = backupNames()
    const good = readFileSync(join(harness.dataDir, backup), 'utf-8')
    writeFileSync(primaryPath(), '')
    writeFileSync(join(harness.dataDir, backup), 'overwritten')

    const degraded = await harness.reopen()
    expect(degraded.health()).toBe('degraded')
    await expect(degraded.create(bookingDraft('dr-okafor', '2026-11-04T11:00'))).rejects.toBeInstanceOf(
      UnrecoverableStoreError,
    )
    expect(auditActions().at(-1)).toBe('store_unrecoverable')

    writeFileSync(join(harness.dataDir, backup), good)
    const files = new SnapshotFileStore({ dataDir: harness.dataDir, backupRetention: 2 })
    await files.restoreBackup(backup)

    const restored = await harness.reopen()
    expect(restored.health()).toBe('ok')
    expect(await restored.list()).toHaveLength(1)
    expect(verifyAuditChain(harness.auditPath).valid).toBe(true)
  })
})
