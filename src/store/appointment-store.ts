/**
 * Concurrent appointment store: in-memory snapshot, LRU/TTL read cache,
 * atomic file persistence.
 *
 * Lock discipline:
 *   reads  (get, list, stats, sweepCache)  shared global lock
 *   writes (create, update, cancel, purge) per-id mutex, then exclusive global lock
 *   flush                                  exclusive global lock
 *
 * Audit entries are written after the fact; a failed audit write is
 * handed to `onAuditError` and never turns a committed write into an error.
 *
 * Inside a write the sequence validate -> mutate snapshot -> invalidate
 * cache -> persist runs without interruption by any other read or write.
 * Once the exclusive lock is granted a write runs to completion; an
 * AbortSignal only cancels a write that is still queued.
 */

import type { CacheStats, LruTtlCache } from '../cache/index.js'
import { KeyedMutex, ReadWriteLock } from '../concurrency/index.js'
import type { LoadResult, SaveResult, SnapshotFileStore } from '../durable/index.js'
import { applyChanges, changesSlot, createAppointment } from '../model/appointment.js'
import { SlotConflictPolicy, type BookingPolicy } from '../scheduling/index.js'
import {
  appendSafely,
  noopAuditSink,
  type AuditErrorHandler,
  type AuditEvent,
  type AuditSink,
} from '../audit/index.js'
import { SNAPSHOT_FORMAT_VERSION, type StoreSnapshot } from '../types/snapshot.js'
import type {
  Appointment,
  AppointmentChanges,
  AppointmentDraft,
  AppointmentFilter,
  AppointmentStatus,
} from '../types/appointment.js'
import {
  InvalidTransitionError,
  NotFoundError,
  ReadOnlyStoreError,
  StoreWriteError,
  UnrecoverableStoreError,
} from './errors.js'

export interface AppointmentStoreOptions {
  durable: SnapshotFileStore
  cache: LruTtlCache<Appointment>
  policy?: BookingPolicy
  audit?: AuditSink
  /** Receives audit writes that failed after their operation committed; defaults to a stderr warning */
  onAuditError?: AuditErrorHandler
  /**
   * Inspection mode: load without quarantining or cleaning the data
   * directory, write no audit entries, reject every write.
   */
  readOnly?: boolean
  getNow?: () => Date
}

export interface WriteOptions {
  /** Abandons the write if it fires before the write acquires its locks */
  signal?: AbortSignal
}

export type StoreHealth = 'ok' | 'degraded'

/** Where the in-memory state came from at open; `none` when nothing could be loaded */
export type LoadSource = LoadResult['source'] | 'none'

export interface StoreStats {
  total: number
  byStatus: Record<AppointmentStatus, number>
  cache: CacheStats
  /** In-memory state has changes the last persist did not commit */
  dirty: boolean
  health: StoreHealth
  loadedFrom: LoadSource
  lastWrittenAt: string
}

function compareAppointments(a: Appointment, b: Appointment): number {
  if (a.scheduled_start !== b.scheduled_start) return a.scheduled_start < b.scheduled_start ? -1 : 1
  if (a.created_at !== b.created_at) return a.created_at < b.created_at ? -1 : 1
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

function matches(record: Appointment, filter: AppointmentFilter): boolean {
  if (filter.patient_id !== undefined && record.patient_id !== filter.patient_id) return false
  if (filter.practitioner_id !== undefined && record.practitioner_id !== filter.practitioner_id) return false
  if (filter.status !== undefined && record.status !== filter.status) return false
  if (filter.from !== undefined && record.scheduled_start < filter.from) return false
  if (filter.to !== undefined && record.scheduled_start > filter.to) return false
  return true
}

export class AppointmentStore {
  private readonly records: Map<string, Appointment>
  private readonly durable: SnapshotFileStore
  private readonly cache: LruTtlCache<Appointment>
  private readonly policy: BookingPolicy
  private readonly audit: AuditSink
  private readonly onAuditError?: AuditErrorHandler
  private readonly readOnly: boolean
  private readonly getNow: () => Date
  private readonly lock = new ReadWriteLock()
  private readonly keyLocks = new KeyedMutex()

  private dirty = false
  private lastWrittenAt: string

  private constructor(
    options: AppointmentStoreOptions,
    snapshot: StoreSnapshot,
    private readonly loadedFrom: LoadSource,
    private readonly unavailable?: UnrecoverableStoreError,
  ) {
    this.durable = options.durable
    this.cache = options.cache
    this.policy = options.policy ?? new SlotConflictPolicy()
    this.readOnly = options.readOnly ?? false
    this.audit = this.readOnly ? noopAuditSink : (options.audit ?? noopAuditSink)
    this.onAuditError = options.onAuditError
    this.getNow = options.getNow ?? (() => new Date())
    this.records = new Map(
      Object.entries(snapshot.appointments).map(
        ([id, record]): [string, Appointment] => [id, Object.freeze(record)],
      ),
    )
    this.lastWrittenAt = snapshot.written_at
  }

  /**
   * Load the durable snapshot and build a store around it.
   *
   * Recovery from a backup is audited and the store serves normally. If no
   * snapshot can be recovered the store opens degraded: empty, read-only,
   * and every write or flush fails with UnrecoverableStoreError until an
   * operator restores a backup and the store is reopened.
   */
  static async open(options: AppointmentStoreOptions): Promise<AppointmentStore> {
    const readOnly = options.readOnly ?? false
    const audit = readOnly ? noopAuditSink : (options.audit ?? noopAuditSink)
    const record = (event: AuditEvent) => appendSafely(audit, event, options.onAuditError)

    try {
      const result = await options.durable.load({ readOnly })
      if (result.recovery) {
        record({
          category: 'recovery',
          action: 'restored_from_backup',
          details: {
            reason: result.recovery.error.message,
            backup: result.recovery.backup,
            skipped: result.recovery.skipped.map((e) => e.message),
            quarantined: result.recovery.quarantined ?? null,
          },
        })
      }
      record({
        category: 'admin',
        action: 'store_opened',
        details: {
          source: result.source,
          records: Object.keys(result.snapshot.appointments).length,
          ...(result.removedTempFiles.length > 0 ? { removed_temp_files: result.removedTempFiles } : {}),
        },
      })
      return new AppointmentStore(options, result.snapshot, result.source)
    } catch (err) {
      if (!(err instanceof UnrecoverableStoreError)) throw err
      record({
        category: 'recovery',
        action: 'store_unrecoverable',
        details: { reason: err.message, failures: err.failures.map((e) => e.message) },
      })
      const now = (options.getNow ?? (() => new Date()))()
      const empty: StoreSnapshot = {
        format_version: SNAPSHOT_FORMAT_VERSION,
        written_at: now.toISOString(),
        appointments: {},
      }
      return new AppointmentStore(options, empty, 'none', err)
    }
  }

  /** Book a new appointment. */
  async create(draft: AppointmentDraft, options: WriteOptions = {}): Promise<Appointment> {
    this.assertWritable()
    const candidate = createAppointment(draft, this.getNow())

    return this.writeSection(candidate.id, options.signal, async () => {
      this.policy.check(candidate, this.records.values())
      this.records.set(candidate.id, candidate)
      this.cache.invalidate(candidate.id)
      await this.persist('appointment_created', candidate)
      return candidate
    })
  }

  async get(id: string): Promise<Appointment> {
    return this.lock.withRead(() => {
      const cached = this.cache.get(id)
      if (cached.status === 'hit') return cached.value
      if (cached.status === 'negative') throw new NotFoundError(id)

      const record = this.records.get(id)
      if (!record) {
        this.cache.putNegative(id)
        throw new NotFoundError(id)
      }
      this.cache.put(id, record)
      return record
    })
  }

  /** Apply changes to a scheduled appointment; re-checks booking rules when the slot moves. */
  async update(id: string, changes: AppointmentChanges, options: WriteOptions = {}): Promise<Appointment> {
    this.assertWritable()

    return this.writeSection(id, options.signal, async () => {
      const current = this.requireRecord(id)
      const next = applyChanges(current, changes, this.getNow())
      if (changesSlot(current, next)) {
        this.policy.check(next, this.records.values())
      }
      this.records.set(id, next)
      this.cache.invalidate(id)
      await this.persist('appointment_updated', next, { changes })
      return next
    })
  }

  /**
   * Soft-delete: move a scheduled appointment to `cancelled`.
   * Cancelling an already cancelled appointment returns it unchanged.
   */
  async cancel(id: string, options: WriteOptions = {}): Promise<Appointment> {
    this.assertWritable()

    return this.writeSection(id, options.signal, async () => {
      const current = this.requireRecord(id)
      if (current.status === 'cancelled') return current
      if (current.status === 'completed') {
        throw new InvalidTransitionError(current.status, 'cancelled')
      }

      const next = applyChanges(current, { status: 'cancelled' }, this.getNow())
      this.records.set(id, next)
      this.cache.invalidate(id)
      await this.persist('appointment_cancelled', next)
      return next
    })
  }

  async complete(id: string, options: WriteOptions = {}): Promise<Appointment> {
    return this.update(id, { status: 'completed' }, options)
  }

  /** Physically remove a record. Normal workflows cancel instead. */
  async purge(id: string, options: WriteOptions = {}): Promise<void> {
    this.assertWritable()

    await this.writeSection(id, options.signal, async () => {
      const current = this.requireRecord(id)
      this.records.delete(id)
      this.cache.invalidate(id)
      await this.persist('appointment_purged', current)
    })
  }

  /** Appointments matching every given filter field, in schedule order. */
  async list(filter: AppointmentFilter = {}): Promise<Appointment[]> {
    return this.lock.withRead(() =>
      [...this.records.values()].filter((record) => matches(record, filter)).sort(compareAppointments),
    )
  }

  /**
   * Persist the current snapshot even if nothing changed. Retries the
   * commit of any write whose own persist failed.
   */
  async flush(): Promise<SaveResult> {
    this.assertWritable()

    return this.lock.withWrite(async () => {
      this.assertWritable()
      const result = await this.saveSnapshot()
      this.record({
        category: 'maintenance',
        action: 'flush',
        details: {
          records: this.records.size,
          bytes: result.bytes,
          backup: result.backup ?? null,
          pruned: result.pruned,
        },
      })
      return result
    })
  }

  /** Drop expired cache entries; returns how many were removed. */
  async sweepCache(): Promise<number> {
    return this.lock.withRead(() => this.cache.sweep())
  }

  async stats(): Promise<StoreStats> {
    return this.lock.withRead(() => {
      const byStatus: Record<AppointmentStatus, number> = { scheduled: 0, completed: 0, cancelled: 0 }
      for (const record of this.records.values()) {
        byStatus[record.status]++
      }
      return {
        total: this.records.size,
        byStatus,
        cache: this.cache.stats(),
        dirty: this.dirty,
        health: this.health(),
        loadedFrom: this.loadedFrom,
        lastWrittenAt: this.lastWrittenAt,
      }
    })
  }

  health(): StoreHealth {
    return this.unavailable ? 'degraded' : 'ok'
  }

  /** Final flush before shutdown. A degraded or read-only store leaves the disk untouched. */
  async close(): Promise<void> {
    if (this.unavailable || this.readOnly) return
    await this.flush()
    this.record({ category: 'admin', action: 'store_closed' })
  }

  private record(event: AuditEvent): void {
    appendSafely(this.audit, event, this.onAuditError)
  }

  private assertWritable(): void {
    if (this.readOnly) throw new ReadOnlyStoreError()
    if (this.unavailable) {
      throw new UnrecoverableStoreError(
        'Store is read-only: no valid snapshot could be loaded; restore a backup and reopen',
        this.unavailable.failures,
      )
    }
  }

  private requireRecord(id: string): Appointment {
    const record = this.records.get(id)
    if (!record) throw new NotFoundError(id)
    return record
  }

  private writeSection<T>(id: string, signal: AbortSignal | undefined, fn: () => Promise<T>): Promise<T> {
    return this.keyLocks.runExclusive(
      id,
      () => this.lock.withWrite(fn, signal),
      signal,
    )
  }

  private snapshot(): StoreSnapshot {
    return {
      format_version: SNAPSHOT_FORMAT_VERSION,
      written_at: this.getNow().toISOString(),
      appointments: Object.fromEntries(this.records),
    }
  }

  private async saveSnapshot(): Promise<SaveResult> {
    const snapshot = this.snapshot()
    const result = await this.durable.saveAtomic(snapshot)
    this.dirty = false
    this.lastWrittenAt = snapshot.written_at
    if (result.syncError !== undefined) {
      this.record({ category: 'store', action: 'directory_sync_failed', details: { error: result.syncError } })
    }
    return result
  }

  /**
   * Commit the in-memory change to disk. On failure the change stays in
   * memory, the store is marked dirty and the next successful persist or
   * flush writes it.
   */
  private async persist(
    action: string,
    record: Appointment,
    extra: Record<string, unknown> = {},
  ): Promise<void> {
    this.dirty = true
    try {
      await this.saveSnapshot()
    } catch (err) {
      if (!(err instanceof StoreWriteError)) throw err
      this.record({
        category: 'store',
        action: 'persist_failed',
        details: { attempted: action, id: record.id, error: err.message },
      })
      throw err
    }
    this.record({
      category: 'store',
      action,
      details: { id: record.id, status: record.status, ...extra },
    })
  }
}
