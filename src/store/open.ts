import { AuditLogger, noopAuditSink, type AuditErrorHandler, type AuditSink } from '../audit/index.js'
import { LruTtlCache } from '../cache/index.js'
import { SnapshotFileStore, type SnapshotFs } from '../durable/index.js'
import type { BookingPolicy } from '../scheduling/index.js'
import type { Appointment } from '../types/appointment.js'
import type { StoreConfig } from '../types/config.js'
import { AppointmentStore } from './appointment-store.js'

/** Collaborators that are not part of the configuration file */
export interface StoreDependencies {
  policy?: BookingPolicy
  /** Overrides the audit sink built from `config.audit` */
  audit?: AuditSink
  onAuditError?: AuditErrorHandler
  /** Open for inspection: no audit log is opened and nothing in the data directory changes */
  readOnly?: boolean
  getNow?: () => Date
  fs?: SnapshotFs
}

export function createAuditSink(config: StoreConfig): AuditSink {
  return config.audit.enabled ? new AuditLogger(config.audit.path) : noopAuditSink
}

/**
 * Wire a store from validated configuration. The caller owns the returned
 * store and passes it to whatever needs it; there is no shared instance.
 */
export async function openAppointmentStore(
  config: StoreConfig,
  deps: StoreDependencies = {},
): Promise<AppointmentStore> {
  const getNow = deps.getNow ?? (() => new Date())

  const durable = new SnapshotFileStore({
    dataDir: config.storage.dataDir,
    backupRetention: config.storage.backupRetention,
    getNow,
    fs: deps.fs,
  })
  const cache = new LruTtlCache<Appointment>({
    capacity: config.cache.capacity,
    ttlMs: config.cache.ttlMs,
    getNow: () => getNow().getTime(),
  })

  return AppointmentStore.open({
    durable,
    cache,
    policy: deps.policy,
    audit: deps.audit ?? (deps.readOnly ? noopAuditSink : createAuditSink(config)),
    onAuditError: deps.onAuditError,
    readOnly: deps.readOnly,
    getNow,
  })
}
