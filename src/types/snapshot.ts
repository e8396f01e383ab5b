import { Type, type Static } from '@sinclair/typebox'
import { AppointmentSchema, type Appointment } from './appointment.js'
import { IsoDateString } from './common.js'

/** Current on-disk format version */
export const SNAPSHOT_FORMAT_VERSION = 1

/** Snapshot file schema */
export const StoreSnapshotSchema = Type.Object({
  format_version: Type.Literal(SNAPSHOT_FORMAT_VERSION),
  written_at: IsoDateString,
  record_count: Type.Integer({ minimum: 0 }),
  /** SHA-256 (hex) over the canonical JSON of `appointments` */
  checksum: Type.String({ pattern: '^[0-9a-f]{64}$' }),
  appointments: Type.Record(Type.String(), AppointmentSchema),
})
export type StoreSnapshotFile = Static<typeof StoreSnapshotSchema>

/** In-memory view of a snapshot: the checksum and count are derived on write */
export interface StoreSnapshot {
  format_version: typeof SNAPSHOT_FORMAT_VERSION
  written_at: string
  appointments: Record<string, Appointment>
}
