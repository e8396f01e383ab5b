// Common types
export {
  UuidString,
  IsoDateString,
  LocalDateTimeString,
  ExternalId,
} from './common.js'

// Configuration
export { StoreConfigSchema } from './config.js'
export type { StoreConfig } from './config.js'

// Appointments
export {
  AppointmentSchema,
  AppointmentStatus,
  AppointmentDraftSchema,
  AppointmentChangesSchema,
} from './appointment.js'
export type {
  Appointment,
  AppointmentDraft,
  AppointmentChanges,
  AppointmentFilter,
} from './appointment.js'

// Snapshots
export { StoreSnapshotSchema, SNAPSHOT_FORMAT_VERSION } from './snapshot.js'
export type { StoreSnapshot, StoreSnapshotFile } from './snapshot.js'

// Audit
export { AuditEntrySchema, AuditCategorySchema } from './audit.js'
export type { AuditEntry, AuditCategory } from './audit.js'
