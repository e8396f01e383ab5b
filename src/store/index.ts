export { AppointmentStore } from './appointment-store.js'
export type {
  AppointmentStoreOptions,
  WriteOptions,
  StoreHealth,
  LoadSource,
  StoreStats,
} from './appointment-store.js'
export { openAppointmentStore, createAuditSink } from './open.js'
export type { StoreDependencies } from './open.js'
export {
  StoreError,
  NotFoundError,
  ConflictError,
  InvalidTransitionError,
  ValidationError,
  CorruptStoreError,
  UnrecoverableStoreError,
  ReadOnlyStoreError,
  StoreWriteError,
  AbortedError,
} from './errors.js'
export type { StoreErrorCode, CorruptionKind } from './errors.js'
