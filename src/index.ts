export * from './types/index.js'
export * from './store/index.js'
export { createAppointment, applyChanges, canTransition, isTerminal } from './model/appointment.js'
export { LruTtlCache } from './cache/index.js'
export type { CacheLookup, CacheStats, LruTtlCacheOptions } from './cache/index.js'
export { ReadWriteLock, KeyedMutex } from './concurrency/index.js'
export * from './durable/index.js'
export { SlotConflictPolicy, allowAllPolicy } from './scheduling/index.js'
export type { BookingPolicy } from './scheduling/index.js'
export * from './maintenance/index.js'
export { loadConfig, resolveConfig, ConfigError, DEFAULT_CONFIG } from './config/index.js'
export { AuditLogger, noopAuditSink, appendSafely, verifyAuditChain } from './audit/index.js'
export type { AuditEvent, AuditSink, AuditErrorHandler, VerificationResult } from './audit/index.js'
