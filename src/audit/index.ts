export {
  AuditLogger,
  noopAuditSink,
  hashEntry,
  GENESIS_HASH,
  appendSafely,
  warnOnAuditError,
} from './logger.js'
export type { AuditEvent, AuditSink, AuditErrorHandler } from './logger.js'
export { verifyAuditChain } from './verifier.js'
export type { VerificationResult } from './verifier.js'
export { canonicalize } from './serialize.js'
