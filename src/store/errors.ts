/** Typed store error codes for downstream error handling */
export type StoreErrorCode =
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'INVALID_TRANSITION'
  | 'VALIDATION'
  | 'CORRUPT_STORE'
  | 'UNRECOVERABLE_STORE'
  | 'READ_ONLY'
  | 'STORE_WRITE'
  | 'ABORTED'

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'StoreError'
  }
}

/** Identifier unknown to the store */
export class NotFoundError extends StoreError {
  constructor(public readonly id: string) {
    super('NOT_FOUND', `Appointment not found: ${id}`)
    this.name = 'NotFoundError'
  }
}

/** Booking rule violation, e.g. a practitioner double-booked */
export class ConflictError extends StoreError {
  constructor(
    message: string,
    public readonly conflictingId?: string,
  ) {
    super('CONFLICT', message)
    this.name = 'ConflictError'
  }
}

/** Status change or mutation not permitted from the current status */
export class InvalidTransitionError extends StoreError {
  constructor(
    public readonly from: string,
    public readonly to: string,
    message: string = `Cannot transition appointment from '${from}' to '${to}'`,
  ) {
    super('INVALID_TRANSITION', message)
    this.name = 'InvalidTransitionError'
  }
}

/** Input failed schema validation */
export class ValidationError extends StoreError {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super('VALIDATION', message)
    this.name = 'ValidationError'
    this.fields = fields
  }
}

/** Why a snapshot file was rejected */
export type CorruptionKind = 'missing' | 'unreadable' | 'malformed' | 'schema' | 'checksum'

/** A snapshot file (primary or backup) failed integrity checks */
export class CorruptStoreError extends StoreError {
  constructor(
    public readonly path: string,
    public readonly kind: CorruptionKind,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super('CORRUPT_STORE', `Corrupt snapshot ${path} (${kind}): ${detail}`, options)
    this.name = 'CorruptStoreError'
  }
}

/** Primary and every backup failed; operator intervention required */
export class UnrecoverableStoreError extends StoreError {
  constructor(
    message: string,
    public readonly failures: CorruptStoreError[] = [],
  ) {
    super('UNRECOVERABLE_STORE', message)
    this.name = 'UnrecoverableStoreError'
  }
}

/** Write attempted on a store opened for inspection only */
export class ReadOnlyStoreError extends StoreError {
  constructor(message = 'Store was opened read-only') {
    super('READ_ONLY', message)
    this.name = 'ReadOnlyStoreError'
  }
}

/** I/O failure while persisting; the write is not committed to disk */
export class StoreWriteError extends StoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_WRITE', message, options)
    this.name = 'StoreWriteError'
  }
}

/** Operation abandoned before entering its critical section */
export class AbortedError extends StoreError {
  constructor(message = 'Operation aborted before acquiring lock') {
    super('ABORTED', message)
    this.name = 'AbortedError'
  }
}

/** Narrow an unknown thrown value to a Node.js system error code */
export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code
  }
  return undefined
}
