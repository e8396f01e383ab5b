import { createHash } from 'node:crypto'
import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { Value } from '@sinclair/typebox/value'
import { canonicalize } from './serialize.js'
import { AuditEntrySchema, type AuditEntry, type AuditCategory } from '../types/audit.js'

/**
 * Event data for an audit log entry.
 */
export interface AuditEvent {
  category: AuditCategory
  action: string
  actor?: string
  details?: Record<string, unknown>
}

/** Anything that accepts audit events; the store depends on this, not the file logger. */
export interface AuditSink {
  append(event: AuditEvent): AuditEntry | undefined
}

export const GENESIS_HASH = '0'.repeat(64)

export function hashEntry(entry: Omit<AuditEntry, 'hash'>): string {
  return createHash('sha256').update(canonicalize(entry)).digest('hex')
}

/**
 * Append-only hash-chained JSONL event log.
 *
 * This is the store's operational log: every committed write, flush,
 * recovery and maintenance failure lands here. Each line carries the
 * SHA-256 of the previous line, so truncation or edits are detectable
 * with verifyAuditChain().
 */
export class AuditLogger implements AuditSink {
  private lastHash = GENESIS_HASH
  private sequence = 0

  /**
   * @param auditPath - JSONL file; its directory is created if missing
   * @param now - clock for entry timestamps
   */
  constructor(
    private readonly auditPath: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    mkdirSync(dirname(auditPath), { recursive: true })
    this.resume()
  }

  /** Pick up the chain head from an existing file, skipping a torn last line. */
  private resume(): void {
    if (!existsSync(this.auditPath)) return

    const lines = readFileSync(this.auditPath, 'utf-8').trim().split('\n')
    for (let i = lines.length - 1; i >= 0; i--) {
      if (lines[i].length === 0) continue
      let parsed: unknown
      try {
        parsed = JSON.parse(lines[i])
      } catch {
        continue // torn write
      }
      if (Value.Check(AuditEntrySchema, parsed)) {
        this.lastHash = parsed.hash
        this.sequence = parsed.sequence
        return
      }
    }
  }

  append(event: AuditEvent): AuditEntry {
    const unsigned: Omit<AuditEntry, 'hash'> = {
      sequence: this.sequence + 1,
      timestamp: this.now().toISOString(),
      category: event.category,
      action: event.action,
      prev_hash: this.lastHash,
      ...(event.actor !== undefined ? { actor: event.actor } : {}),
      ...(event.details !== undefined ? { details: event.details } : {}),
    }

    const entry: AuditEntry = { ...unsigned, hash: hashEntry(unsigned) }
    appendFileSync(this.auditPath, JSON.stringify(entry) + '\n')

    this.sequence = entry.sequence
    this.lastHash = entry.hash
    return entry
  }
}

/** Sink used when auditing is disabled in configuration. */
export const noopAuditSink: AuditSink = {
  append: () => undefined,
}

/** Receives an audit write that failed after the operation it records already happened */
export type AuditErrorHandler = (err: unknown, event: AuditEvent) => void

export const warnOnAuditError: AuditErrorHandler = (err, event) => {
  const message = err instanceof Error ? err.message : String(err)
  process.stderr.write(`Warning: audit entry ${event.category}/${event.action} not written: ${message}\n`)
}

/** Append `event`, routing a failure to `onError` instead of the caller. */
export function appendSafely(
  sink: AuditSink,
  event: AuditEvent,
  onError: AuditErrorHandler = warnOnAuditError,
): void {
  try {
    sink.append(event)
  } catch (err) {
    onError(err, event)
  }
}
