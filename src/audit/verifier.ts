import { existsSync, readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { AuditEntrySchema } from '../types/audit.js'
import { GENESIS_HASH, hashEntry } from './logger.js'

export interface VerificationResult {
  valid: boolean
  entries: number
  errors: Array<{ line: number; error: string }>
}

/**
 * Walk a JSONL audit log and check every link.
 *
 * A line is broken when it is not a valid entry, its hash does not match
 * its content, its prev_hash does not match the previous line, or its
 * sequence does not follow the previous one. A missing file is an empty,
 * valid chain.
 */
export function verifyAuditChain(auditPath: string): VerificationResult {
  if (!existsSync(auditPath)) {
    return { valid: true, entries: 0, errors: [] }
  }

  const lines = readFileSync(auditPath, 'utf-8')
    .split('\n')
    .filter((line) => line.trim().length > 0)

  const errors: VerificationResult['errors'] = []
  let expectedPrev = GENESIS_HASH
  let expectedSequence = 1

  lines.forEach((raw, index) => {
    const line = index + 1
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      errors.push({ line, error: 'not valid JSON' })
      return
    }
    if (!Value.Check(AuditEntrySchema, parsed)) {
      errors.push({ line, error: 'not an audit entry' })
      return
    }

    const { hash, ...unsigned } = parsed
    if (hashEntry(unsigned) !== hash) {
      errors.push({ line, error: 'hash does not match entry content' })
    }
    if (parsed.prev_hash !== expectedPrev) {
      errors.push({ line, error: `prev_hash does not link to line ${line - 1}` })
    }
    if (parsed.sequence !== expectedSequence) {
      errors.push({
        line,
        error: `sequence ${parsed.sequence} out of order (expected ${expectedSequence})`,
      })
    }

    expectedPrev = hash
    expectedSequence = parsed.sequence + 1
  })

  return { valid: errors.length === 0, entries: lines.length, errors }
}
