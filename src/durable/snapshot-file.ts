/**
 * File-backed snapshot persistence with atomic replace and backup rotation.
 *
 * Layout inside the data directory:
 *   appointments.json                               primary snapshot
 *   appointments.<epoch-ms:15>-<seq:6>.bak.json      rotated backups
 *   appointments.<epoch-ms:15>-<seq:6>.corrupt.json  quarantined primaries
 *   appointments.json.<uuid>.tmp                     in-flight writes
 *
 * The rename of a fully written, fsync'd temporary file is the only step
 * that touches the primary, so a reader sees either the previous snapshot
 * or the new one.
 */

import { createHash, randomUUID } from 'node:crypto'
import { constants } from 'node:fs'
import * as fsp from 'node:fs/promises'
import { join } from 'node:path'
import { Value } from '@sinclair/typebox/value'
import { canonicalize } from '../audit/serialize.js'
import {
  CorruptStoreError,
  StoreWriteError,
  UnrecoverableStoreError,
  errnoCode,
} from '../store/errors.js'
import {
  SNAPSHOT_FORMAT_VERSION,
  StoreSnapshotSchema,
  type StoreSnapshot,
  type StoreSnapshotFile,
} from '../types/snapshot.js'
import type { Appointment } from '../types/appointment.js'

export const PRIMARY_FILE = 'appointments.json'

const BACKUP_PATTERN = /^appointments\.\d{15}-\d{6}\.bak\.json$/
const TEMP_PATTERN = /^appointments\.json\..+\.tmp$/

/** The file operations this module performs; swapped out in tests to inject I/O faults. */
export type SnapshotFs = Pick<
  typeof fsp,
  'copyFile' | 'mkdir' | 'open' | 'readFile' | 'readdir' | 'rename' | 'rm' | 'stat'
>

export interface SnapshotFileStoreOptions {
  dataDir: string
  /** Backups kept after each write; 0 disables backups */
  backupRetention: number
  getNow?: () => Date
  fs?: SnapshotFs
}

export interface LoadOptions {
  /** Report only: leave a rejected primary and stale temporary files in place */
  readOnly?: boolean
}

export interface LoadResult {
  snapshot: StoreSnapshot
  source: 'primary' | 'backup' | 'empty'
  /** Temporary files of interrupted writes removed before loading */
  removedTempFiles: string[]
  /** Present when the primary was rejected and a backup was used instead */
  recovery?: {
    error: CorruptStoreError
    backup: string
    /** Newer backups that were also rejected */
    skipped: CorruptStoreError[]
    /** Where the rejected primary was moved, if it existed */
    quarantined?: string
  }
}

export interface SaveResult {
  path: string
  bytes: number
  /** Backup created from the previous primary, if there was one */
  backup?: string
  /** Backups deleted by retention */
  pruned: string[]
  /** Backups retention could not delete; the write itself still committed */
  pruneFailures: Array<{ file: string; error: string }>
  /** Set when the directory could not be fsync'd after the rename; the write still committed */
  syncError?: string
}

export interface FileInfo {
  exists: boolean
  path: string
  sizeBytes?: number
  modifiedAt?: string
}

export function emptySnapshot(now: Date = new Date()): StoreSnapshot {
  return {
    format_version: SNAPSHOT_FORMAT_VERSION,
    written_at: now.toISOString(),
    appointments: {},
  }
}

export function checksumOf(appointments: Record<string, Appointment>): string {
  return createHash('sha256').update(canonicalize(appointments)).digest('hex')
}

/** Encode a snapshot as versioned, checksummed, human-readable JSON with sorted ids. */
export function serializeSnapshot(snapshot: StoreSnapshot): string {
  const appointments: Record<string, Appointment> = {}
  for (const id of Object.keys(snapshot.appointments).sort()) {
    appointments[id] = snapshot.appointments[id]
  }

  const file: StoreSnapshotFile = {
    format_version: snapshot.format_version,
    written_at: snapshot.written_at,
    record_count: Object.keys(appointments).length,
    checksum: checksumOf(appointments),
    appointments,
  }
  return JSON.stringify(file, null, 2) + '\n'
}

/**
 * Decode and integrity-check snapshot file content.
 * @throws CorruptStoreError describing the first failed check
 */
export function parseSnapshot(content: string, path: string): StoreSnapshot {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (err) {
    throw new CorruptStoreError(path, 'malformed', 'not valid JSON (truncated write?)', { cause: err })
  }

  if (!Value.Check(StoreSnapshotSchema, parsed)) {
    const first = Value.Errors(StoreSnapshotSchema, parsed).First()
    const detail = first ? `${first.path || '/'}: ${first.message}` : 'does not match snapshot schema'
    throw new CorruptStoreError(path, 'schema', detail)
  }

  for (const [id, record] of Object.entries(parsed.appointments)) {
    if (record.id !== id) {
      throw new CorruptStoreError(path, 'schema', `record keyed ${id} carries id ${record.id}`)
    }
  }

  const count = Object.keys(parsed.appointments).length
  if (count !== parsed.record_count) {
    throw new CorruptStoreError(path, 'checksum', `record_count ${parsed.record_count} but ${count} records`)
  }
  if (checksumOf(parsed.appointments) !== parsed.checksum) {
    throw new CorruptStoreError(path, 'checksum', 'checksum does not match appointments')
  }

  return {
    format_version: parsed.format_version,
    written_at: parsed.written_at,
    appointments: parsed.appointments,
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export class SnapshotFileStore {
  readonly dataDir: string
  readonly primaryPath: string
  private readonly backupRetention: number
  private readonly getNow: () => Date
  private readonly fs: SnapshotFs
  private sequence = 0

  constructor(options: SnapshotFileStoreOptions) {
    if (!Number.isInteger(options.backupRetention) || options.backupRetention < 0) {
      throw new RangeError(`backupRetention must be a non-negative integer, got ${options.backupRetention}`)
    }
    this.dataDir = options.dataDir
    this.primaryPath = join(options.dataDir, PRIMARY_FILE)
    this.backupRetention = options.backupRetention
    this.getNow = options.getNow ?? (() => new Date())
    this.fs = options.fs ?? fsp
  }

  /**
   * Load the primary snapshot, falling back to backups newest first.
   *
   * A missing primary with no backups is a fresh store. A rejected primary
   * that still exists on disk is quarantined once a backup is accepted.
   * Unless `readOnly` is set, temporary files left by interrupted writes are
   * removed first; only one process may own the data directory.
   *
   * @throws UnrecoverableStoreError when the primary and every backup fail
   */
  async load(options: LoadOptions = {}): Promise<LoadResult> {
    const readOnly = options.readOnly ?? false
    const removedTempFiles = readOnly ? [] : await this.removeTempFiles()

    const primary = await this.tryRead(this.primaryPath)
    if (primary.ok) {
      return { snapshot: primary.snapshot, source: 'primary', removedTempFiles }
    }

    const backups = await this.listBackups()
    if (primary.error.kind === 'missing' && backups.length === 0) {
      return { snapshot: emptySnapshot(this.getNow()), source: 'empty', removedTempFiles }
    }

    const skipped: CorruptStoreError[] = []
    for (const backup of backups) {
      const attempt = await this.tryRead(join(this.dataDir, backup))
      if (!attempt.ok) {
        skipped.push(attempt.error)
        continue
      }
      const quarantined =
        readOnly || primary.error.kind === 'missing' ? undefined : await this.quarantinePrimary()
      return {
        snapshot: attempt.snapshot,
        source: 'backup',
        removedTempFiles,
        recovery: { error: primary.error, backup, skipped, quarantined },
      }
    }

    throw new UnrecoverableStoreError(
      `No valid snapshot in ${this.dataDir}: primary and ${backups.length} backup(s) rejected`,
      [primary.error, ...skipped],
    )
  }

  /**
   * Durably replace the primary with `snapshot`.
   *
   * Steps: write temp file -> fsync -> copy current primary to a new backup
   * -> rename temp over primary -> fsync directory -> prune old backups.
   * Failures after the rename are reported in the result, not thrown.
   *
   * @throws StoreWriteError if any step up to and including the rename fails;
   *         the primary is then unchanged
   */
  async saveAtomic(snapshot: StoreSnapshot): Promise<SaveResult> {
    const body = serializeSnapshot(snapshot)
    const tmpPath = `${this.primaryPath}.${randomUUID()}.tmp`
    let backup: string | undefined

    try {
      await this.fs.mkdir(this.dataDir, { recursive: true })
      const handle = await this.fs.open(tmpPath, 'wx')
      try {
        await handle.writeFile(body, 'utf-8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      backup = await this.rotatePrimary()
      await this.fs.rename(tmpPath, this.primaryPath)
    } catch (err) {
      const cleanup = await this.fs.rm(tmpPath, { force: true }).then(
        () => '',
        (rmErr: unknown) => ` (temporary file ${tmpPath} left behind: ${describe(rmErr)})`,
      )
      throw new StoreWriteError(
        `Failed to persist snapshot to ${this.primaryPath}: ${describe(err)}${cleanup}`,
        { cause: err },
      )
    }

    const syncError = await this.syncDirectory()
    const { pruned, failures } = await this.pruneBackups()

    return {
      path: this.primaryPath,
      bytes: Buffer.byteLength(body, 'utf-8'),
      backup,
      pruned,
      pruneFailures: failures,
      ...(syncError === undefined ? {} : { syncError }),
    }
  }

  /** Backup file names, newest first. */
  async listBackups(): Promise<string[]> {
    let names: string[]
    try {
      names = await this.fs.readdir(this.dataDir)
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return []
      throw err
    }
    return names.filter((name) => BACKUP_PATTERN.test(name)).sort().reverse()
  }

  async fileInfo(): Promise<FileInfo> {
    try {
      const stats = await this.fs.stat(this.primaryPath)
      return {
        exists: true,
        path: this.primaryPath,
        sizeBytes: stats.size,
        modifiedAt: stats.mtime.toISOString(),
      }
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return { exists: false, path: this.primaryPath }
      throw err
    }
  }

  /**
   * Operator recovery: validate a backup and make it the primary.
   * A rejected primary is quarantined first so it is not rotated into
   * the backup set.
   */
  async restoreBackup(name: string): Promise<SaveResult> {
    if (!BACKUP_PATTERN.test(name)) {
      throw new RangeError(`Not a backup file name: ${name}`)
    }
    const snapshot = await this.readSnapshot(join(this.dataDir, name))

    const current = await this.tryRead(this.primaryPath)
    if (!current.ok && current.error.kind !== 'missing') {
      await this.quarantinePrimary()
    }

    return this.saveAtomic(snapshot)
  }

  private async tryRead(
    path: string,
  ): Promise<{ ok: true; snapshot: StoreSnapshot } | { ok: false; error: CorruptStoreError }> {
    try {
      return { ok: true, snapshot: await this.readSnapshot(path) }
    } catch (err) {
      if (err instanceof CorruptStoreError) return { ok: false, error: err }
      throw err
    }
  }

  private async readSnapshot(path: string): Promise<StoreSnapshot> {
    let content: string
    try {
      content = await this.fs.readFile(path, 'utf-8')
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') {
        throw new CorruptStoreError(path, 'missing', 'file does not exist', { cause: err })
      }
      throw new CorruptStoreError(path, 'unreadable', describe(err), { cause: err })
    }
    return parseSnapshot(content, path)
  }

  /** Stamp that sorts lexically in creation order within this process. */
  private nextStamp(): string {
    this.sequence = (this.sequence + 1) % 1_000_000
    const ms = String(this.getNow().getTime()).padStart(15, '0')
    return `${ms}-${String(this.sequence).padStart(6, '0')}`
  }

  /** Copy the current primary into a new backup slot. Returns its name, or undefined if there is no primary. */
  private async rotatePrimary(): Promise<string | undefined> {
    if (this.backupRetention === 0) return undefined

    for (let attempt = 0; attempt < 5; attempt++) {
      const name = `appointments.${this.nextStamp()}.bak.json`
      const target = join(this.dataDir, name)
      try {
        await this.fs.copyFile(this.primaryPath, target, constants.COPYFILE_EXCL)
      } catch (err) {
        const code = errnoCode(err)
        if (code === 'ENOENT') return undefined
        if (code === 'EEXIST') continue
        throw err
      }
      try {
        const handle = await this.fs.open(target, 'r+')
        try {
          await handle.sync()
        } finally {
          await handle.close()
        }
      } catch (err) {
        await this.fs.rm(target, { force: true })
        throw err
      }
      return name
    }
    throw new Error('Could not allocate a unique backup file name')
  }

  private async quarantinePrimary(): Promise<string | undefined> {
    const target = join(this.dataDir, `appointments.${this.nextStamp()}.corrupt.json`)
    try {
      await this.fs.rename(this.primaryPath, target)
      return target
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return undefined
      throw err
    }
  }

  /**
   * Persist the rename itself. Platforms that cannot fsync a directory skip
   * this. Returns the failure, if any; the new primary is already in place.
   */
  private async syncDirectory(): Promise<string | undefined> {
    let handle: fsp.FileHandle | undefined
    try {
      handle = await this.fs.open(this.dataDir, 'r')
      await handle.sync()
      return undefined
    } catch (err) {
      const code = errnoCode(err)
      if (code === 'EISDIR' || code === 'EINVAL' || code === 'EPERM' || code === 'EBADF') return undefined
      return `directory ${this.dataDir} could not be synced: ${describe(err)}`
    } finally {
      await handle?.close()
    }
  }

  /** Delete temporary files of writes that never reached their rename. */
  private async removeTempFiles(): Promise<string[]> {
    let names: string[]
    try {
      names = await this.fs.readdir(this.dataDir)
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return []
      throw err
    }

    const removed: string[] = []
    for (const name of names.filter((n) => TEMP_PATTERN.test(n)).sort()) {
      await this.fs.rm(join(this.dataDir, name), { force: true })
      removed.push(name)
    }
    return removed
  }

  private async pruneBackups(): Promise<{ pruned: string[]; failures: SaveResult['pruneFailures'] }> {
    const pruned: string[] = []
    const failures: SaveResult['pruneFailures'] = []
    const expired = (await this.listBackups()).slice(this.backupRetention)

    for (const file of expired) {
      try {
        await this.fs.rm(join(this.dataDir, file))
        pruned.push(file)
      } catch (err) {
        failures.push({ file, error: describe(err) })
      }
    }
    return { pruned, failures }
  }
}
