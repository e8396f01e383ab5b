/**
 * Background maintenance: periodic cache sweep and periodic snapshot flush.
 *
 * Each task re-arms its own timeout after a run settles, so a slow flush
 * never overlaps the next one. Both go through the store's public
 * operations and therefore take the same locks as request handlers.
 * Timers are unref'd and never keep the process alive.
 */

import {
  appendSafely,
  noopAuditSink,
  type AuditErrorHandler,
  type AuditEvent,
  type AuditSink,
} from '../audit/index.js'

export type MaintenanceTask = 'sweep' | 'flush'

/** What the scheduler needs from a store */
export interface MaintenanceTarget {
  sweepCache(): Promise<number>
  flush(): Promise<unknown>
}

export interface MaintenanceOptions {
  sweepIntervalMs: number
  flushIntervalMs: number
  audit?: AuditSink
  /** Receives a failure audit that could not be written; defaults to a stderr warning */
  onAuditError?: AuditErrorHandler
  /** Called after a failed run has been audited */
  onError?: (task: MaintenanceTask, err: unknown) => void
  getNow?: () => Date
}

export interface MaintenanceStatus {
  running: boolean
  sweeps: number
  flushes: number
  failures: number
  evicted: number
  lastSweepAt?: string
  lastFlushAt?: string
  lastError?: string
}

export class MaintenanceScheduler {
  private readonly timers = new Map<MaintenanceTask, ReturnType<typeof setTimeout>>()
  private readonly inFlight = new Set<Promise<void>>()
  private readonly audit: AuditSink
  private readonly getNow: () => Date
  private running = false
  private readonly counters: MaintenanceStatus = {
    running: false,
    sweeps: 0,
    flushes: 0,
    failures: 0,
    evicted: 0,
  }

  constructor(
    private readonly target: MaintenanceTarget,
    private readonly options: MaintenanceOptions,
  ) {
    this.audit = options.audit ?? noopAuditSink
    this.getNow = options.getNow ?? (() => new Date())
  }

  /** Arm both tasks. The first sweep and flush fire one interval from now. */
  start(): void {
    if (this.running) return
    this.running = true
    this.schedule('sweep')
    this.schedule('flush')
  }

  /** Disarm timers and wait for any run already in progress. */
  async stop(): Promise<void> {
    this.running = false
    for (const timer of this.timers.values()) {
      clearTimeout(timer)
    }
    this.timers.clear()
    await Promise.all([...this.inFlight])
  }

  /** Run a sweep now, outside the schedule. */
  runSweep(): Promise<void> {
    return this.track('sweep')
  }

  /** Run a flush now, outside the schedule. */
  runFlush(): Promise<void> {
    return this.track('flush')
  }

  status(): MaintenanceStatus {
    return { ...this.counters, running: this.running }
  }

  private intervalOf(task: MaintenanceTask): number {
    return task === 'sweep' ? this.options.sweepIntervalMs : this.options.flushIntervalMs
  }

  /** Arm `task` unless it is already armed, e.g. by a restart while its last run was in flight. */
  private schedule(task: MaintenanceTask): void {
    if (this.timers.has(task)) return
    const timer = setTimeout(() => {
      this.timers.delete(task)
      void this.track(task).finally(() => {
        if (this.running) this.schedule(task)
      })
    }, this.intervalOf(task))
    timer.unref()
    this.timers.set(task, timer)
  }

  private async track(task: MaintenanceTask): Promise<void> {
    const run = this.execute(task)
    this.inFlight.add(run)
    try {
      await run
    } finally {
      this.inFlight.delete(run)
    }
  }

  /**
   * Run one task. Failures are audited and reported, never thrown into the
   * timer. A reporting step that throws is written to stderr.
   */
  private async execute(task: MaintenanceTask): Promise<void> {
    try {
      if (task === 'sweep') {
        this.counters.evicted += await this.target.sweepCache()
        this.counters.sweeps++
        this.counters.lastSweepAt = this.getNow().toISOString()
      } else {
        await this.target.flush()
        this.counters.flushes++
        this.counters.lastFlushAt = this.getNow().toISOString()
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      this.counters.failures++
      this.counters.lastError = `${task}: ${message}`
      this.report(task, err, message)
    }
  }

  private report(task: MaintenanceTask, err: unknown, message: string): void {
    const event: AuditEvent = { category: 'maintenance', action: `${task}_failed`, details: { error: message } }
    const warn = (what: string, failure: unknown) => {
      const detail = failure instanceof Error ? failure.message : String(failure)
      process.stderr.write(`Warning: maintenance ${task} failure ${what}: ${detail}\n`)
    }

    try {
      appendSafely(this.audit, event, this.options.onAuditError)
    } catch (auditErr) {
      warn('not audited', auditErr)
    }
    try {
      this.options.onError?.(task, err)
    } catch (hookErr) {
      warn('handler threw', hookErr)
    }
  }
}
