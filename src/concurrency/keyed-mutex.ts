/**
 * Per-key mutual exclusion.
 *
 * Each key has a promise chain; a task waits for the tail of its key's
 * chain and appends its own completion. Tasks on different keys never
 * wait on each other. Idle keys are removed so the map only holds keys
 * with work in flight.
 */

import { AbortedError } from '../store/errors.js'

function waitOrAbort(promise: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return promise
  if (signal.aborted) return Promise.reject(new AbortedError())

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => reject(new AbortedError())
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      () => {
        signal.removeEventListener('abort', onAbort)
        resolve()
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      },
    )
  })
}

export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>()

  /**
   * Run `fn` once every earlier task for `key` has finished.
   * Aborting while queued skips `fn` without holding up later tasks.
   */
  async runExclusive<T>(key: string, fn: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()

    let release: () => void = () => {}
    const done = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => done)
    this.tails.set(key, tail)

    try {
      await waitOrAbort(previous, signal)
      return await fn()
    } finally {
      release()
      if (this.tails.get(key) === tail) {
        this.tails.delete(key)
      }
    }
  }

  /** Whether any task currently holds or waits on `key`. */
  isLocked(key: string): boolean {
    return this.tails.has(key)
  }

  /** Number of keys with work in flight */
  get size(): number {
    return this.tails.size
  }
}
