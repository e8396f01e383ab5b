/**
 * Fair readers-writer lock for async tasks.
 *
 * Requests queue in arrival order. Consecutive readers at the head of the
 * queue are granted together; a writer is granted only when nothing holds
 * the lock. Because readers never overtake a queued writer, a writer waits
 * only for the readers that were active or queued ahead of it.
 */

import { AbortedError } from '../store/errors.js'

/** Releases a granted lock. Calling it more than once is a no-op. */
export type Release = () => void

type LockMode = 'read' | 'write'

interface Waiter {
  mode: LockMode
  grant: (release: Release) => void
  detach?: () => void
}

export interface LockState {
  readers: number
  writer: boolean
  queued: number
}

export class ReadWriteLock {
  private activeReaders = 0
  private writerActive = false
  private readonly queue: Waiter[] = []

  acquireRead(signal?: AbortSignal): Promise<Release> {
    return this.enqueue('read', signal)
  }

  acquireWrite(signal?: AbortSignal): Promise<Release> {
    return this.enqueue('write', signal)
  }

  /** Run `fn` while holding a shared lock. */
  async withRead<T>(fn: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquireRead(signal)
    try {
      return await fn()
    } finally {
      release()
    }
  }

  /** Run `fn` while holding the exclusive lock. */
  async withWrite<T>(fn: () => T | Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquireWrite(signal)
    try {
      return await fn()
    } finally {
      release()
    }
  }

  state(): LockState {
    return {
      readers: this.activeReaders,
      writer: this.writerActive,
      queued: this.queue.length,
    }
  }

  private enqueue(mode: LockMode, signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) {
      return Promise.reject(new AbortedError())
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = { mode, grant: resolve }

      if (signal) {
        const onAbort = () => {
          const index = this.queue.indexOf(waiter)
          if (index === -1) return
          this.queue.splice(index, 1)
          reject(new AbortedError())
          // A departing writer may have been holding back readers behind it
          this.drain()
        }
        signal.addEventListener('abort', onAbort, { once: true })
        waiter.detach = () => signal.removeEventListener('abort', onAbort)
      }

      this.queue.push(waiter)
      this.drain()
    })
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const head = this.queue[0]

      if (head.mode === 'write') {
        if (this.writerActive || this.activeReaders > 0) return
        this.queue.shift()
        this.writerActive = true
        head.detach?.()
        head.grant(this.releaser('write'))
        return
      }

      if (this.writerActive) return
      this.queue.shift()
      this.activeReaders++
      head.detach?.()
      head.grant(this.releaser('read'))
    }
  }

  private releaser(mode: LockMode): Release {
    let released = false
    return () => {
      if (released) return
      released = true
      if (mode === 'read') {
        this.activeReaders--
      } else {
        this.writerActive = false
      }
      this.drain()
    }
  }
}
