export { ReadWriteLock } from './rw-lock.js'
export type { Release, LockState } from './rw-lock.js'
export { KeyedMutex } from './keyed-mutex.js'
