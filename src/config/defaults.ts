import type { StoreConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: StoreConfig = {
  cache: {
    capacity: 1000,
    ttlMs: 300_000,
  },
  storage: {
    dataDir: './data',
    backupRetention: 5,
  },
  maintenance: {
    sweepIntervalMs: 30_000,
    flushIntervalMs: 300_000,
  },
  audit: {
    path: './data/audit.jsonl',
    enabled: true,
  },
}
