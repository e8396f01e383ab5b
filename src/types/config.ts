import { Type, type Static } from '@sinclair/typebox'

/** Store configuration schema for clinic-store.config.json */
export const StoreConfigSchema = Type.Object({
  cache: Type.Object({
    capacity: Type.Integer({ minimum: 0, default: 1000 }),
    ttlMs: Type.Integer({ minimum: 1, default: 300000 }),
  }),
  storage: Type.Object({
    dataDir: Type.String({ minLength: 1, default: './data' }),
    backupRetention: Type.Integer({ minimum: 0, maximum: 1000, default: 5 }),
  }),
  maintenance: Type.Object({
    sweepIntervalMs: Type.Integer({ minimum: 100, default: 30000 }),
    flushIntervalMs: Type.Integer({ minimum: 1000, default: 300000 }),
  }),
  audit: Type.Object({
    path: Type.String({ minLength: 1, default: './data/audit.jsonl' }),
    enabled: Type.Boolean({ default: true }),
  }),
})

export type StoreConfig = Static<typeof StoreConfigSchema>
