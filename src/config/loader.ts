import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { StoreConfigSchema, type StoreConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

/** Environment variables with this prefix override file values */
export const ENV_PREFIX = 'CLINIC_'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values;
 * arrays are replaced, not concatenated.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key]
    result[key] =
      isPlainObject(sourceVal) && isPlainObject(targetVal)
        ? deepMerge(targetVal, sourceVal)
        : sourceVal
  }
  return result
}

/** Environment values are strings; turn numerals and booleans into their types. */
function coerceValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false
  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)
  return value
}

function findCaseInsensitiveKey(obj: Record<string, unknown>, key: string): string {
  const lowerKey = key.toLowerCase()
  return Object.keys(obj).find((k) => k.toLowerCase() === lowerKey) ?? key
}

function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj
  for (const segment of path.slice(0, -1)) {
    const resolvedKey = findCaseInsensitiveKey(current, segment)
    const next = current[resolvedKey]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[resolvedKey] = created
      current = created
    }
  }
  current[findCaseInsensitiveKey(current, path[path.length - 1])] = value
}

/**
 * Apply CLINIC_ prefixed environment overrides. Double underscores nest:
 *   CLINIC_CACHE__TTLMS=60000 -> config.cache.ttlMs = 60000
 */
function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = key.slice(ENV_PREFIX.length).toLowerCase().split('__')
    setNestedValue(config, path, coerceValue(value))
  }
  return config
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

/**
 * Merge a parsed user config over defaults, apply env overrides, validate
 * and freeze. Separate from loadConfig so callers with an in-memory
 * config (tests, embedding applications) share the same pipeline.
 */
export function resolveConfig(
  userConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): StoreConfig {
  const defaults: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)
  const merged = applyEnvOverrides(deepMerge(defaults, structuredClone(userConfig)), env)

  if (!Value.Check(StoreConfigSchema, merged)) {
    const fields = [...Value.Errors(StoreConfigSchema, merged)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  return deepFreeze(merged)
}

/**
 * Load, validate, and return a frozen StoreConfig.
 *
 * Pipeline: read file -> parse JSON -> merge defaults -> apply env overrides
 *           -> validate against TypeBox schema -> freeze
 *
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): StoreConfig {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let userConfig: unknown
  try {
    userConfig = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isPlainObject(userConfig)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }

  return resolveConfig(userConfig, env)
}
