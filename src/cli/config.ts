import { loadConfig, ConfigError } from '../config/index.js'
import type { StoreConfig } from '../types/config.js'
import { output } from './output.js'

export const DEFAULT_CONFIG_PATH = 'clinic-store.config.json'

/**
 * Load configuration for a command, reporting field-level problems.
 * Returns undefined after setting a failing exit code.
 */
export function loadConfigForCommand(configPath: string): StoreConfig | undefined {
  try {
    return loadConfig(configPath)
  } catch (err) {
    if (err instanceof ConfigError) {
      output.error(err.message)
      process.exit(1)
      return undefined
    }
    throw err
  }
}
