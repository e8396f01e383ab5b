import { existsSync, writeFileSync } from 'node:fs'
import type { Command } from 'commander'
import { DEFAULT_CONFIG } from '../../config/index.js'
import { DEFAULT_CONFIG_PATH } from '../config.js'
import { output } from '../output.js'

/**
 * Register the `init` command on the Commander program.
 *
 * Writes a starter configuration holding every default.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a default store configuration file')
    .option('-c, --config <path>', 'configuration file path', DEFAULT_CONFIG_PATH)
    .action((options: { config: string }) => {
      const configPath = options.config

      if (existsSync(configPath)) {
        output.warn(`Configuration file already exists: ${configPath}`)
        output.warn('Use a different path with --config or remove the existing file.')
        process.exit(1)
        return
      }

      writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n')
      output.info(`Configuration written to ${configPath}`)
      output.info(`Snapshots will be stored in ${DEFAULT_CONFIG.storage.dataDir}`)
    })
}
