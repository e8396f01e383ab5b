import type { Command } from 'commander'
import { SnapshotFileStore } from '../../durable/index.js'
import { DEFAULT_CONFIG_PATH, loadConfigForCommand } from '../config.js'
import { output } from '../output.js'

/**
 * Register the `backups` command on the Commander program.
 */
export function registerBackupsCommand(program: Command): void {
  program
    .command('backups')
    .description('List snapshot backups, newest first')
    .option('-c, --config <path>', 'configuration file path', DEFAULT_CONFIG_PATH)
    .action(async (options: { config: string }) => {
      const config = loadConfigForCommand(options.config)
      if (!config) return

      const files = new SnapshotFileStore({
        dataDir: config.storage.dataDir,
        backupRetention: config.storage.backupRetention,
      })
      const backups = await files.listBackups()

      if (backups.length === 0) {
        output.info('No backups found')
        return
      }
      output.table(backups.map((name) => ({ Backup: name })))
    })
}
