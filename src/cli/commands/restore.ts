import type { Command } from 'commander'
import { SnapshotFileStore } from '../../durable/index.js'
import { createAuditSink, CorruptStoreError, StoreWriteError } from '../../store/index.js'
import { DEFAULT_CONFIG_PATH, loadConfigForCommand } from '../config.js'
import { output } from '../output.js'

/**
 * Register the `restore` command on the Commander program.
 *
 * Validates the named backup and makes it the primary snapshot. The store
 * must be reopened by any running process afterwards.
 */
export function registerRestoreCommand(program: Command): void {
  program
    .command('restore')
    .description('Restore a snapshot backup over the primary')
    .argument('<backup>', 'backup file name, as shown by `backups`')
    .option('-c, --config <path>', 'configuration file path', DEFAULT_CONFIG_PATH)
    .action(async (backup: string, options: { config: string }) => {
      const config = loadConfigForCommand(options.config)
      if (!config) return

      const files = new SnapshotFileStore({
        dataDir: config.storage.dataDir,
        backupRetention: config.storage.backupRetention,
      })

      try {
        const result = await files.restoreBackup(backup)
        createAuditSink(config).append({
          category: 'admin',
          action: 'backup_restored',
          details: { backup, path: result.path, bytes: result.bytes },
        })
        output.success(`Restored ${backup} to ${result.path}`)
      } catch (err) {
        if (err instanceof RangeError || err instanceof CorruptStoreError || err instanceof StoreWriteError) {
          output.error(err.message)
          process.exit(1)
          return
        }
        throw err
      }
    })
}
