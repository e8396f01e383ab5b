import type { Command } from 'commander'
import { SnapshotFileStore } from '../../durable/index.js'
import { openAppointmentStore } from '../../store/index.js'
import { DEFAULT_CONFIG_PATH, loadConfigForCommand } from '../config.js'
import { output } from '../output.js'

/**
 * Register the `inspect` command on the Commander program.
 *
 * Opens the store read-only, leaving the data directory and audit log
 * untouched, and prints record counts,
 * snapshot file details, backups and how the state was loaded.
 */
export function registerInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Show store health, record counts and snapshot details')
    .option('-c, --config <path>', 'configuration file path', DEFAULT_CONFIG_PATH)
    .action(async (options: { config: string }) => {
      const config = loadConfigForCommand(options.config)
      if (!config) return

      const files = new SnapshotFileStore({
        dataDir: config.storage.dataDir,
        backupRetention: config.storage.backupRetention,
      })
      const store = await openAppointmentStore(config, { readOnly: true })
      const stats = await store.stats()
      const primary = await files.fileInfo()
      const backups = await files.listBackups()

      output.info('Clinic Store Status')
      output.info('')
      output.info(`Data directory: ${config.storage.dataDir}`)
      output.info(`Health: ${stats.health}`)
      output.info(`Loaded from: ${stats.loadedFrom}`)
      if (primary.exists) {
        output.info(`Primary: ${primary.path} (${primary.sizeBytes ?? 0} bytes, modified ${primary.modifiedAt ?? 'unknown'})`)
      } else {
        output.info(`Primary: ${primary.path} (missing)`)
      }
      output.info(`Last written: ${stats.lastWrittenAt}`)
      output.info(`Backups: ${backups.length}`)
      output.info('')
      output.info(`Appointments: ${stats.total}`)
      output.table(
        Object.entries(stats.byStatus).map(([status, count]) => ({
          Status: status,
          Count: String(count),
        })),
      )

      if (stats.loadedFrom === 'backup') {
        output.warn('Primary snapshot was rejected; state was recovered from a backup')
      }
      if (stats.health === 'degraded') {
        output.error('No valid snapshot could be loaded. Restore a backup with: clinic-store restore <backup>')
        process.exit(1)
      }
    })
}
