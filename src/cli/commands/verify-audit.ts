import type { Command } from 'commander'
import { verifyAuditChain } from '../../audit/index.js'
import { loadConfig } from '../../config/index.js'
import { DEFAULT_CONFIG_PATH } from '../config.js'
import { output } from '../output.js'

/**
 * Register the `verify-audit` command on the Commander program.
 *
 * Exit code 0 on a valid or empty chain, 1 on an integrity failure.
 */
export function registerVerifyAuditCommand(program: Command): void {
  program
    .command('verify-audit')
    .description('Verify audit log chain integrity')
    .option('-c, --config <path>', 'configuration file path', DEFAULT_CONFIG_PATH)
    .option('-p, --path <path>', 'explicit audit log file path (overrides config)')
    .action((options: { config: string; path?: string }) => {
      let auditPath: string

      if (options.path) {
        auditPath = options.path
      } else {
        try {
          auditPath = loadConfig(options.config).audit.path
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err)
          output.error(`Could not load configuration to determine audit log path (${reason}). Use --path to specify directly.`)
          process.exit(1)
          return
        }
      }

      const result = verifyAuditChain(auditPath)

      if (result.entries === 0 && result.valid) {
        output.info('Audit log is empty (no entries)')
        return
      }

      if (result.valid) {
        output.success(`Audit chain verified: ${result.entries} entries, chain intact`)
        return
      }

      output.error('Audit chain BROKEN')
      for (const e of result.errors) {
        output.error(`  Line ${e.line}: ${e.error}`)
      }
      output.info(`${result.entries} entries checked, ${result.errors.length} error(s) found`)
      process.exit(1)
    })
}
