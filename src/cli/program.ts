import { Command } from 'commander'
import { registerInitCommand } from './commands/init.js'
import { registerInspectCommand } from './commands/inspect.js'
import { registerListCommand } from './commands/list.js'
import { registerBackupsCommand } from './commands/backups.js'
import { registerRestoreCommand } from './commands/restore.js'
import { registerVerifyAuditCommand } from './commands/verify-audit.js'

export function createProgram(): Command {
  const program = new Command()

  program
    .name('clinic-store')
    .description('Operator tools for the clinic appointment store')
    .version('0.1.0')

  registerInitCommand(program)
  registerInspectCommand(program)
  registerListCommand(program)
  registerBackupsCommand(program)
  registerRestoreCommand(program)
  registerVerifyAuditCommand(program)

  return program
}
