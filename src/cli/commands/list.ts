import type { Command } from 'commander'
import { Value } from '@sinclair/typebox/value'
import { openAppointmentStore } from '../../store/index.js'
import { AppointmentStatus, type AppointmentFilter } from '../../types/appointment.js'
import { DEFAULT_CONFIG_PATH, loadConfigForCommand } from '../config.js'
import { output } from '../output.js'

interface ListOptions {
  config: string
  patient?: string
  practitioner?: string
  status?: string
}

/**
 * Register the `list` command on the Commander program.
 *
 * Prints matching appointments in schedule order.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List appointments')
    .option('-c, --config <path>', 'configuration file path', DEFAULT_CONFIG_PATH)
    .option('--patient <id>', 'only appointments for this patient')
    .option('--practitioner <id>', 'only appointments with this practitioner')
    .option('--status <status>', 'scheduled, completed or cancelled')
    .action(async (options: ListOptions) => {
      const filter: AppointmentFilter = {}
      if (options.patient) filter.patient_id = options.patient
      if (options.practitioner) filter.practitioner_id = options.practitioner
      if (options.status !== undefined) {
        if (!Value.Check(AppointmentStatus, options.status)) {
          output.error(`Unknown status: ${options.status} (expected scheduled, completed or cancelled)`)
          process.exit(1)
          return
        }
        filter.status = options.status
      }

      const config = loadConfigForCommand(options.config)
      if (!config) return

      const store = await openAppointmentStore(config, { readOnly: true })
      const appointments = await store.list(filter)

      if (appointments.length === 0) {
        output.info('No appointments found')
        return
      }

      output.table(
        appointments.map((a) => ({
          ID: a.id,
          Start: a.scheduled_start,
          Patient: a.patient_id,
          Practitioner: a.practitioner_id,
          Status: a.status,
        })),
      )
      output.info('')
      output.info(`${appointments.length} appointment(s)`)
    })
}
