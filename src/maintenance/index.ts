export { MaintenanceScheduler } from './scheduler.js'
export type {
  MaintenanceTask,
  MaintenanceTarget,
  MaintenanceOptions,
  MaintenanceStatus,
} from './scheduler.js'
