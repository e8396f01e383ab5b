export { SlotConflictPolicy, allowAllPolicy } from './booking-policy.js'
export type { BookingPolicy } from './booking-policy.js'
