/**
 * Booking rules applied inside the store's write critical section.
 *
 * The store owns consistency; a policy owns what counts as a clash.
 * Policies see the full in-memory snapshot, so a check and the write it
 * guards cannot interleave with another booking.
 */

import { ConflictError } from '../store/errors.js'
import type { Appointment } from '../types/appointment.js'

export interface BookingPolicy {
  /**
   * Throw ConflictError if `candidate` may not be stored alongside
   * `existing`. `existing` includes the previous version of `candidate`
   * on updates; policies skip records with the candidate's id.
   */
  check(candidate: Appointment, existing: Iterable<Appointment>): void
}

/**
 * One practitioner, one patient per start time. Cancelled bookings free
 * their slot; completed ones keep it.
 */
export class SlotConflictPolicy implements BookingPolicy {
  check(candidate: Appointment, existing: Iterable<Appointment>): void {
    if (candidate.status === 'cancelled') return

    for (const other of existing) {
      if (other.id === candidate.id || other.status === 'cancelled') continue
      if (
        other.practitioner_id === candidate.practitioner_id &&
        other.scheduled_start === candidate.scheduled_start
      ) {
        throw new ConflictError(
          `Practitioner ${candidate.practitioner_id} is already booked at ${candidate.scheduled_start}`,
          other.id,
        )
      }
    }
  }
}

/** Policy that accepts everything; for stores whose caller enforces its own rules. */
export const allowAllPolicy: BookingPolicy = {
  check: () => undefined,
}
