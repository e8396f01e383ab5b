/**
 * Appointment record model: validation, construction and status transitions.
 *
 * Records leave this module frozen. Status only moves forward out of
 * `scheduled`; `completed` and `cancelled` are terminal and immutable.
 */

import { randomUUID } from 'node:crypto'
import type { TSchema, Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import {
  AppointmentChangesSchema,
  AppointmentDraftSchema,
  type Appointment,
  type AppointmentChanges,
  type AppointmentDraft,
  type AppointmentStatus,
} from '../types/appointment.js'
import { InvalidTransitionError, ValidationError } from '../store/errors.js'

/** Allowed forward transitions out of each status */
const TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
  scheduled: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
}

export function isTerminal(status: AppointmentStatus): boolean {
  return TRANSITIONS[status].length === 0
}

/**
 * Whether `from -> to` is a legal status change.
 * Staying in `scheduled` is a no-op and allowed; staying in a terminal status is not.
 */
export function canTransition(from: AppointmentStatus, to: AppointmentStatus): boolean {
  if (from === to) return !isTerminal(from)
  return TRANSITIONS[from].includes(to)
}

/** Validate a value against a schema, throwing ValidationError with field paths. */
export function assertValid<T extends TSchema>(
  schema: T,
  value: unknown,
  label: string,
): asserts value is Static<T> {
  if (Value.Check(schema, value)) return
  const fields = [...Value.Errors(schema, value)].map((e) => ({
    path: e.path,
    message: e.message,
  }))
  const fieldMessages = fields.map((f) => `  - ${f.path || '/'}: ${f.message}`).join('\n')
  throw new ValidationError(`Invalid ${label}:\n${fieldMessages}`, fields)
}

/** Build a new `scheduled` appointment from a validated draft. */
export function createAppointment(
  draft: AppointmentDraft,
  now: Date = new Date(),
  id: string = randomUUID(),
): Appointment {
  assertValid(AppointmentDraftSchema, draft, 'appointment draft')

  const timestamp = now.toISOString()
  const appointment: Appointment = {
    id,
    patient_id: draft.patient_id,
    practitioner_id: draft.practitioner_id,
    scheduled_start: draft.scheduled_start,
    status: 'scheduled',
    created_at: timestamp,
    updated_at: timestamp,
  }
  if (draft.notes !== undefined) {
    appointment.notes = draft.notes
  }

  return Object.freeze(appointment)
}

/**
 * Apply a change set to an existing appointment, returning a new frozen record.
 *
 * Terminal records reject every change. A status change must be a legal
 * forward transition.
 */
export function applyChanges(
  current: Appointment,
  changes: AppointmentChanges,
  now: Date = new Date(),
): Appointment {
  assertValid(AppointmentChangesSchema, changes, 'appointment changes')

  const nextStatus = changes.status ?? current.status
  if (isTerminal(current.status)) {
    throw new InvalidTransitionError(
      current.status,
      nextStatus,
      `Appointment ${current.id} is ${current.status} and can no longer be modified`,
    )
  }
  if (!canTransition(current.status, nextStatus)) {
    throw new InvalidTransitionError(current.status, nextStatus)
  }

  const next: Appointment = {
    ...current,
    patient_id: changes.patient_id ?? current.patient_id,
    practitioner_id: changes.practitioner_id ?? current.practitioner_id,
    scheduled_start: changes.scheduled_start ?? current.scheduled_start,
    status: nextStatus,
    updated_at: now.toISOString(),
  }
  if (changes.notes === null) {
    delete next.notes
  } else if (changes.notes !== undefined) {
    next.notes = changes.notes
  }

  return Object.freeze(next)
}

/** Whether the change set moves the booking to another slot or practitioner. */
export function changesSlot(current: Appointment, next: Appointment): boolean {
  return (
    current.scheduled_start !== next.scheduled_start ||
    current.practitioner_id !== next.practitioner_id
  )
}

