import { describe, it, expect } from 'vitest'
import {
  applyChanges,
  canTransition,
  changesSlot,
  createAppointment,
  isTerminal,
} from './appointment.js'
import { InvalidTransitionError, ValidationError } from '../store/errors.js'
import type { AppointmentChanges, AppointmentDraft } from '../types/appointment.js'

const ID = '00000000-0000-4000-8000-000000000001'
const CREATED = new Date('2026-01-05T08:00:00.000Z')
const LATER = new Date('2026-01-05T08:30:00.000Z')

const draft: AppointmentDraft = {
  patient_id: 'patient-1',
  practitioner_id: 'dr-lee',
  scheduled_start: '2026-01-12T09:00',
}

describe('status transitions', () => {
  it('should allow scheduled to move to completed or cancelled', () => {
    expect(canTransition('scheduled', 'completed')).toBe(true)
    expect(canTransition('scheduled', 'cancelled')).toBe(true)
    expect(canTransition('scheduled', 'scheduled')).toBe(true)
  })

  it('should allow nothing out of a terminal status', () => {
    expect(canTransition('completed', 'scheduled')).toBe(false)
    expect(canTransition('completed', 'cancelled')).toBe(false)
    expect(canTransition('cancelled', 'scheduled')).toBe(false)
    expect(canTransition('cancelled', 'cancelled')).toBe(false)
  })

  it('should mark completed and cancelled as terminal', () => {
    expect(isTerminal('scheduled')).toBe(false)
    expect(isTerminal('completed')).toBe(true)
    expect(isTerminal('cancelled')).toBe(true)
  })
})

describe('createAppointment', () => {
  it('should build a frozen scheduled record with matching timestamps', () => {
    const appointment = createAppointment(draft, CREATED, ID)
    expect(appointment).toEqual({
      id: ID,
      patient_id: 'patient-1',
      practitioner_id: 'dr-lee',
      scheduled_start: '2026-01-12T09:00',
      status: 'scheduled',
      created_at: '2026-01-05T08:00:00.000Z',
      updated_at: '2026-01-05T08:00:00.000Z',
    })
    expect(Object.isFrozen(appointment)).toBe(true)
  })

  it('should keep notes when given', () => {
    expect(createAppointment({ ...draft, notes: 'fasting' }, CREATED, ID).notes).toBe('fasting')
  })

  it('should assign a random UUID by default', () => {
    const a = createAppointment(draft)
    const b = createAppointment(draft)
    expect(a.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/)
    expect(a.id).not.toBe(b.id)
  })

  it('should reject an empty patient id with the field path', () => {
    try {
      createAppointment({ ...draft, patient_id: '' }, CREATED, ID)
      expect.fail('Should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError)
      if (!(err instanceof ValidationError)) return
      expect(err.code).toBe('VALIDATION')
      expect(err.fields.map((f) => f.path)).toContain('/patient_id')
    }
  })

  it('should reject a start time with a zone or seconds', () => {
    expect(() => createAppointment({ ...draft, scheduled_start: '2026-01-12T09:00Z' })).toThrow(ValidationError)
    expect(() => createAppointment({ ...draft, scheduled_start: '2026-01-12T09:00:00' })).toThrow(ValidationError)
    expect(() => createAppointment({ ...draft, scheduled_start: '2026-13-12T09:00' })).toThrow(ValidationError)
  })
})

describe('applyChanges', () => {
  const scheduled = createAppointment(draft, CREATED, ID)

  it('should return a new frozen record and bump updated_at', () => {
    const next = applyChanges(scheduled, { scheduled_start: '2026-01-12T10:00' }, LATER)
    expect(next).not.toBe(scheduled)
    expect(next.scheduled_start).toBe('2026-01-12T10:00')
    expect(next.created_at).toBe('2026-01-05T08:00:00.000Z')
    expect(next.updated_at).toBe('2026-01-05T08:30:00.000Z')
    expect(next.id).toBe(ID)
    expect(Object.isFrozen(next)).toBe(true)
    expect(scheduled.scheduled_start).toBe('2026-01-12T09:00')
  })

  it('should clear notes given null and keep them when omitted', () => {
    const annotated = applyChanges(scheduled, { notes: 'fasting' }, LATER)
    expect(applyChanges(annotated, { practitioner_id: 'dr-ng' }, LATER).notes).toBe('fasting')

    const cleared = applyChanges(annotated, { notes: null }, LATER)
    expect(cleared.notes).toBeUndefined()
    expect('notes' in cleared).toBe(false)
  })

  it('should move scheduled to completed', () => {
    expect(applyChanges(scheduled, { status: 'completed' }, LATER).status).toBe('completed')
  })

  it('should reject any change to a completed record', () => {
    const completed = applyChanges(scheduled, { status: 'completed' }, LATER)
    expect(() => applyChanges(completed, { notes: 'late note' }, LATER)).toThrow(
      `Appointment ${ID} is completed and can no longer be modified`,
    )
    expect(() => applyChanges(completed, { status: 'scheduled' }, LATER)).toThrow(InvalidTransitionError)
  })

  it('should report from and to on a rejected transition', () => {
    const cancelled = applyChanges(scheduled, { status: 'cancelled' }, LATER)
    try {
      applyChanges(cancelled, { status: 'completed' }, LATER)
      expect.fail('Should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidTransitionError)
      if (!(err instanceof InvalidTransitionError)) return
      expect(err.from).toBe('cancelled')
      expect(err.to).toBe('completed')
      expect(err.code).toBe('INVALID_TRANSITION')
    }
  })

  it('should reject an empty change set', () => {
    expect(() => applyChanges(scheduled, {}, LATER)).toThrow(ValidationError)
  })

  it('should reject unknown fields such as id', () => {
    const fromRequestBody: AppointmentChanges = JSON.parse('{"id":"other"}')
    expect(() => applyChanges(scheduled, fromRequestBody, LATER)).toThrow(ValidationError)
  })
})

describe('changesSlot', () => {
  const current = createAppointment(draft, CREATED, ID)

  it('should detect a moved start time or practitioner', () => {
    expect(changesSlot(current, applyChanges(current, { scheduled_start: '2026-01-12T11:00' }, LATER))).toBe(true)
    expect(changesSlot(current, applyChanges(current, { practitioner_id: 'dr-ng' }, LATER))).toBe(true)
  })

  it('should ignore note and status changes', () => {
    expect(changesSlot(current, applyChanges(current, { notes: 'bring x-rays' }, LATER))).toBe(false)
    expect(changesSlot(current, applyChanges(current, { status: 'cancelled' }, LATER))).toBe(false)
  })
})

