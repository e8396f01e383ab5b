import { Type, type Static } from '@sinclair/typebox'
import { ExternalId, IsoDateString, LocalDateTimeString, UuidString } from './common.js'

/** Appointment status lifecycle */
export const AppointmentStatus = Type.Union([
  Type.Literal('scheduled'),
  Type.Literal('completed'),
  Type.Literal('cancelled'),
])
export type AppointmentStatus = Static<typeof AppointmentStatus>

/** Appointment schema */
export const AppointmentSchema = Type.Object(
  {
    id: UuidString,
    patient_id: ExternalId,
    practitioner_id: ExternalId,
    scheduled_start: LocalDateTimeString,
    status: AppointmentStatus,
    notes: Type.Optional(Type.String({ maxLength: 2000 })),
    created_at: IsoDateString,
    updated_at: IsoDateString,
  },
  { additionalProperties: false },
)
export type Appointment = Static<typeof AppointmentSchema>

/** Input for a new booking; the store assigns id, status and timestamps */
export const AppointmentDraftSchema = Type.Object(
  {
    patient_id: ExternalId,
    practitioner_id: ExternalId,
    scheduled_start: LocalDateTimeString,
    notes: Type.Optional(Type.String({ maxLength: 2000 })),
  },
  { additionalProperties: false },
)
export type AppointmentDraft = Static<typeof AppointmentDraftSchema>

/** Partial update; at least one field */
export const AppointmentChangesSchema = Type.Object(
  {
    patient_id: Type.Optional(ExternalId),
    practitioner_id: Type.Optional(ExternalId),
    scheduled_start: Type.Optional(LocalDateTimeString),
    status: Type.Optional(AppointmentStatus),
    /** null clears the notes */
    notes: Type.Optional(Type.Union([Type.String({ maxLength: 2000 }), Type.Null()])),
  },
  { additionalProperties: false, minProperties: 1 },
)
export type AppointmentChanges = Static<typeof AppointmentChangesSchema>

/** Filter for list(); from/to are inclusive bounds on scheduled_start */
export interface AppointmentFilter {
  patient_id?: string
  practitioner_id?: string
  status?: AppointmentStatus
  from?: string
  to?: string
}
