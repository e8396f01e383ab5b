import { Type, type Static } from '@sinclair/typebox'

/** UUID string identifier (lowercase, as produced by crypto.randomUUID) */
export const UuidString = Type.String({
  pattern: '^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$',
})
export type UuidString = Static<typeof UuidString>

/** ISO 8601 timestamp string */
export const IsoDateString = Type.String({ minLength: 1 })
export type IsoDateString = Static<typeof IsoDateString>

/** Clinic-local wall-clock time, minute precision, no zone: 2025-11-25T09:00 */
export const LocalDateTimeString = Type.String({
  pattern: '^\\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\\d|3[01])T([01]\\d|2[0-3]):[0-5]\\d$',
})
export type LocalDateTimeString = Static<typeof LocalDateTimeString>

/** Opaque external identifier (patient, practitioner) */
export const ExternalId = Type.String({ minLength: 1, maxLength: 128 })
export type ExternalId = Static<typeof ExternalId>
