import { z } from 'zod'
import { EVENT_STATUSES } from '../types.js'

export const uuid = z.string().uuid('Must be a valid UUID')

export const time = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Time must be HH:MM')

export const isoDate = z.coerce.date({ invalid_type_error: 'Must be a valid date' })

export const availabilityWindow = z.object({
  weekday: z.number().int().min(0).max(6),
  start: time,
  end: time
})

export const profileLocation = z.object({
  city: z.string().trim().max(100).nullable().default(null),
  state: z.string().trim().max(100).nullable().default(null),
  latitude: z.number().min(-90).max(90).nullable().default(null),
  longitude: z.number().min(-180).max(180).nullable().default(null)
})

export const eventLocation = z.object({
  name: z.string().trim().min(1, 'Event location is required').max(200),
  address: z.string().trim().max(200).nullable().optional(),
  city: z.string().trim().max(100).nullable().optional(),
  state: z.string().trim().max(100).nullable().optional(),
  postalCode: z.string().trim().max(20).nullable().optional(),
  latitude: z.number().min(-90).max(90).nullable().optional(),
  longitude: z.number().min(-180).max(180).nullable().optional()
})

export const notificationPreferences = z.object({
  email: z.boolean(),
  sms: z.boolean(),
  push: z.boolean(),
  inApp: z.boolean()
}).partial()

export const eventStatus = z.enum(EVENT_STATUSES)

/** `?skills=a,b` or repeated `?skills=a&skills=b`. */
export const csvList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value : value.split(',')))
  .transform((values) => values.map((value) => value.trim()).filter((value) => value.length > 0))

export const limit = (max: number) => z.coerce.number().int().min(1).max(max)

export const flag = z.enum(['true', 'false']).transform((value) => value === 'true')
