import express from 'express'
import { z } from 'zod'
import { requireRole, requireUser } from '../middleware/auth.js'
import { asyncHandler } from '../middleware/async-handler.js'
import { parse } from '../middleware/validate.js'
import type { Services } from '../services/index.js'
import { UPCOMING_LIMIT } from '../services/events.js'
import { idParam } from './params.js'
import { csvList, eventLocation, eventStatus, isoDate, limit } from './schemas.js'

const eventSchema = z.object({
  title: z.string().trim().min(1).max(100),
  description: z.string().trim().min(1).max(500),
  location: eventLocation,
  requiredSkills: z.array(z.string().trim().min(1)).min(1, 'At least one required skill must be specified'),
  startsAt: isoDate,
  endsAt: isoDate.nullable().optional(),
  capacity: z.number().int().positive().nullable().optional()
})

const updateEventSchema = eventSchema.partial()

const listQuerySchema = z.object({
  status: eventStatus.optional()
})

const upcomingQuerySchema = z.object({
  limit: limit(UPCOMING_LIMIT).default(UPCOMING_LIMIT)
})

const searchQuerySchema = z.object({
  skills: csvList.optional(),
  city: z.string().trim().min(1).optional(),
  state: z.string().trim().min(1).optional(),
  status: eventStatus.optional()
})

const cancelSchema = z.object({
  reason: z.string().trim().max(500).optional()
}).default({})

const reminderSchema = z.object({
  hoursBefore: z.number().int().positive().default(24)
}).default({})

export function createEventsRouter({ events }: Services) {
  const router = express.Router()
  const staff = requireRole('organizer', 'admin')

  router.get('/', asyncHandler(async (req, res) => {
    const { status } = parse(listQuerySchema, req.query)
    const list = await events.list(status)
    res.json({ events: list, total: list.length })
  }))

  router.get('/published', asyncHandler(async (_req, res) => {
    const list = await events.published()
    res.json({ events: list, total: list.length })
  }))

  router.get('/upcoming', asyncHandler(async (req, res) => {
    const query = parse(upcomingQuerySchema, req.query)
    const list = await events.upcoming(query.limit)
    res.json({ events: list, total: list.length })
  }))

  router.get('/search', asyncHandler(async (req, res) => {
    const list = await events.search(parse(searchQuerySchema, req.query))
    res.json({ events: list, total: list.length })
  }))

  router.get('/:eventId', asyncHandler(async (req, res) => {
    res.json(await events.get(idParam(req, 'eventId')))
  }))

  router.post('/', staff, asyncHandler(async (req, res) => {
    const input = parse(eventSchema, req.body)
    res.status(201).json(await events.create(input, requireUser(req).id))
  }))

  router.put('/:eventId', staff, asyncHandler(async (req, res) => {
    const eventId = idParam(req, 'eventId')
    res.json(await events.update(eventId, parse(updateEventSchema, req.body)))
  }))

  router.post('/:eventId/publish', staff, asyncHandler(async (req, res) => {
    const event = await events.publish(idParam(req, 'eventId'))
    res.json({ message: 'Event published successfully', event })
  }))

  router.post('/:eventId/cancel', staff, asyncHandler(async (req, res) => {
    const eventId = idParam(req, 'eventId')
    const { reason } = parse(cancelSchema, req.body)
    const event = await events.cancel(eventId, reason)
    res.json({ message: 'Event cancelled successfully', event })
  }))

  router.post('/:eventId/reminders', staff, asyncHandler(async (req, res) => {
    const eventId = idParam(req, 'eventId')
    const { hoursBefore } = parse(reminderSchema, req.body)
    const sent = await events.sendReminders(eventId, hoursBefore)
    res.json({ message: `Sent ${sent} reminders`, sent })
  }))

  router.delete('/:eventId', staff, asyncHandler(async (req, res) => {
    await events.delete(idParam(req, 'eventId'))
    res.json({ message: 'Event deleted successfully' })
  }))

  return router
}
