import express from 'express'
import { z } from 'zod'
import { assertSelfOrStaff, requireRole, requireUser } from '../middleware/auth.js'
import { asyncHandler } from '../middleware/async-handler.js'
import { parse } from '../middleware/validate.js'
import type { Services } from '../services/index.js'
import { idParam, ownUserParam } from './params.js'
import { isoDate, limit, uuid } from './schemas.js'

const entrySchema = z.object({
  userId: uuid,
  eventId: uuid,
  role: z.string().trim().min(1).max(100),
  hours: z.number().positive().max(24),
  date: isoDate,
  notes: z.string().trim().max(1000).nullable().optional()
})

const updateEntrySchema = entrySchema.omit({ userId: true, eventId: true }).partial()

const recentQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(3650).default(30)
})

const topQuerySchema = z.object({
  limit: limit(100).default(10)
})

const periodQuerySchema = z.object({
  start: isoDate,
  end: isoDate
})

const yearParamSchema = z.object({
  year: z.coerce.number().int().min(1900).max(9999)
})

export function createVolunteerHistoryRouter({ history }: Services) {
  const router = express.Router()
  const staff = requireRole('organizer', 'admin')

  router.get('/', staff, asyncHandler(async (req, res) => {
    const { days } = parse(recentQuerySchema, req.query)
    const entries = await history.recent(days)
    res.json({ entries, total: entries.length })
  }))

  router.post('/', staff, asyncHandler(async (req, res) => {
    res.status(201).json(await history.create(parse(entrySchema, req.body)))
  }))

  router.get('/top-volunteers/by-hours', staff, asyncHandler(async (req, res) => {
    const query = parse(topQuerySchema, req.query)
    const ranking = await history.topVolunteersByHours(query.limit)
    res.json(ranking.map(({ userId, value }) => ({ userId, totalHours: value })))
  }))

  router.get('/top-volunteers/by-events', staff, asyncHandler(async (req, res) => {
    const query = parse(topQuerySchema, req.query)
    const ranking = await history.topVolunteersByEvents(query.limit)
    res.json(ranking.map(({ userId, value }) => ({ userId, eventCount: value })))
  }))

  router.get('/user/:userId', asyncHandler(async (req, res) => {
    const entries = await history.byUser(ownUserParam(req))
    res.json({ entries, total: entries.length })
  }))

  router.get('/user/:userId/total-hours', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json({ userId, totalHours: await history.totalHours(userId) })
  }))

  router.get('/user/:userId/hours-in-period', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    const { start, end } = parse(periodQuerySchema, req.query)
    res.json({ userId, start, end, hours: await history.hoursInPeriod(userId, start, end) })
  }))

  router.get('/user/:userId/event-count', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json({ userId, eventCount: await history.eventCount(userId) })
  }))

  router.get('/user/:userId/roles', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json({ userId, roles: await history.roles(userId) })
  }))

  router.get('/user/:userId/statistics', asyncHandler(async (req, res) => {
    res.json(await history.statistics(ownUserParam(req)))
  }))

  router.get('/user/:userId/monthly-hours/:year', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    const { year } = parse(yearParamSchema, req.params)
    res.json({ userId, year, monthlyHours: await history.monthlyHours(userId, year) })
  }))

  router.get('/event/:eventId', staff, asyncHandler(async (req, res) => {
    const entries = await history.byEvent(idParam(req, 'eventId'))
    res.json({ entries, total: entries.length })
  }))

  router.get('/:entryId', asyncHandler(async (req, res) => {
    const entry = await history.get(idParam(req, 'entryId'))
    assertSelfOrStaff(requireUser(req), entry.userId)
    res.json(entry)
  }))

  router.put('/:entryId', staff, asyncHandler(async (req, res) => {
    const entryId = idParam(req, 'entryId')
    res.json(await history.update(entryId, parse(updateEntrySchema, req.body)))
  }))

  router.delete('/:entryId', staff, asyncHandler(async (req, res) => {
    await history.delete(idParam(req, 'entryId'))
    res.json({ message: 'History entry deleted successfully' })
  }))

  return router
}
