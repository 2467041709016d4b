import express from 'express'
import { z } from 'zod'
import { assertSelfOrStaff, requireRole, requireUser } from '../middleware/auth.js'
import { asyncHandler } from '../middleware/async-handler.js'
import { parse } from '../middleware/validate.js'
import type { Services } from '../services/index.js'
import {
  NOTIFICATION_CHANNELS,
  NOTIFICATION_PRIORITIES,
  NOTIFICATION_STATUSES,
  NOTIFICATION_TYPES
} from '../types.js'
import { idParam, ownUserParam } from './params.js'
import { flag, isoDate, limit, notificationPreferences, uuid } from './schemas.js'

const sendSchema = z.object({
  recipientId: uuid,
  type: z.enum(NOTIFICATION_TYPES),
  subject: z.string().trim().min(1).max(200),
  body: z.string().trim().min(1).max(2000),
  channel: z.enum(NOTIFICATION_CHANNELS).optional(),
  priority: z.enum(NOTIFICATION_PRIORITIES).default('normal')
})

const eventDetailsSchema = z.object({
  recipientId: uuid,
  eventTitle: z.string().trim().min(1).max(100),
  eventDate: isoDate,
  eventLocation: z.string().trim().min(1).max(200)
})

const reminderSchema = eventDetailsSchema.extend({
  hoursBefore: z.number().int().positive().default(24)
})

const eventUpdateSchema = z.object({
  recipientId: uuid,
  eventTitle: z.string().trim().min(1).max(100),
  updateDetails: z.string().trim().min(1).max(1500)
})

const cancellationSchema = z.object({
  recipientId: uuid,
  eventTitle: z.string().trim().min(1).max(100),
  reason: z.string().trim().max(500).optional()
})

const matchRequestSchema = z.object({
  recipientId: uuid,
  eventTitle: z.string().trim().min(1).max(100),
  opportunityTitle: z.string().trim().min(1).max(100),
  reason: z.string().trim().max(500).optional()
})

const newOpportunitySchema = z.object({
  recipientId: uuid,
  eventTitle: z.string().trim().min(1).max(100),
  opportunityTitle: z.string().trim().min(1).max(100),
  matchingSkills: z.array(z.string().trim().min(1))
})

const listQuerySchema = z.object({
  limit: limit(100).optional(),
  status: z.enum(NOTIFICATION_STATUSES).optional(),
  unreadOnly: flag.optional()
})

export function createNotificationsRouter({ notifications, profiles }: Services) {
  const router = express.Router()
  const staff = requireRole('organizer', 'admin')
  const admin = requireRole('admin')

  router.get('/', asyncHandler(async (req, res) => {
    const options = parse(listQuerySchema, req.query)
    res.json(await notifications.listForUser(requireUser(req).id, options))
  }))

  router.get('/unread-count', asyncHandler(async (req, res) => {
    res.json({ unreadCount: await notifications.unreadCount(requireUser(req).id) })
  }))

  router.get('/pending', admin, asyncHandler(async (_req, res) => {
    const pending = await notifications.pending()
    res.json({ notifications: pending, total: pending.length })
  }))

  router.post('/retry-failed', admin, asyncHandler(async (_req, res) => {
    const retried = await notifications.retryFailed()
    res.json({ message: `Retried ${retried} failed notifications`, retried })
  }))

  router.post('/send', staff, asyncHandler(async (req, res) => {
    res.status(201).json(await notifications.send(parse(sendSchema, req.body)))
  }))

  router.post('/event-assignment', staff, asyncHandler(async (req, res) => {
    const input = parse(eventDetailsSchema, req.body)
    res.status(201).json(await notifications.sendEventAssignment(input.recipientId, {
      title: input.eventTitle,
      startsAt: input.eventDate,
      location: input.eventLocation
    }))
  }))

  router.post('/event-reminder', staff, asyncHandler(async (req, res) => {
    const input = parse(reminderSchema, req.body)
    const details = { title: input.eventTitle, startsAt: input.eventDate, location: input.eventLocation }
    res.status(201).json(await notifications.sendEventReminder(input.recipientId, details, input.hoursBefore))
  }))

  router.post('/event-update', staff, asyncHandler(async (req, res) => {
    const input = parse(eventUpdateSchema, req.body)
    res.status(201).json(
      await notifications.sendEventUpdate(input.recipientId, input.eventTitle, input.updateDetails)
    )
  }))

  router.post('/event-cancellation', staff, asyncHandler(async (req, res) => {
    const input = parse(cancellationSchema, req.body)
    res.status(201).json(
      await notifications.sendEventCancellation(input.recipientId, input.eventTitle, input.reason)
    )
  }))

  router.post('/match-request-approved', staff, asyncHandler(async (req, res) => {
    const input = parse(matchRequestSchema, req.body)
    res.status(201).json(
      await notifications.sendMatchRequestApproved(input.recipientId, input.eventTitle, input.opportunityTitle)
    )
  }))

  router.post('/match-request-rejected', staff, asyncHandler(async (req, res) => {
    const input = parse(matchRequestSchema, req.body)
    res.status(201).json(
      await notifications.sendMatchRequestRejected(
        input.recipientId,
        input.eventTitle,
        input.opportunityTitle,
        input.reason
      )
    )
  }))

  router.post('/new-opportunity', staff, asyncHandler(async (req, res) => {
    const input = parse(newOpportunitySchema, req.body)
    res.status(201).json(
      await notifications.sendNewOpportunity(
        input.recipientId,
        input.eventTitle,
        input.opportunityTitle,
        input.matchingSkills
      )
    )
  }))

  router.get('/user/:userId', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json(await notifications.listForUser(userId, parse(listQuerySchema, req.query)))
  }))

  router.get('/user/:userId/preferences', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json({ userId, preferences: await profiles.getNotificationPreferences(userId) })
  }))

  router.put('/user/:userId/preferences', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    const preferences = await profiles.setNotificationPreferences(userId, parse(notificationPreferences, req.body))
    res.json({ userId, preferences })
  }))

  router.get('/:notificationId', asyncHandler(async (req, res) => {
    const notification = await notifications.get(idParam(req, 'notificationId'))
    assertSelfOrStaff(requireUser(req), notification.recipientId)
    res.json(notification)
  }))

  router.post('/:notificationId/mark-read', asyncHandler(async (req, res) => {
    const notificationId = idParam(req, 'notificationId')
    const notification = await notifications.get(notificationId)
    assertSelfOrStaff(requireUser(req), notification.recipientId)
    res.json(await notifications.markRead(notificationId))
  }))

  return router
}
