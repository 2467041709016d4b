import express from 'express'
import { z } from 'zod'
import { ForbiddenError } from '../errors.js'
import { assertSelfOrStaff, isStaff, requireRole, requireUser } from '../middleware/auth.js'
import { asyncHandler } from '../middleware/async-handler.js'
import { parse } from '../middleware/validate.js'
import type { Services } from '../services/index.js'
import { idParam, ownUserParam } from './params.js'
import { uuid } from './schemas.js'

const opportunitySchema = z.object({
  eventId: uuid,
  title: z.string().trim().min(1).max(100),
  description: z.string().trim().max(500).nullable().optional(),
  requiredSkills: z.array(z.string().trim().min(1)).optional(),
  minHours: z.number().positive().nullable().optional(),
  maxSlots: z.number().int().positive().nullable().optional()
})

const opportunityQuerySchema = z.object({
  eventId: uuid.optional()
})

const matchRequestSchema = z.object({
  opportunityId: uuid,
  userId: uuid.optional()
})

const rejectSchema = z.object({
  reason: z.string().trim().max(500).optional()
}).default({})

const scoreQuerySchema = z.object({
  minScore: z.coerce.number().min(0).max(1).optional()
})

const expireSchema = z.object({
  daysOld: z.coerce.number().int().min(0).max(3650).optional()
})

export function createVolunteerMatchingRouter({ matching }: Services) {
  const router = express.Router()
  const staff = requireRole('organizer', 'admin')

  router.get('/opportunities', asyncHandler(async (req, res) => {
    const { eventId } = parse(opportunityQuerySchema, req.query)
    res.json(await matching.listOpportunities(eventId))
  }))

  router.get('/opportunities/by-event/:eventId', asyncHandler(async (req, res) => {
    res.json(await matching.listOpportunities(idParam(req, 'eventId')))
  }))

  router.get('/opportunities/:opportunityId', asyncHandler(async (req, res) => {
    res.json(await matching.getOpportunity(idParam(req, 'opportunityId')))
  }))

  router.post('/opportunities', staff, asyncHandler(async (req, res) => {
    res.status(201).json(await matching.createOpportunity(parse(opportunitySchema, req.body)))
  }))

  router.post('/opportunities/:opportunityId/announce', staff, asyncHandler(async (req, res) => {
    const opportunityId = idParam(req, 'opportunityId')
    const { minScore } = parse(scoreQuerySchema, req.query)
    const notified = await matching.announceOpportunity(opportunityId, minScore)
    res.json({ message: `Notified ${notified} matching volunteers`, notified })
  }))

  // Volunteers apply for themselves; staff may file a request for anyone
  router.post('/match-requests', asyncHandler(async (req, res) => {
    const user = requireUser(req)
    const { opportunityId, userId } = parse(matchRequestSchema, req.body)
    const applicant = userId ?? user.id
    if (applicant !== user.id && !isStaff(user)) {
      throw new ForbiddenError()
    }
    res.status(201).json(await matching.createMatchRequest(applicant, opportunityId))
  }))

  router.get('/match-requests/by-opportunity/:opportunityId', staff, asyncHandler(async (req, res) => {
    res.json(await matching.requestsByOpportunity(idParam(req, 'opportunityId')))
  }))

  router.get('/match-requests/by-user/:userId', asyncHandler(async (req, res) => {
    res.json(await matching.requestsByUser(ownUserParam(req)))
  }))

  router.get('/match-requests/:requestId', asyncHandler(async (req, res) => {
    const request = await matching.getMatchRequest(idParam(req, 'requestId'))
    assertSelfOrStaff(requireUser(req), request.userId)
    res.json(request)
  }))

  router.post('/match-requests/:requestId/approve', staff, asyncHandler(async (req, res) => {
    res.json(await matching.approve(idParam(req, 'requestId')))
  }))

  router.post('/match-requests/:requestId/reject', staff, asyncHandler(async (req, res) => {
    const requestId = idParam(req, 'requestId')
    const { reason } = parse(rejectSchema, req.body)
    const request = await matching.reject(requestId, reason)
    res.json({ message: 'Match request rejected successfully', request })
  }))

  router.get('/matches/by-user/:userId', asyncHandler(async (req, res) => {
    res.json(await matching.matchesByUser(ownUserParam(req)))
  }))

  router.get('/matches/by-opportunity/:opportunityId', staff, asyncHandler(async (req, res) => {
    res.json(await matching.matchesByOpportunity(idParam(req, 'opportunityId')))
  }))

  router.delete('/matches/:matchId', asyncHandler(async (req, res) => {
    const matchId = idParam(req, 'matchId')
    assertSelfOrStaff(requireUser(req), (await matching.getMatch(matchId)).userId)
    const match = await matching.cancelMatch(matchId)
    res.json({ message: 'Match cancelled successfully', match })
  }))

  router.get('/find-volunteers/:opportunityId', staff, asyncHandler(async (req, res) => {
    const opportunityId = idParam(req, 'opportunityId')
    const { minScore } = parse(scoreQuerySchema, req.query)
    const matches = await matching.findMatchingVolunteers(opportunityId, minScore)
    res.json({ matches, total: matches.length })
  }))

  router.get('/find-opportunities/:userId', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    const { minScore } = parse(scoreQuerySchema, req.query)
    const matches = await matching.findMatchingOpportunities(userId, minScore)
    res.json({ matches, total: matches.length })
  }))

  router.post('/expire-old-requests', requireRole('admin'), asyncHandler(async (req, res) => {
    const { daysOld } = parse(expireSchema, req.query)
    const expired = await matching.expireStaleRequests(daysOld)
    res.json({ message: `Expired ${expired} old match requests`, expired })
  }))

  return router
}
