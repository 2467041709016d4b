import express from 'express'
import { z } from 'zod'
import { isStaff, requireRole, requireUser } from '../middleware/auth.js'
import { asyncHandler } from '../middleware/async-handler.js'
import { parse } from '../middleware/validate.js'
import type { Services } from '../services/index.js'
import { ForbiddenError } from '../errors.js'
import { MAX_SKILLS, MAX_TAGS } from '../services/profiles.js'
import { ownUserParam } from './params.js'
import { availabilityWindow, csvList, notificationPreferences, profileLocation, time, uuid } from './schemas.js'

const profileFields = {
  displayName: z.string().trim().min(1).max(100),
  phone: z.string().trim().max(20).nullable().optional(),
  skills: z.array(z.string().trim().min(1).max(100)).max(MAX_SKILLS).optional(),
  tags: z.array(z.string().trim().min(1).max(50)).max(MAX_TAGS).optional(),
  availability: z.array(availabilityWindow).optional(),
  location: profileLocation.nullable().optional(),
  maxTravelKm: z.number().positive().nullable().optional(),
  notificationPreferences: notificationPreferences.optional()
}

const createProfileSchema = z.object({
  userId: uuid.optional(),
  ...profileFields
})

const updateProfileSchema = z.object(profileFields).partial()

const skillSchema = z.object({ skill: z.string().trim().min(1).max(100) })
const tagSchema = z.object({ tag: z.string().trim().min(1).max(50) })

const skillsQuerySchema = z.object({ skills: csvList })
const tagsQuerySchema = z.object({ tags: csvList })

const availableQuerySchema = z.object({
  weekday: z.coerce.number().int().min(0).max(6),
  start: time,
  end: time
})

export function createProfilesRouter({ profiles, history }: Services) {
  const router = express.Router()
  const staff = requireRole('organizer', 'admin')

  router.get('/', staff, asyncHandler(async (_req, res) => {
    res.json(await profiles.list())
  }))

  router.get('/search/by-skills', staff, asyncHandler(async (req, res) => {
    const { skills } = parse(skillsQuerySchema, req.query)
    res.json(await profiles.searchBySkills(skills))
  }))

  router.get('/search/by-tags', staff, asyncHandler(async (req, res) => {
    const { tags } = parse(tagsQuerySchema, req.query)
    res.json(await profiles.searchByTags(tags))
  }))

  router.get('/search/available', staff, asyncHandler(async (req, res) => {
    const { weekday, start, end } = parse(availableQuerySchema, req.query)
    res.json(await profiles.findAvailable(weekday, start, end))
  }))

  // Volunteers create their own profile; staff may create one for any user
  router.post('/', asyncHandler(async (req, res) => {
    const user = requireUser(req)
    const { userId, ...input } = parse(createProfileSchema, req.body)
    const owner = userId ?? user.id
    if (owner !== user.id && !isStaff(user)) {
      throw new ForbiddenError()
    }
    res.status(201).json(await profiles.create(owner, input))
  }))

  router.get('/:userId', asyncHandler(async (req, res) => {
    res.json(await profiles.get(ownUserParam(req)))
  }))

  router.put('/:userId', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json(await profiles.update(userId, parse(updateProfileSchema, req.body)))
  }))

  router.delete('/:userId', asyncHandler(async (req, res) => {
    await profiles.delete(ownUserParam(req))
    res.json({ message: 'Profile deleted successfully' })
  }))

  router.post('/:userId/skills', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    const { skill } = parse(skillSchema, req.body)
    res.json(await profiles.addSkill(userId, skill))
  }))

  router.delete('/:userId/skills/:skill', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json(await profiles.removeSkill(userId, req.params.skill))
  }))

  router.post('/:userId/tags', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    const { tag } = parse(tagSchema, req.body)
    res.json(await profiles.addTag(userId, tag))
  }))

  router.delete('/:userId/tags/:tag', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json(await profiles.removeTag(userId, req.params.tag))
  }))

  router.post('/:userId/availability', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json(await profiles.addAvailability(userId, parse(availabilityWindow, req.body)))
  }))

  router.delete('/:userId/availability', asyncHandler(async (req, res) => {
    const userId = ownUserParam(req)
    res.json(await profiles.removeAvailability(userId, parse(availabilityWindow, req.body)))
  }))

  router.get('/:userId/stats', asyncHandler(async (req, res) => {
    res.json(await history.statistics(ownUserParam(req)))
  }))

  return router
}
