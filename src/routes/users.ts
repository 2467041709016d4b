import express from 'express'
import { z } from 'zod'
import { requireRole, requireUser } from '../middleware/auth.js'
import { asyncHandler } from '../middleware/async-handler.js'
import { parse } from '../middleware/validate.js'
import type { Services } from '../services/index.js'
import { ownUserParam } from './params.js'

const updateMeSchema = z.object({
  email: z.string().trim().email()
})

export function createUsersRouter({ users }: Services) {
  const router = express.Router()

  router.get('/me', asyncHandler(async (req, res) => {
    res.json(requireUser(req))
  }))

  router.put('/me', asyncHandler(async (req, res) => {
    const { email } = parse(updateMeSchema, req.body)
    res.json(await users.updateEmail(requireUser(req).id, email))
  }))

  // Admin lookup by identity-provider subject
  router.get('/by-subject/:subject', requireRole('admin'), asyncHandler(async (req, res) => {
    res.json(await users.getBySubject(req.params.subject))
  }))

  router.get('/:userId', asyncHandler(async (req, res) => {
    res.json(await users.get(ownUserParam(req)))
  }))

  return router
}
