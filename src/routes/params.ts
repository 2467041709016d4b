import { z } from 'zod'
import { assertSelfOrStaff, requireUser, type AuthRequest } from '../middleware/auth.js'
import { parse } from '../middleware/validate.js'
import { uuid } from './schemas.js'

/** Reads a UUID path parameter. */
export function idParam(req: AuthRequest, name: string): string {
  return parse(z.object({ [name]: uuid }), req.params)[name]
}

/**
 * Reads a user id path parameter, accepting `me` for the caller, and checks
 * the caller may act on that user.
 */
export function ownUserParam(req: AuthRequest, name = 'userId'): string {
  const user = requireUser(req)
  const userId = req.params[name] === 'me' ? user.id : idParam(req, name)
  assertSelfOrStaff(user, userId)
  return userId
}
