import { Request, Response, NextFunction } from 'express'
import { ForbiddenError, UnauthorizedError } from '../errors.js'
import type { UserService } from '../services/users.js'
import type { User, UserRole } from '../types.js'
import type { TokenVerifier } from '../utils/jwt.js'

export interface AuthRequest extends Request {
  user?: User
}

const BEARER = /^Bearer\s+(\S+)$/i

export function bearerToken(header: string | undefined): string | null {
  const match = header ? BEARER.exec(header) : null
  return match ? match[1] : null
}

export const auth = (verifier: TokenVerifier, users: UserService) =>
  async (req: AuthRequest, _res: Response, next: NextFunction) => {
    try {
      const token = bearerToken(req.header('Authorization'))
      if (!token) {
        throw new UnauthorizedError()
      }

      const identity = await verifier.verify(token)
      req.user = await users.findOrCreateBySubject(identity)
      next()
    } catch (err) {
      next(err)
    }
  }

export function requireUser(req: AuthRequest): User {
  if (!req.user) {
    throw new UnauthorizedError()
  }
  return req.user
}

export const requireRole = (...roles: UserRole[]) =>
  (req: AuthRequest, _res: Response, next: NextFunction) => {
    if (!req.user) {
      next(new UnauthorizedError())
      return
    }
    if (!req.user.roles.some((role) => roles.includes(role))) {
      next(new ForbiddenError())
      return
    }
    next()
  }

export function isStaff(user: User): boolean {
  return user.roles.includes('admin') || user.roles.includes('organizer')
}

/** Volunteers may only touch their own records; organizers and admins any. */
export function assertSelfOrStaff(user: User, userId: string): void {
  if (user.id !== userId && !isStaff(user)) {
    throw new ForbiddenError()
  }
}
