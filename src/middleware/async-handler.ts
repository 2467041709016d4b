import type { NextFunction, RequestHandler, Response } from 'express'
import type { AuthRequest } from './auth.js'

type AsyncRoute = (req: AuthRequest, res: Response, next: NextFunction) => Promise<unknown>

/** Forwards rejections from an async route to the error handler. */
export const asyncHandler = (route: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    route(req, res, next).catch(next)
  }
