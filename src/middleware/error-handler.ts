import type { ErrorRequestHandler, Request, Response } from 'express'
import mongoose from 'mongoose'
import { AppError } from '../errors.js'
import type { Logger } from '../utils/logger.js'

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed'
}

function isDuplicateKey(err: unknown): boolean {
  return err instanceof mongoose.mongo.MongoServerError && err.code === 11000
}

export const notFound = (_req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    error: 'Not Found'
  })
}

export const errorHandler = (logger: Logger): ErrorRequestHandler =>
  (err: unknown, req, res, _next) => {
    if (err instanceof AppError) {
      res.status(err.status).json({
        success: false,
        error: err.message,
        ...(err.details ? { details: err.details } : {})
      })
      return
    }
    if (isMalformedJson(err)) {
      res.status(400).json({ success: false, error: 'Malformed JSON body' })
      return
    }
    if (isDuplicateKey(err)) {
      res.status(400).json({ success: false, error: 'Duplicate record' })
      return
    }

    logger.error('Server Error', {
      method: req.method,
      path: req.path,
      error: err instanceof Error ? err.stack ?? err.message : String(err)
    })
    res.status(500).json({
      success: false,
      error: 'Internal Server Error'
    })
  }
