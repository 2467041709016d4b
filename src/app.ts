import express from 'express'
import cors from 'cors'
import { auth } from './middleware/auth.js'
import { errorHandler, notFound } from './middleware/error-handler.js'
import type { Services } from './services/index.js'
import type { TokenVerifier } from './utils/jwt.js'
import type { Logger } from './utils/logger.js'
import { createEventsRouter } from './routes/events.js'
import { createNotificationsRouter } from './routes/notifications.js'
import { createProfilesRouter } from './routes/profiles.js'
import { createReportsRouter } from './routes/reports.js'
import { createUsersRouter } from './routes/users.js'
import { createVolunteerHistoryRouter } from './routes/volunteer-history.js'
import { createVolunteerMatchingRouter } from './routes/volunteer-matching.js'

export interface AppDependencies {
  services: Services
  verifier: TokenVerifier
  logger: Logger
  corsOrigins: string[]
}

export function createApp({ services, verifier, logger, corsOrigins }: AppDependencies) {
  const app = express()

  // Global middleware to ensure JSON
  app.use((_req, res, next) => {
    res.setHeader('Content-Type', 'application/json')
    next()
  })

  app.use(cors({
    origin: corsOrigins,
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }))

  app.use(express.json())

  // Request logger
  app.use((req, _res, next) => {
    logger.info(`${req.method} ${req.path}`)
    next()
  })

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' })
  })

  const api = express.Router()
  api.use(auth(verifier, services.users))
  api.use('/users', createUsersRouter(services))
  api.use('/events', createEventsRouter(services))
  api.use('/profiles', createProfilesRouter(services))
  api.use('/volunteer-matching', createVolunteerMatchingRouter(services))
  api.use('/volunteer-history', createVolunteerHistoryRouter(services))
  api.use('/notifications', createNotificationsRouter(services))
  api.use('/reports', createReportsRouter(services))
  app.use('/api/v1', api)

  // Catch-all route for 404s
  app.use('*', notFound)

  app.use(errorHandler(logger))

  return app
}
