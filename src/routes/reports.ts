import express from 'express'
import { z } from 'zod'
import { requireRole } from '../middleware/auth.js'
import { asyncHandler } from '../middleware/async-handler.js'
import { parse } from '../middleware/validate.js'
import type { Services } from '../services/index.js'
import { formatDay } from '../utils/dates.js'

const historyQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(3650).default(365)
})

function sendCsv(res: express.Response, filename: string, csv: string) {
  res.setHeader('Content-Type', 'text/csv; charset=utf-8')
  res.setHeader('Content-Disposition', `attachment; filename="${filename}"`)
  res.send(csv)
}

export function createReportsRouter({ reports }: Services) {
  const router = express.Router()

  router.use(requireRole('organizer', 'admin'))

  router.get('/volunteer-history/csv', asyncHandler(async (req, res) => {
    const { days } = parse(historyQuerySchema, req.query)
    const csv = await reports.volunteerHistoryCsv(days)
    sendCsv(res, `volunteer-history-${formatDay(new Date())}.csv`, csv)
  }))

  router.get('/events/csv', asyncHandler(async (_req, res) => {
    const csv = await reports.eventsCsv()
    sendCsv(res, `events-${formatDay(new Date())}.csv`, csv)
  }))

  return router
}
