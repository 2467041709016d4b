import Papa from 'papaparse'
import type { UnitOfWorkManager } from '../repositories/interfaces.js'
import type { Clock } from '../types.js'
import { addDays, formatDay } from '../utils/dates.js'
import type { Logger } from '../utils/logger.js'

/** Lets spreadsheet apps detect UTF-8. */
export const CSV_BOM = '\uFEFF'

export const HISTORY_COLUMNS = ['Entry ID', 'User ID', 'Event ID', 'Role', 'Hours', 'Date', 'Notes']

export const EVENT_COLUMNS = [
  'Event ID',
  'Title',
  'Description',
  'Status',
  'Location',
  'City',
  'State',
  'Required Skills',
  'Start Date',
  'End Date',
  'Capacity'
]

type Cell = string | number

export function toCsv(fields: string[], rows: Cell[][]): string {
  const csv = Papa.unparse({ fields, data: rows }, { newline: '\n' })
  return CSV_BOM + (csv.endsWith('\n') ? csv : csv + '\n')
}

/** `YYYY-MM-DD HH:MM` (UTC) */
function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ')
}

export class ReportService {
  constructor(
    private readonly uow: UnitOfWorkManager,
    private readonly logger: Logger,
    private readonly clock: Clock = () => new Date()
  ) {}

  async volunteerHistoryCsv(days = 365): Promise<string> {
    const entries = await this.uow.run((uow) => uow.history.list(addDays(this.clock(), -days)))
    const rows = entries.map((entry) => [
      entry.id,
      entry.userId,
      entry.eventId,
      entry.role,
      entry.hours,
      formatDay(entry.date),
      entry.notes ?? ''
    ])
    this.logger.info('Generated volunteer history CSV', { entries: entries.length, days })
    return toCsv(HISTORY_COLUMNS, rows)
  }

  async eventsCsv(): Promise<string> {
    const events = await this.uow.run((uow) => uow.events.list())
    const rows = events.map((event) => [
      event.id,
      event.title,
      event.description,
      event.status,
      event.location.name,
      event.location.city ?? '',
      event.location.state ?? '',
      event.requiredSkills.join('; '),
      formatTimestamp(event.startsAt),
      event.endsAt ? formatTimestamp(event.endsAt) : '',
      event.capacity ?? ''
    ])
    this.logger.info('Generated events CSV', { events: events.length })
    return toCsv(EVENT_COLUMNS, rows)
  }
}
