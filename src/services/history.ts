import { randomUUID } from 'node:crypto'
import { NotFoundError, ValidationError, type ErrorDetail } from '../errors.js'
import type { UnitOfWorkManager } from '../repositories/interfaces.js'
import type { Clock, VolunteerHistoryEntry } from '../types.js'
import { addDays } from '../utils/dates.js'
import type { Logger } from '../utils/logger.js'

export interface HistoryEntryInput {
  userId: string
  eventId: string
  role: string
  hours: number
  date: Date
  notes?: string | null
}

export type HistoryEntryUpdate = Partial<Pick<HistoryEntryInput, 'role' | 'hours' | 'date' | 'notes'>>

export interface VolunteerStatistics {
  totalHours: number
  totalEvents: number
  uniqueRoles: number
  firstVolunteerDate: Date | null
  lastVolunteerDate: Date | null
  averageHoursPerEvent: number
  mostCommonRole: string | null
}

export interface VolunteerRanking {
  userId: string
  value: number
}

export class VolunteerHistoryService {
  constructor(
    private readonly uow: UnitOfWorkManager,
    private readonly logger: Logger,
    private readonly clock: Clock = () => new Date()
  ) {}

  async create(input: HistoryEntryInput): Promise<VolunteerHistoryEntry> {
    this.validate(input)

    return this.uow.run(async (uow) => {
      if (!(await uow.users.get(input.userId))) {
        throw new NotFoundError('User not found')
      }
      if (!(await uow.events.get(input.eventId))) {
        throw new NotFoundError('Event not found')
      }

      const entry: VolunteerHistoryEntry = {
        id: randomUUID(),
        userId: input.userId,
        eventId: input.eventId,
        role: input.role.trim(),
        hours: input.hours,
        date: input.date,
        notes: input.notes?.trim() || null,
        createdAt: this.clock()
      }
      await uow.history.save(entry)
      this.logger.info('History entry created', { entryId: entry.id, userId: entry.userId, eventId: entry.eventId })
      return entry
    })
  }

  async get(id: string): Promise<VolunteerHistoryEntry> {
    const entry = await this.uow.run((uow) => uow.history.get(id))
    if (!entry) {
      throw new NotFoundError('History entry not found')
    }
    return entry
  }

  async update(id: string, patch: HistoryEntryUpdate): Promise<VolunteerHistoryEntry> {
    this.validate(patch)

    return this.uow.run(async (uow) => {
      const entry = await uow.history.get(id)
      if (!entry) {
        throw new NotFoundError('History entry not found')
      }
      const updated: VolunteerHistoryEntry = {
        ...entry,
        role: patch.role !== undefined ? patch.role.trim() : entry.role,
        hours: patch.hours ?? entry.hours,
        date: patch.date ?? entry.date,
        notes: patch.notes !== undefined ? patch.notes?.trim() || null : entry.notes
      }
      await uow.history.save(updated)
      this.logger.info('History entry updated', { entryId: id })
      return updated
    })
  }

  async delete(id: string): Promise<void> {
    await this.uow.run(async (uow) => {
      const entry = await uow.history.get(id)
      if (!entry) {
        throw new NotFoundError('History entry not found')
      }
      await uow.history.delete(id)
      this.logger.info('History entry deleted', { entryId: id, userId: entry.userId })
    })
  }

  byUser(userId: string): Promise<VolunteerHistoryEntry[]> {
    return this.uow.run((uow) => uow.history.listByUser(userId))
  }

  byEvent(eventId: string): Promise<VolunteerHistoryEntry[]> {
    return this.uow.run((uow) => uow.history.listByEvent(eventId))
  }

  recent(days = 30): Promise<VolunteerHistoryEntry[]> {
    return this.uow.run((uow) => uow.history.list(addDays(this.clock(), -days)))
  }

  async totalHours(userId: string): Promise<number> {
    return sumHours(await this.byUser(userId))
  }

  async hoursInPeriod(userId: string, start: Date, end: Date): Promise<number> {
    if (start > end) {
      throw ValidationError.field('startDate', 'Start date must be before end date')
    }
    const entries = await this.byUser(userId)
    return sumHours(entries.filter((entry) => entry.date >= start && entry.date <= end))
  }

  async eventCount(userId: string): Promise<number> {
    const entries = await this.byUser(userId)
    return new Set(entries.map((entry) => entry.eventId)).size
  }

  async roles(userId: string): Promise<string[]> {
    const entries = await this.byUser(userId)
    return [...new Set(entries.map((entry) => entry.role))].sort()
  }

  async statistics(userId: string): Promise<VolunteerStatistics> {
    const entries = await this.byUser(userId)
    if (entries.length === 0) {
      return {
        totalHours: 0,
        totalEvents: 0,
        uniqueRoles: 0,
        firstVolunteerDate: null,
        lastVolunteerDate: null,
        averageHoursPerEvent: 0,
        mostCommonRole: null
      }
    }

    const totalHours = sumHours(entries)
    const totalEvents = new Set(entries.map((entry) => entry.eventId)).size
    const times = entries.map((entry) => entry.date.getTime())

    const roleCounts = new Map<string, number>()
    for (const entry of entries) {
      roleCounts.set(entry.role, (roleCounts.get(entry.role) ?? 0) + 1)
    }
    let mostCommonRole: string | null = null
    let highest = 0
    for (const [role, count] of roleCounts) {
      if (count > highest) {
        mostCommonRole = role
        highest = count
      }
    }

    return {
      totalHours,
      totalEvents,
      uniqueRoles: roleCounts.size,
      firstVolunteerDate: new Date(Math.min(...times)),
      lastVolunteerDate: new Date(Math.max(...times)),
      averageHoursPerEvent: totalHours / totalEvents,
      mostCommonRole
    }
  }

  /** Hours per UTC month (1-12) of `year`. */
  async monthlyHours(userId: string, year: number): Promise<Record<number, number>> {
    const monthly: Record<number, number> = {}
    for (let month = 1; month <= 12; month++) {
      monthly[month] = 0
    }
    for (const entry of await this.byUser(userId)) {
      if (entry.date.getUTCFullYear() === year) {
        monthly[entry.date.getUTCMonth() + 1] += entry.hours
      }
    }
    return monthly
  }

  async topVolunteersByHours(limit = 10): Promise<VolunteerRanking[]> {
    const entries = await this.uow.run((uow) => uow.history.list())
    const hours = new Map<string, number>()
    for (const entry of entries) {
      hours.set(entry.userId, (hours.get(entry.userId) ?? 0) + entry.hours)
    }
    return rank(hours, limit)
  }

  async topVolunteersByEvents(limit = 10): Promise<VolunteerRanking[]> {
    const entries = await this.uow.run((uow) => uow.history.list())
    const events = new Map<string, Set<string>>()
    for (const entry of entries) {
      const seen = events.get(entry.userId) ?? new Set<string>()
      seen.add(entry.eventId)
      events.set(entry.userId, seen)
    }
    return rank(new Map([...events].map(([userId, ids]) => [userId, ids.size])), limit)
  }

  private validate(input: HistoryEntryUpdate): void {
    const problems: ErrorDetail[] = []
    if (input.role !== undefined) {
      const role = input.role.trim()
      if (role.length === 0) problems.push({ path: 'role', message: 'Role is required' })
      if (role.length > 100) problems.push({ path: 'role', message: 'Role must be 100 characters or less' })
    }
    if (input.hours !== undefined) {
      if (input.hours <= 0) problems.push({ path: 'hours', message: 'Hours must be greater than 0' })
      if (input.hours > 24) problems.push({ path: 'hours', message: 'Hours cannot exceed 24 for a single entry' })
    }
    if (input.date !== undefined && input.date > this.clock()) {
      problems.push({ path: 'date', message: 'Date cannot be in the future' })
    }
    if (input.notes && input.notes.length > 1000) {
      problems.push({ path: 'notes', message: 'Notes must be 1000 characters or less' })
    }
    if (problems.length > 0) {
      throw new ValidationError(problems)
    }
  }
}

function sumHours(entries: VolunteerHistoryEntry[]): number {
  return entries.reduce((sum, entry) => sum + entry.hours, 0)
}

function rank(values: Map<string, number>, limit: number): VolunteerRanking[] {
  return [...values]
    .map(([userId, value]) => ({ userId, value }))
    .sort((a, b) => b.value - a.value)
    .slice(0, limit)
}
