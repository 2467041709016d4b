import { randomUUID } from 'node:crypto'
import { BadRequestError, NotFoundError, ValidationError, type ErrorDetail } from '../errors.js'
import type { UnitOfWork, UnitOfWorkManager } from '../repositories/interfaces.js'
import type { Clock, EventLocation, EventStatus, VolunteerEvent } from '../types.js'
import { formatEventDate } from '../utils/dates.js'
import type { Logger } from '../utils/logger.js'
import { EVENT_TRANSITIONS, assertTransition } from '../utils/transitions.js'
import type { NotificationService } from './notifications.js'

export const UPCOMING_LIMIT = 50

export type EventLocationInput = Pick<EventLocation, 'name'> & Partial<Omit<EventLocation, 'name'>>

export interface EventInput {
  title: string
  description: string
  location: EventLocationInput
  requiredSkills: string[]
  startsAt: Date
  endsAt?: Date | null
  capacity?: number | null
}

export type EventUpdate = Partial<EventInput>

export interface EventSearch {
  skills?: string[]
  city?: string
  state?: string
  status?: EventStatus
}

function toLocation(input: EventLocationInput): EventLocation {
  return {
    name: input.name.trim(),
    address: input.address ?? null,
    city: input.city ?? null,
    state: input.state ?? null,
    postalCode: input.postalCode ?? null,
    latitude: input.latitude ?? null,
    longitude: input.longitude ?? null
  }
}

function sameText(a: string | null, b: string): boolean {
  return a !== null && a.trim().toLowerCase() === b.trim().toLowerCase()
}

/** Human-readable lines for the fields an update touched. */
function describeChanges(before: VolunteerEvent, after: VolunteerEvent): string[] {
  const changes: string[] = []
  if (before.title !== after.title) changes.push(`Title: ${after.title}`)
  if (before.description !== after.description) changes.push('Description has been updated')
  if (JSON.stringify(before.location) !== JSON.stringify(after.location)) {
    changes.push(`Location: ${after.location.name}`)
  }
  if (before.startsAt.getTime() !== after.startsAt.getTime()) {
    changes.push(`Starts: ${formatEventDate(after.startsAt)}`)
  }
  if ((before.endsAt?.getTime() ?? null) !== (after.endsAt?.getTime() ?? null)) {
    changes.push(`Ends: ${after.endsAt ? formatEventDate(after.endsAt) : 'not set'}`)
  }
  if (before.capacity !== after.capacity) changes.push(`Capacity: ${after.capacity ?? 'unlimited'}`)
  if (before.requiredSkills.join('\n') !== after.requiredSkills.join('\n')) {
    changes.push(`Required skills: ${after.requiredSkills.join(', ')}`)
  }
  return changes
}

/** Users holding a confirmed match on any opportunity of the event. */
export async function confirmedVolunteerIds(uow: UnitOfWork, eventId: string): Promise<string[]> {
  const users = new Set<string>()
  for (const opportunity of await uow.opportunities.listByEvent(eventId)) {
    for (const match of await uow.matches.listByOpportunity(opportunity.id)) {
      if (match.status === 'confirmed') users.add(match.userId)
    }
  }
  return [...users]
}

export class EventService {
  constructor(
    private readonly uow: UnitOfWorkManager,
    private readonly notifications: NotificationService,
    private readonly logger: Logger,
    private readonly clock: Clock = () => new Date()
  ) {}

  async create(input: EventInput, createdBy: string | null = null): Promise<VolunteerEvent> {
    this.validate(input, true)

    const now = this.clock()
    const event: VolunteerEvent = {
      id: randomUUID(),
      title: input.title.trim(),
      description: input.description.trim(),
      location: toLocation(input.location),
      requiredSkills: input.requiredSkills.map((skill) => skill.trim()),
      startsAt: input.startsAt,
      endsAt: input.endsAt ?? null,
      capacity: input.capacity ?? null,
      status: 'draft',
      createdBy,
      createdAt: now,
      updatedAt: now
    }
    await this.uow.run((uow) => uow.events.save(event))
    this.logger.info('Event created', { eventId: event.id, title: event.title })
    return event
  }

  async get(id: string): Promise<VolunteerEvent> {
    const event = await this.uow.run((uow) => uow.events.get(id))
    if (!event) {
      throw new NotFoundError('Event not found')
    }
    return event
  }

  list(status?: EventStatus): Promise<VolunteerEvent[]> {
    return this.uow.run((uow) => uow.events.list(status ? { status } : {}))
  }

  published(): Promise<VolunteerEvent[]> {
    return this.list('published')
  }

  /** Published events that have not started, earliest first. */
  async upcoming(limit = UPCOMING_LIMIT): Promise<VolunteerEvent[]> {
    const events = await this.uow.run((uow) =>
      uow.events.list({ status: 'published', startsAtOrAfter: this.clock() })
    )
    return events.slice(0, Math.min(limit, UPCOMING_LIMIT))
  }

  async update(id: string, patch: EventUpdate): Promise<VolunteerEvent> {
    this.validate(patch, false)

    const { before, after, recipients } = await this.uow.run(async (uow) => {
      const event = await uow.events.get(id)
      if (!event) {
        throw new NotFoundError('Event not found')
      }
      if (event.status === 'cancelled') {
        throw new BadRequestError('Cancelled events cannot be updated')
      }

      const updated: VolunteerEvent = {
        ...event,
        title: patch.title !== undefined ? patch.title.trim() : event.title,
        description: patch.description !== undefined ? patch.description.trim() : event.description,
        location: patch.location ? toLocation(patch.location) : event.location,
        requiredSkills: patch.requiredSkills ? patch.requiredSkills.map((skill) => skill.trim()) : event.requiredSkills,
        startsAt: patch.startsAt ?? event.startsAt,
        endsAt: patch.endsAt !== undefined ? patch.endsAt : event.endsAt,
        capacity: patch.capacity !== undefined ? patch.capacity : event.capacity,
        updatedAt: this.clock()
      }
      if (updated.endsAt && updated.endsAt <= updated.startsAt) {
        throw ValidationError.field('endsAt', 'Event end time must be after start time')
      }

      await uow.events.save(updated)
      const notify = updated.status === 'published' ? await confirmedVolunteerIds(uow, id) : []
      return { before: event, after: updated, recipients: notify }
    })
    this.logger.info('Event updated', { eventId: id })

    const changes = describeChanges(before, after)
    if (changes.length > 0) {
      await this.notifyEach(recipients, (userId) =>
        this.notifications.sendEventUpdate(userId, after.title, changes.join('\n'))
      )
    }
    return after
  }

  publish(id: string): Promise<VolunteerEvent> {
    return this.transition(id, 'published').then(({ event }) => event)
  }

  async cancel(id: string, reason?: string): Promise<VolunteerEvent> {
    const { event, recipients } = await this.transition(id, 'cancelled')
    await this.notifyEach(recipients, (userId) =>
      this.notifications.sendEventCancellation(userId, event.title, reason)
    )
    return event
  }

  /** Reminds every confirmed volunteer; resolves to the number of reminders sent. */
  async sendReminders(id: string, hoursBefore = 24): Promise<number> {
    const { event, recipients } = await this.uow.run(async (uow) => {
      const event = await uow.events.get(id)
      if (!event) {
        throw new NotFoundError('Event not found')
      }
      if (event.status !== 'published') {
        throw new BadRequestError('Reminders can only be sent for published events')
      }
      return { event, recipients: await confirmedVolunteerIds(uow, id) }
    })

    const details = { title: event.title, startsAt: event.startsAt, location: event.location.name }
    let sent = 0
    await this.notifyEach(recipients, async (userId) => {
      const notification = await this.notifications.sendEventReminder(userId, details, hoursBefore)
      if (notification.status === 'sent') sent++
    })
    this.logger.info('Event reminders sent', { eventId: id, sent })
    return sent
  }

  /** Removes the event with its opportunities and their requests and matches; refused while volunteers are confirmed. */
  async delete(id: string): Promise<void> {
    await this.uow.run(async (uow) => {
      const event = await uow.events.get(id)
      if (!event) {
        throw new NotFoundError('Event not found')
      }
      if ((await confirmedVolunteerIds(uow, id)).length > 0) {
        throw new BadRequestError('Cannot delete an event with confirmed volunteers')
      }
      for (const opportunity of await uow.opportunities.listByEvent(id)) {
        await uow.matchRequests.deleteByOpportunity(opportunity.id)
        await uow.matches.deleteByOpportunity(opportunity.id)
      }
      await uow.opportunities.deleteByEvent(id)
      await uow.events.delete(id)
    })
    this.logger.info('Event deleted', { eventId: id })
  }

  /** Every supplied criterion must hold; status defaults to published. */
  async search(criteria: EventSearch): Promise<VolunteerEvent[]> {
    const events = await this.list(criteria.status ?? 'published')
    const skills = criteria.skills?.map((skill) => skill.trim().toLowerCase()) ?? []

    return events.filter((event) => {
      if (skills.length > 0 && !event.requiredSkills.some((skill) => skills.includes(skill.toLowerCase()))) {
        return false
      }
      if (criteria.city && !sameText(event.location.city, criteria.city)) return false
      if (criteria.state && !sameText(event.location.state, criteria.state)) return false
      return true
    })
  }

  private async transition(
    id: string,
    to: EventStatus
  ): Promise<{ event: VolunteerEvent; recipients: string[] }> {
    const result = await this.uow.run(async (uow) => {
      const event = await uow.events.get(id)
      if (!event) {
        throw new NotFoundError('Event not found')
      }
      assertTransition('Event', EVENT_TRANSITIONS, event.status, to)

      const updated: VolunteerEvent = { ...event, status: to, updatedAt: this.clock() }
      await uow.events.save(updated)
      return { event: updated, recipients: await confirmedVolunteerIds(uow, id) }
    })
    this.logger.info('Event status changed', { eventId: id, status: to })
    return result
  }

  private async notifyEach(userIds: string[], send: (userId: string) => Promise<unknown>): Promise<void> {
    for (const userId of userIds) {
      try {
        await send(userId)
      } catch (error) {
        this.logger.error('Failed to notify volunteer', {
          userId,
          error: error instanceof Error ? error.message : String(error)
        })
      }
    }
  }

  private validate(input: EventUpdate, creating: boolean): void {
    const problems: ErrorDetail[] = []
    const checks = (present: boolean) => creating || present

    if (checks(input.title !== undefined)) {
      const title = input.title?.trim() ?? ''
      if (title.length === 0) problems.push({ path: 'title', message: 'Event title is required' })
      if (title.length > 100) problems.push({ path: 'title', message: 'Event title must be 100 characters or less' })
    }
    if (checks(input.description !== undefined)) {
      const description = input.description?.trim() ?? ''
      if (description.length === 0) problems.push({ path: 'description', message: 'Event description is required' })
      if (description.length > 500) {
        problems.push({ path: 'description', message: 'Event description must be 500 characters or less' })
      }
    }
    if (checks(input.location !== undefined) && !input.location?.name.trim()) {
      problems.push({ path: 'location.name', message: 'Event location is required' })
    }
    if (checks(input.startsAt !== undefined) && !(input.startsAt && input.startsAt > this.clock())) {
      problems.push({ path: 'startsAt', message: 'Event start time must be in the future' })
    }
    if (input.startsAt && input.endsAt && input.endsAt <= input.startsAt) {
      problems.push({ path: 'endsAt', message: 'Event end time must be after start time' })
    }
    if (input.capacity !== undefined && input.capacity !== null && input.capacity <= 0) {
      problems.push({ path: 'capacity', message: 'Event capacity must be greater than 0' })
    }
    if (checks(input.requiredSkills !== undefined) && (input.requiredSkills ?? []).length === 0) {
      problems.push({ path: 'requiredSkills', message: 'At least one required skill must be specified' })
    }

    if (problems.length > 0) {
      throw new ValidationError(problems)
    }
  }
}
