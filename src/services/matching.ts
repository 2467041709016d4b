import { randomUUID } from 'node:crypto'
import { BadRequestError, NotFoundError, ValidationError, type ErrorDetail } from '../errors.js'
import type { UnitOfWork, UnitOfWorkManager } from '../repositories/interfaces.js'
import type {
  Clock,
  Match,
  MatchRequest,
  MatchScore,
  Opportunity,
  Profile,
  VolunteerEvent
} from '../types.js'
import { addDays, addHours } from '../utils/dates.js'
import type { Logger } from '../utils/logger.js'
import { MATCH_REQUEST_TRANSITIONS, MATCH_TRANSITIONS, assertTransition } from '../utils/transitions.js'
import type { NotificationService } from './notifications.js'
import { requiredSkillsFor, scoreMatch } from './scoring.js'

export interface MatchingOptions {
  minScore: number
  requestExpiryDays: number
  defaultMaxTravelKm: number
}

export interface OpportunityInput {
  eventId: string
  title: string
  description?: string | null
  requiredSkills?: string[]
  minHours?: number | null
  maxSlots?: number | null
}

export interface OpportunityMatch {
  opportunity: Opportunity
  score: MatchScore
}

export interface VolunteerMatch {
  profile: Profile
  score: MatchScore
}

interface Interval {
  start: number
  end: number
}

/** Events without an end are treated as one hour long. */
export function eventInterval(event: VolunteerEvent): Interval {
  return {
    start: event.startsAt.getTime(),
    end: (event.endsAt ?? addHours(event.startsAt, 1)).getTime()
  }
}

export function intervalsOverlap(a: Interval, b: Interval): boolean {
  return a.start < b.end && b.start < a.end
}

function byScoreThen<T extends { score: MatchScore }>(label: (item: T) => string) {
  return (a: T, b: T) =>
    b.score.totalScore - a.score.totalScore || label(a).localeCompare(label(b))
}

export class MatchingService {
  constructor(
    private readonly uow: UnitOfWorkManager,
    private readonly notifications: NotificationService,
    private readonly logger: Logger,
    private readonly options: MatchingOptions,
    private readonly clock: Clock = () => new Date()
  ) {}

  async createOpportunity(input: OpportunityInput): Promise<Opportunity> {
    const problems: ErrorDetail[] = []
    const title = input.title.trim()
    if (title.length === 0) problems.push({ path: 'title', message: 'Opportunity title is required' })
    if (title.length > 100) problems.push({ path: 'title', message: 'Opportunity title must be 100 characters or less' })
    if (input.description && input.description.length > 500) {
      problems.push({ path: 'description', message: 'Opportunity description must be 500 characters or less' })
    }
    if (input.minHours !== undefined && input.minHours !== null && input.minHours <= 0) {
      problems.push({ path: 'minHours', message: 'Minimum hours must be greater than 0' })
    }
    if (input.maxSlots !== undefined && input.maxSlots !== null && input.maxSlots <= 0) {
      problems.push({ path: 'maxSlots', message: 'Maximum slots must be greater than 0' })
    }
    if (problems.length > 0) {
      throw new ValidationError(problems)
    }

    const opportunity = await this.uow.run(async (uow) => {
      const event = await uow.events.get(input.eventId)
      if (!event) {
        throw new NotFoundError('Event not found')
      }
      if (event.status === 'cancelled') {
        throw new BadRequestError('Cannot add opportunities to a cancelled event')
      }

      const created: Opportunity = {
        id: randomUUID(),
        eventId: input.eventId,
        title,
        description: input.description?.trim() || null,
        requiredSkills: (input.requiredSkills ?? []).map((skill) => skill.trim()),
        minHours: input.minHours ?? null,
        maxSlots: input.maxSlots ?? null,
        createdAt: this.clock()
      }
      await uow.opportunities.save(created)
      return created
    })
    this.logger.info('Opportunity created', { opportunityId: opportunity.id, eventId: opportunity.eventId })
    return opportunity
  }

  async getOpportunity(id: string): Promise<Opportunity> {
    const opportunity = await this.uow.run((uow) => uow.opportunities.get(id))
    if (!opportunity) {
      throw new NotFoundError('Opportunity not found')
    }
    return opportunity
  }

  listOpportunities(eventId?: string): Promise<Opportunity[]> {
    return this.uow.run((uow) => (eventId ? uow.opportunities.listByEvent(eventId) : uow.opportunities.list()))
  }

  async createMatchRequest(userId: string, opportunityId: string): Promise<MatchRequest> {
    const request = await this.uow.run(async (uow) => {
      if (!(await uow.users.get(userId))) {
        throw new NotFoundError('User not found')
      }
      const opportunity = await uow.opportunities.get(opportunityId)
      if (!opportunity) {
        throw new NotFoundError('Opportunity not found')
      }
      const event = await this.requireEvent(uow, opportunity)
      if (event.status !== 'published') {
        throw new BadRequestError('Event is not open for volunteers')
      }
      if (await uow.matchRequests.findActive(userId, opportunityId)) {
        throw new BadRequestError('Match request already exists for this opportunity')
      }
      if (await uow.matches.findConfirmed(userId, opportunityId)) {
        throw new BadRequestError('User is already matched to this opportunity')
      }

      const profile = await uow.profiles.get(userId)
      const created: MatchRequest = {
        id: randomUUID(),
        userId,
        opportunityId,
        status: 'pending',
        score: profile
          ? scoreMatch(profile, opportunity, event, this.options.defaultMaxTravelKm).totalScore
          : null,
        requestedAt: this.clock(),
        decidedAt: null,
        decisionReason: null
      }
      await uow.matchRequests.save(created)
      return created
    })
    this.logger.info('Match request created', { requestId: request.id, userId, opportunityId })
    return request
  }

  async getMatchRequest(id: string): Promise<MatchRequest> {
    const request = await this.uow.run((uow) => uow.matchRequests.get(id))
    if (!request) {
      throw new NotFoundError('Match request not found')
    }
    return request
  }

  requestsByUser(userId: string): Promise<MatchRequest[]> {
    return this.uow.run((uow) => uow.matchRequests.listByUser(userId))
  }

  requestsByOpportunity(opportunityId: string): Promise<MatchRequest[]> {
    return this.uow.run((uow) => uow.matchRequests.listByOpportunity(opportunityId))
  }

  /**
   * Approves a pending request and confirms the match in one transaction.
   * Refuses duplicates, full opportunities or events, and bookings that
   * overlap another confirmed event of the same user.
   */
  async approve(requestId: string): Promise<Match> {
    const { match, event, opportunity } = await this.uow.run(async (uow) => {
      const request = await uow.matchRequests.get(requestId)
      if (!request) {
        throw new NotFoundError('Match request not found')
      }
      assertTransition('Match request', MATCH_REQUEST_TRANSITIONS, request.status, 'approved')

      const opportunity = await uow.opportunities.get(request.opportunityId)
      if (!opportunity) {
        throw new NotFoundError('Opportunity not found')
      }
      const event = await this.requireEvent(uow, opportunity)
      if (event.status !== 'published') {
        throw new BadRequestError('Event is not open for volunteers')
      }

      if (await uow.matches.findConfirmed(request.userId, opportunity.id)) {
        throw new BadRequestError('User already has a confirmed match for this opportunity')
      }
      if (opportunity.maxSlots !== null && (await uow.matches.countConfirmed(opportunity.id)) >= opportunity.maxSlots) {
        throw new BadRequestError('Opportunity has no open slots')
      }
      if (event.capacity !== null && (await this.confirmedForEvent(uow, event.id)) >= event.capacity) {
        throw new BadRequestError('Event is at capacity')
      }
      await this.assertNoDoubleBooking(uow, request.userId, event)

      const decidedAt = this.clock()
      await uow.matchRequests.save({ ...request, status: 'approved', decidedAt })
      const created: Match = {
        id: randomUUID(),
        userId: request.userId,
        opportunityId: opportunity.id,
        eventId: event.id,
        status: 'confirmed',
        score: request.score,
        createdAt: decidedAt,
        cancelledAt: null
      }
      await uow.matches.save(created)
      return { match: created, event, opportunity }
    })
    this.logger.info('Match request approved', { requestId, matchId: match.id })

    await this.notify(match.userId, () =>
      this.notifications.sendMatchRequestApproved(match.userId, event.title, opportunity.title)
    )
    return match
  }

  async reject(requestId: string, reason?: string): Promise<MatchRequest> {
    const { request, event, opportunity } = await this.uow.run(async (uow) => {
      const current = await uow.matchRequests.get(requestId)
      if (!current) {
        throw new NotFoundError('Match request not found')
      }
      assertTransition('Match request', MATCH_REQUEST_TRANSITIONS, current.status, 'rejected')

      const rejected: MatchRequest = {
        ...current,
        status: 'rejected',
        decidedAt: this.clock(),
        decisionReason: reason?.trim() || null
      }
      await uow.matchRequests.save(rejected)

      const opportunity = await uow.opportunities.get(current.opportunityId)
      const event = opportunity ? await uow.events.get(opportunity.eventId) : null
      return { request: rejected, event, opportunity }
    })
    this.logger.info('Match request rejected', { requestId })

    if (event && opportunity) {
      await this.notify(request.userId, () =>
        this.notifications.sendMatchRequestRejected(
          request.userId,
          event.title,
          opportunity.title,
          request.decisionReason ?? undefined
        )
      )
    }
    return request
  }

  async getMatch(id: string): Promise<Match> {
    const match = await this.uow.run((uow) => uow.matches.get(id))
    if (!match) {
      throw new NotFoundError('Match not found')
    }
    return match
  }

  matchesByUser(userId: string): Promise<Match[]> {
    return this.uow.run((uow) => uow.matches.listByUser(userId))
  }

  matchesByOpportunity(opportunityId: string): Promise<Match[]> {
    return this.uow.run((uow) => uow.matches.listByOpportunity(opportunityId))
  }

  async cancelMatch(id: string): Promise<Match> {
    const match = await this.uow.run(async (uow) => {
      const current = await uow.matches.get(id)
      if (!current) {
        throw new NotFoundError('Match not found')
      }
      assertTransition('Match', MATCH_TRANSITIONS, current.status, 'cancelled')

      const cancelled: Match = { ...current, status: 'cancelled', cancelledAt: this.clock() }
      await uow.matches.save(cancelled)
      return cancelled
    })
    this.logger.info('Match cancelled', { matchId: id })
    return match
  }

  /**
   * Ranks open opportunities for a volunteer: the event is published and has
   * not started, slots remain, and the user holds no confirmed match on it.
   */
  async findMatchingOpportunities(userId: string, minScore = this.options.minScore): Promise<OpportunityMatch[]> {
    return this.uow.run(async (uow) => {
      const profile = await uow.profiles.get(userId)
      if (!profile) {
        throw new NotFoundError('Profile not found')
      }

      const events = new Map(
        (await uow.events.list({ status: 'published', startsAtOrAfter: this.clock() })).map((event) => [event.id, event])
      )
      const matched = new Set(
        (await uow.matches.listByUser(userId))
          .filter((match) => match.status === 'confirmed')
          .map((match) => match.opportunityId)
      )

      const results: OpportunityMatch[] = []
      for (const opportunity of await uow.opportunities.list()) {
        const event = events.get(opportunity.eventId)
        if (!event || matched.has(opportunity.id)) continue
        if (opportunity.maxSlots !== null && (await uow.matches.countConfirmed(opportunity.id)) >= opportunity.maxSlots) {
          continue
        }
        const score = scoreMatch(profile, opportunity, event, this.options.defaultMaxTravelKm)
        if (score.totalScore >= minScore) {
          results.push({ opportunity, score })
        }
      }
      return results.sort(byScoreThen<OpportunityMatch>((item) => item.opportunity.title))
    })
  }

  /** Ranks volunteer profiles for an opportunity, leaving out users already matched to it. */
  async findMatchingVolunteers(opportunityId: string, minScore = this.options.minScore): Promise<VolunteerMatch[]> {
    return this.uow.run(async (uow) => {
      const opportunity = await uow.opportunities.get(opportunityId)
      if (!opportunity) {
        throw new NotFoundError('Opportunity not found')
      }
      const event = await uow.events.get(opportunity.eventId)
      const matched = new Set(
        (await uow.matches.listByOpportunity(opportunityId))
          .filter((match) => match.status === 'confirmed')
          .map((match) => match.userId)
      )

      const results: VolunteerMatch[] = []
      for (const profile of await uow.profiles.list()) {
        if (matched.has(profile.userId)) continue
        const score = scoreMatch(profile, opportunity, event, this.options.defaultMaxTravelKm)
        if (score.totalScore >= minScore) {
          results.push({ profile, score })
        }
      }
      return results.sort(byScoreThen<VolunteerMatch>((item) => item.profile.displayName))
    })
  }

  /**
   * Sends a "new opportunity" notice to ranked volunteers who hold at least
   * one of its required skills. Resolves to the number of notices sent.
   */
  async announceOpportunity(opportunityId: string, minScore = this.options.minScore): Promise<number> {
    const opportunity = await this.getOpportunity(opportunityId)
    const event = await this.uow.run((uow) => this.requireEvent(uow, opportunity))
    if (event.status !== 'published') {
      throw new BadRequestError('Event is not open for volunteers')
    }

    const required = requiredSkillsFor(opportunity, event)
    let notified = 0
    for (const { profile } of await this.findMatchingVolunteers(opportunityId, minScore)) {
      const owned = new Set(profile.skills.map((skill) => skill.toLowerCase()))
      const shared = required.filter((skill) => owned.has(skill.toLowerCase()))
      if (required.length > 0 && shared.length === 0) continue

      await this.notify(profile.userId, async () => {
        const notification = await this.notifications.sendNewOpportunity(
          profile.userId,
          event.title,
          opportunity.title,
          shared
        )
        if (notification.status === 'sent') notified++
      })
    }
    this.logger.info('Opportunity announced', { opportunityId, notified })
    return notified
  }

  /** Marks pending requests older than `daysOld` days as expired. */
  async expireStaleRequests(daysOld = this.options.requestExpiryDays): Promise<number> {
    const now = this.clock()
    const expired = await this.uow.run(async (uow) => {
      const stale = await uow.matchRequests.listPendingRequestedBefore(addDays(now, -daysOld))
      for (const request of stale) {
        assertTransition('Match request', MATCH_REQUEST_TRANSITIONS, request.status, 'expired')
        await uow.matchRequests.save({ ...request, status: 'expired', decidedAt: now })
      }
      return stale.length
    })
    this.logger.info('Expired stale match requests', { expired, daysOld })
    return expired
  }

  private async requireEvent(uow: UnitOfWork, opportunity: Opportunity): Promise<VolunteerEvent> {
    const event = await uow.events.get(opportunity.eventId)
    if (!event) {
      throw new NotFoundError('Event not found')
    }
    return event
  }

  private async confirmedForEvent(uow: UnitOfWork, eventId: string): Promise<number> {
    let total = 0
    for (const opportunity of await uow.opportunities.listByEvent(eventId)) {
      total += await uow.matches.countConfirmed(opportunity.id)
    }
    return total
  }

  private async assertNoDoubleBooking(uow: UnitOfWork, userId: string, event: VolunteerEvent): Promise<void> {
    const target = eventInterval(event)
    for (const match of await uow.matches.listByUser(userId)) {
      if (match.status !== 'confirmed') continue
      const booked = await uow.events.get(match.eventId)
      if (booked && intervalsOverlap(eventInterval(booked), target)) {
        throw new BadRequestError('User is already booked for an overlapping event')
      }
    }
  }

  private async notify(userId: string, send: () => Promise<unknown>): Promise<void> {
    try {
      await send()
    } catch (error) {
      this.logger.error('Failed to notify volunteer', {
        userId,
        error: error instanceof Error ? error.message : String(error)
      })
    }
  }
}
