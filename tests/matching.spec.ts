import { describe, it, expect, beforeEach } from 'vitest'
import type { OpportunityInput } from '../src/services/matching.js'
import type { Opportunity, User } from '../src/types.js'
import { addDays } from '../src/utils/dates.js'
import {
  NOW,
  addPublishedEvent,
  addUser,
  addVolunteer,
  createTestContext,
  type TestContext
} from './support/fixtures.js'
import { CONCURRENT_SESSION_USE } from './support/memory-store.js'

const WEDNESDAY_MORNING = [{ weekday: 2, start: '09:00', end: '12:00' }]

function addOpportunity(ctx: TestContext, eventId: string, input: Partial<OpportunityInput> = {}): Promise<Opportunity> {
  return ctx.services.matching.createOpportunity({ eventId, title: 'Kitchen prep', ...input })
}

function seedConfirmedMatch(ctx: TestContext, user: User, opportunity: Opportunity): void {
  ctx.uow.tables.matches.set('seeded-match', {
    id: 'seeded-match',
    userId: user.id,
    opportunityId: opportunity.id,
    eventId: opportunity.eventId,
    status: 'confirmed',
    score: null,
    createdAt: NOW,
    cancelledAt: null
  })
}

describe('MatchingService', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createTestContext()
  })

  describe('opportunities', () => {
    it('rejects invalid input with every problem listed', async () => {
      const event = await addPublishedEvent(ctx)
      await expect(addOpportunity(ctx, event.id, { title: ' ', maxSlots: 0 })).rejects.toMatchObject({
        status: 422,
        details: [
          { path: 'title', message: 'Opportunity title is required' },
          { path: 'maxSlots', message: 'Maximum slots must be greater than 0' }
        ]
      })
    })

    it('refuses cancelled events', async () => {
      const event = await addPublishedEvent(ctx)
      await ctx.services.events.cancel(event.id)
      await expect(addOpportunity(ctx, event.id)).rejects.toMatchObject({
        status: 400,
        message: 'Cannot add opportunities to a cancelled event'
      })
    })

    it('lists opportunities of one event', async () => {
      const food = await addPublishedEvent(ctx)
      const park = await addPublishedEvent(ctx, { title: 'Park cleanup' })
      const prep = await addOpportunity(ctx, food.id)
      await addOpportunity(ctx, park.id, { title: 'Litter picking' })

      expect(await ctx.services.matching.listOpportunities(food.id)).toEqual([prep])
      expect(await ctx.services.matching.listOpportunities()).toHaveLength(2)
    })
  })

  describe('match requests', () => {
    it('stores the match score of the requesting volunteer', async () => {
      const volunteer = await addVolunteer(ctx, 'ann', { skills: ['Cooking'], availability: WEDNESDAY_MORNING })
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)

      const request = await ctx.services.matching.createMatchRequest(volunteer.id, opportunity.id)

      expect(request).toMatchObject({
        userId: volunteer.id,
        opportunityId: opportunity.id,
        status: 'pending',
        score: 0.7,
        requestedAt: NOW,
        decidedAt: null
      })
    })

    it('leaves the score empty without a profile', async () => {
      const user = await addUser(ctx, 'newcomer')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)

      const request = await ctx.services.matching.createMatchRequest(user.id, opportunity.id)
      expect(request.score).toBeNull()
    })

    it('refuses a second open request for the same opportunity', async () => {
      const volunteer = await addVolunteer(ctx, 'ann')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)
      await ctx.services.matching.createMatchRequest(volunteer.id, opportunity.id)

      await expect(ctx.services.matching.createMatchRequest(volunteer.id, opportunity.id)).rejects.toMatchObject({
        status: 400,
        message: 'Match request already exists for this opportunity'
      })
    })

    it('refuses volunteers already matched to the opportunity', async () => {
      const volunteer = await addVolunteer(ctx, 'ann')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)
      seedConfirmedMatch(ctx, volunteer, opportunity)

      await expect(ctx.services.matching.createMatchRequest(volunteer.id, opportunity.id)).rejects.toMatchObject({
        status: 400,
        message: 'User is already matched to this opportunity'
      })
      expect(ctx.uow.tables.matchRequests.size).toBe(0)
    })

    it('refuses events that are not published', async () => {
      const volunteer = await addVolunteer(ctx, 'ann')
      const draft = await ctx.services.events.create({
        title: 'Draft drive',
        description: 'Not yet announced',
        location: { name: 'Hall' },
        requiredSkills: ['Cooking'],
        startsAt: new Date('2030-03-06T10:00:00.000Z')
      })
      const opportunity = await addOpportunity(ctx, draft.id)

      await expect(ctx.services.matching.createMatchRequest(volunteer.id, opportunity.id)).rejects.toMatchObject({
        status: 400,
        message: 'Event is not open for volunteers'
      })
    })

    it('reports unknown users and opportunities', async () => {
      const volunteer = await addVolunteer(ctx, 'ann')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)

      await expect(ctx.services.matching.createMatchRequest('missing', opportunity.id)).rejects.toMatchObject({
        status: 404,
        message: 'User not found'
      })
      await expect(ctx.services.matching.createMatchRequest(volunteer.id, 'missing')).rejects.toMatchObject({
        status: 404,
        message: 'Opportunity not found'
      })
    })
  })

  describe('unit of work', () => {
    it('refuses overlapping queries on one session', async () => {
      await expect(
        ctx.uow.run((uow) => Promise.all([uow.users.get('ann'), uow.opportunities.get('prep')]))
      ).rejects.toThrow(CONCURRENT_SESSION_USE)
    })
  })

  describe('approve', () => {
    it('confirms the match and tells the volunteer', async () => {
      const volunteer = await addVolunteer(ctx, 'ann')
      const event = await addPublishedEvent(ctx)
      const opportunity = await addOpportunity(ctx, event.id)
      const request = await ctx.services.matching.createMatchRequest(volunteer.id, opportunity.id)

      const match = await ctx.services.matching.approve(request.id)

      expect(match).toMatchObject({
        userId: volunteer.id,
        opportunityId: opportunity.id,
        eventId: event.id,
        status: 'confirmed',
        createdAt: NOW,
        cancelledAt: null
      })
      expect((await ctx.services.matching.getMatchRequest(request.id)).status).toBe('approved')
      expect(ctx.dispatcher.delivered.map((n) => [n.recipientId, n.type, n.channel])).toEqual([
        [volunteer.id, 'match_request_approved', 'email']
      ])
      expect(ctx.dispatcher.delivered[0].body).toBe(
        'Great news! Your application has been approved.\n\n' +
          'Event: Food Drive\n' +
          'Role: Kitchen prep\n\n' +
          'You will receive further details about the event soon.'
      )
    })

    it('only decides pending requests', async () => {
      const volunteer = await addVolunteer(ctx, 'ann')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)
      const request = await ctx.services.matching.createMatchRequest(volunteer.id, opportunity.id)
      await ctx.services.matching.approve(request.id)

      await expect(ctx.services.matching.approve(request.id)).rejects.toMatchObject({
        status: 400,
        message: 'Match request cannot move from approved to approved'
      })
      await expect(ctx.services.matching.reject(request.id)).rejects.toMatchObject({
        message: 'Match request cannot move from approved to rejected'
      })
    })

    it('refuses a second confirmed match for the same opportunity', async () => {
      const volunteer = await addVolunteer(ctx, 'ann')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)
      const request = await ctx.services.matching.createMatchRequest(volunteer.id, opportunity.id)
      seedConfirmedMatch(ctx, volunteer, opportunity)

      await expect(ctx.services.matching.approve(request.id)).rejects.toMatchObject({
        status: 400,
        message: 'User already has a confirmed match for this opportunity'
      })
      expect((await ctx.services.matching.getMatchRequest(request.id)).status).toBe('pending')
      expect(ctx.uow.tables.matches.size).toBe(1)
    })

    it('stops at the opportunity slot limit', async () => {
      const ann = await addVolunteer(ctx, 'ann')
      const ben = await addVolunteer(ctx, 'ben')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id, { maxSlots: 1 })
      const first = await ctx.services.matching.createMatchRequest(ann.id, opportunity.id)
      const second = await ctx.services.matching.createMatchRequest(ben.id, opportunity.id)
      await ctx.services.matching.approve(first.id)

      await expect(ctx.services.matching.approve(second.id)).rejects.toMatchObject({
        status: 400,
        message: 'Opportunity has no open slots'
      })
      expect((await ctx.services.matching.getMatchRequest(second.id)).status).toBe('pending')
      expect(await ctx.services.matching.matchesByOpportunity(opportunity.id)).toHaveLength(1)
    })

    it('stops at the event capacity across opportunities', async () => {
      const ann = await addVolunteer(ctx, 'ann')
      const ben = await addVolunteer(ctx, 'ben')
      const event = await addPublishedEvent(ctx, { capacity: 1 })
      const prep = await addOpportunity(ctx, event.id)
      const serving = await addOpportunity(ctx, event.id, { title: 'Serving line' })
      await ctx.services.matching.approve((await ctx.services.matching.createMatchRequest(ann.id, prep.id)).id)
      const late = await ctx.services.matching.createMatchRequest(ben.id, serving.id)

      await expect(ctx.services.matching.approve(late.id)).rejects.toMatchObject({
        status: 400,
        message: 'Event is at capacity'
      })
    })

    it('refuses to double-book a volunteer for overlapping events', async () => {
      const ann = await addVolunteer(ctx, 'ann')
      const morning = await addPublishedEvent(ctx)
      const midday = await addPublishedEvent(ctx, {
        title: 'Soup kitchen',
        startsAt: new Date('2030-03-06T12:00:00.000Z'),
        endsAt: new Date('2030-03-06T16:00:00.000Z')
      })
      const afternoon = await addPublishedEvent(ctx, {
        title: 'Park cleanup',
        startsAt: new Date('2030-03-06T14:00:00.000Z'),
        endsAt: new Date('2030-03-06T16:00:00.000Z')
      })
      const first = await addOpportunity(ctx, morning.id)
      const clash = await addOpportunity(ctx, midday.id)
      const later = await addOpportunity(ctx, afternoon.id)
      await ctx.services.matching.approve((await ctx.services.matching.createMatchRequest(ann.id, first.id)).id)

      const clashing = await ctx.services.matching.createMatchRequest(ann.id, clash.id)
      await expect(ctx.services.matching.approve(clashing.id)).rejects.toMatchObject({
        status: 400,
        message: 'User is already booked for an overlapping event'
      })

      const adjacent = await ctx.services.matching.createMatchRequest(ann.id, later.id)
      await expect(ctx.services.matching.approve(adjacent.id)).resolves.toMatchObject({ eventId: afternoon.id })
    })
  })

  describe('reject', () => {
    it('records the reason, notifies, and allows a new application', async () => {
      const ann = await addVolunteer(ctx, 'ann')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)
      const request = await ctx.services.matching.createMatchRequest(ann.id, opportunity.id)

      const rejected = await ctx.services.matching.reject(request.id, '  Shift is full  ')

      expect(rejected).toMatchObject({ status: 'rejected', decidedAt: NOW, decisionReason: 'Shift is full' })
      expect(ctx.dispatcher.delivered[0].body).toBe(
        'Thank you for your interest in volunteering.\n\n' +
          'Event: Food Drive\n' +
          'Role: Kitchen prep\n\n' +
          'Unfortunately, we are unable to accept your application at this time.\n\n' +
          'Reason: Shift is full'
      )
      await expect(ctx.services.matching.createMatchRequest(ann.id, opportunity.id)).resolves.toMatchObject({
        status: 'pending'
      })
    })
  })

  describe('cancelMatch', () => {
    it('cancels once', async () => {
      const ann = await addVolunteer(ctx, 'ann')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)
      const match = await ctx.services.matching.approve(
        (await ctx.services.matching.createMatchRequest(ann.id, opportunity.id)).id
      )

      await expect(ctx.services.matching.cancelMatch(match.id)).resolves.toMatchObject({
        status: 'cancelled',
        cancelledAt: NOW
      })
      await expect(ctx.services.matching.cancelMatch(match.id)).rejects.toMatchObject({
        message: 'Match cannot move from cancelled to cancelled'
      })
    })
  })

  describe('expireStaleRequests', () => {
    it('expires pending requests older than the cutoff', async () => {
      const ann = await addVolunteer(ctx, 'ann')
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)
      const request = await ctx.services.matching.createMatchRequest(ann.id, opportunity.id)

      ctx.clock.now = addDays(NOW, 10)
      expect(await ctx.services.matching.expireStaleRequests()).toBe(0)

      ctx.clock.now = addDays(NOW, 31)
      expect(await ctx.services.matching.expireStaleRequests(30)).toBe(1)
      expect(await ctx.services.matching.getMatchRequest(request.id)).toMatchObject({
        status: 'expired',
        decidedAt: addDays(NOW, 31)
      })
    })
  })

  describe('findMatchingOpportunities', () => {
    it('ranks open opportunities above the minimum score, ties by title', async () => {
      const ann = await addVolunteer(ctx, 'ann', { skills: ['Cooking'], availability: WEDNESDAY_MORNING })
      const event = await addPublishedEvent(ctx)
      await addOpportunity(ctx, event.id, { title: 'Serving line', requiredSkills: ['cooking'] })
      await addOpportunity(ctx, event.id, { title: 'Delivery driver', requiredSkills: ['Driving'] })
      await addOpportunity(ctx, event.id, { title: 'Kitchen prep' })

      const ranked = await ctx.services.matching.findMatchingOpportunities(ann.id)

      expect(ranked.map((m) => [m.opportunity.title, m.score.totalScore])).toEqual([
        ['Kitchen prep', 0.7],
        ['Serving line', 0.7]
      ])

      const everything = await ctx.services.matching.findMatchingOpportunities(ann.id, 0)
      expect(everything.map((m) => [m.opportunity.title, m.score.totalScore])).toEqual([
        ['Kitchen prep', 0.7],
        ['Serving line', 0.7],
        ['Delivery driver', 0.3]
      ])
    })

    it('skips started events and opportunities already confirmed', async () => {
      const ann = await addVolunteer(ctx, 'ann', { skills: ['Cooking'] })
      const tuesday = await addPublishedEvent(ctx, {
        title: 'Tuesday drive',
        startsAt: new Date('2030-03-05T10:00:00.000Z'),
        endsAt: new Date('2030-03-05T12:00:00.000Z')
      })
      const wednesday = await addPublishedEvent(ctx)
      await addOpportunity(ctx, tuesday.id, { title: 'Early shift' })
      const booked = await addOpportunity(ctx, wednesday.id, { title: 'Booked shift' })
      await addOpportunity(ctx, wednesday.id, { title: 'Open shift' })
      await ctx.services.matching.approve((await ctx.services.matching.createMatchRequest(ann.id, booked.id)).id)

      ctx.clock.now = new Date('2030-03-05T11:00:00.000Z')
      const ranked = await ctx.services.matching.findMatchingOpportunities(ann.id, 0)

      expect(ranked.map((m) => m.opportunity.title)).toEqual(['Open shift'])
    })

    it('needs a profile', async () => {
      const user = await addUser(ctx, 'newcomer')
      await expect(ctx.services.matching.findMatchingOpportunities(user.id)).rejects.toMatchObject({
        status: 404,
        message: 'Profile not found'
      })
    })
  })

  describe('findMatchingVolunteers', () => {
    it('ranks profiles by score, ties by display name', async () => {
      await addVolunteer(ctx, 'yara', { displayName: 'Yara', skills: ['Cooking'], availability: WEDNESDAY_MORNING })
      await addVolunteer(ctx, 'carl', { displayName: 'Carl' })
      await addVolunteer(ctx, 'amy', { displayName: 'Amy', skills: ['cooking'], availability: WEDNESDAY_MORNING })
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)

      const ranked = await ctx.services.matching.findMatchingVolunteers(opportunity.id)

      expect(ranked.map((m) => [m.profile.displayName, m.score.totalScore])).toEqual([
        ['Amy', 0.7],
        ['Yara', 0.7]
      ])
    })
  })

  describe('announceOpportunity', () => {
    it('notifies volunteers who share a required skill', async () => {
      const ann = await addVolunteer(ctx, 'ann', { skills: ['Cooking'] })
      await addVolunteer(ctx, 'ben', { skills: ['Driving'], availability: WEDNESDAY_MORNING })
      const opportunity = await addOpportunity(ctx, (await addPublishedEvent(ctx)).id)

      expect(await ctx.services.matching.announceOpportunity(opportunity.id, 0)).toBe(1)
      expect(ctx.dispatcher.delivered).toHaveLength(1)
      expect(ctx.dispatcher.delivered[0]).toMatchObject({
        recipientId: ann.id,
        type: 'new_opportunity',
        subject: 'New Volunteer Opportunity',
        body:
          'A new volunteer opportunity matches your skills!\n\n' +
          'Event: Food Drive\n' +
          'Role: Kitchen prep\n' +
          'Matching Skills: Cooking\n\n' +
          'Apply now to secure your spot!'
      })
    })
  })
})
