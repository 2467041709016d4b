import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import jwt from 'jsonwebtoken'
import { z } from 'zod'
import { createTestContext, type TestContext } from './support/fixtures.js'
import { TEST_SECRET, call, idOf, startServer, tokenFor, type TestServer } from './support/http.js'

const EVENT_BODY = {
  title: 'Food Drive',
  description: 'Sorting donated food',
  location: { name: 'Community Hall', city: 'Springfield', state: 'IL' },
  requiredSkills: ['Cooking'],
  startsAt: '2030-03-06T10:00:00.000Z',
  endsAt: '2030-03-06T14:00:00.000Z'
}

describe('HTTP API', () => {
  let ctx: TestContext
  let server: TestServer
  const organizer = tokenFor('org', ['organizer'])
  const volunteer = tokenFor('ann')

  beforeEach(async () => {
    ctx = createTestContext()
    server = await startServer(ctx)
  })

  afterEach(async () => {
    await server.close()
  })

  it('answers health checks without a token', async () => {
    const res = await call(server, 'GET', '/health')
    expect(res.status).toBe(200)
    expect(res.body).toEqual({ status: 'ok' })
  })

  it('returns 404 for unknown routes', async () => {
    const res = await call(server, 'GET', '/nowhere')
    expect(res.status).toBe(404)
    expect(res.body).toEqual({ success: false, error: 'Not Found' })
  })

  describe('authentication', () => {
    it('requires a bearer token', async () => {
      const res = await call(server, 'GET', '/api/v1/users/me')
      expect(res.status).toBe(401)
      expect(res.body).toEqual({ success: false, error: 'Please authenticate' })
    })

    it('rejects tokens signed with another secret', async () => {
      const forged = jwt.sign({ sub: 'ann' }, 'other-secret', { algorithm: 'HS256' })
      const res = await call(server, 'GET', '/api/v1/users/me', { token: forged })
      expect(res.status).toBe(401)
      expect(res.body).toEqual({ success: false, error: 'Invalid token' })
    })

    it('reports expired tokens', async () => {
      const expired = jwt.sign({ sub: 'ann', exp: Math.floor(Date.now() / 1000) - 60 }, TEST_SECRET)
      const res = await call(server, 'GET', '/api/v1/users/me', { token: expired })
      expect(res.status).toBe(401)
      expect(res.body).toEqual({ success: false, error: 'Token expired' })
    })

    it('creates the user on first sight', async () => {
      const res = await call(server, 'GET', '/api/v1/users/me', { token: volunteer })
      expect(res.status).toBe(200)
      expect(res.body).toMatchObject({
        email: 'ann@example.org',
        roles: ['volunteer'],
        authSubject: 'ann',
        createdAt: '2030-03-04T09:00:00.000Z'
      })
      expect(ctx.uow.tables.users.size).toBe(1)
    })

    it('keeps volunteers out of organizer routes', async () => {
      const res = await call(server, 'POST', '/api/v1/events', { token: volunteer, body: EVENT_BODY })
      expect(res.status).toBe(403)
      expect(res.body).toEqual({ success: false, error: 'Insufficient permissions' })
    })
  })

  describe('input errors', () => {
    it('reports schema violations as 422', async () => {
      const res = await call(server, 'POST', '/api/v1/events', {
        token: organizer,
        body: { ...EVENT_BODY, title: '  ' }
      })
      expect(res.status).toBe(422)
      expect(res.body).toEqual({
        success: false,
        error: 'Validation failed',
        details: [{ path: 'title', message: 'String must contain at least 1 character(s)' }]
      })
    })

    it('checks id parameters', async () => {
      const res = await call(server, 'GET', '/api/v1/events/not-an-id', { token: organizer })
      expect(res.status).toBe(422)
      expect(res.body).toMatchObject({ details: [{ path: 'eventId', message: 'Must be a valid UUID' }] })
    })

    it('rejects malformed JSON', async () => {
      const res = await call(server, 'POST', '/api/v1/events', { token: organizer, raw: '{"title":' })
      expect(res.status).toBe(400)
      expect(res.body).toEqual({ success: false, error: 'Malformed JSON body' })
    })

    it('bounds day counts in queries', async () => {
      const tooBig = { success: false, error: 'Validation failed' }
      const recent = await call(server, 'GET', '/api/v1/volunteer-history?days=10000000000', { token: organizer })
      expect(recent.status).toBe(422)
      expect(recent.body).toEqual({
        ...tooBig,
        details: [{ path: 'days', message: 'Number must be less than or equal to 3650' }]
      })

      const expire = await call(server, 'POST', '/api/v1/volunteer-matching/expire-old-requests?daysOld=10000000000', {
        token: tokenFor('root', ['admin'])
      })
      expect(expire.status).toBe(422)
      expect(expire.body).toEqual({
        ...tooBig,
        details: [{ path: 'daysOld', message: 'Number must be less than or equal to 3650' }]
      })
    })

    it('maps service errors to their status', async () => {
      const res = await call(server, 'GET', '/api/v1/events/00000000-0000-4000-8000-000000000000', { token: organizer })
      expect(res.status).toBe(404)
      expect(res.body).toEqual({ success: false, error: 'Event not found' })
    })
  })

  it('takes a volunteer from application to confirmed match', async () => {
    const created = await call(server, 'POST', '/api/v1/events', { token: organizer, body: EVENT_BODY })
    expect(created.status).toBe(201)
    const eventId = idOf(created.body)

    const published = await call(server, 'POST', `/api/v1/events/${eventId}/publish`, { token: organizer })
    expect(published.body).toMatchObject({ message: 'Event published successfully', event: { status: 'published' } })

    const opportunity = await call(server, 'POST', '/api/v1/volunteer-matching/opportunities', {
      token: organizer,
      body: { eventId, title: 'Kitchen prep', maxSlots: 2 }
    })
    expect(opportunity.status).toBe(201)
    const opportunityId = idOf(opportunity.body)

    const profile = await call(server, 'POST', '/api/v1/profiles', {
      token: volunteer,
      body: { displayName: 'Ann', skills: ['Cooking'], availability: [{ weekday: 2, start: '09:00', end: '12:00' }] }
    })
    expect(profile.status).toBe(201)

    const applied = await call(server, 'POST', '/api/v1/volunteer-matching/match-requests', {
      token: volunteer,
      body: { opportunityId }
    })
    expect(applied.status).toBe(201)
    expect(applied.body).toMatchObject({ status: 'pending', score: 0.7 })

    const approved = await call(
      server,
      'POST',
      `/api/v1/volunteer-matching/match-requests/${idOf(applied.body)}/approve`,
      { token: organizer }
    )
    expect(approved.status).toBe(200)
    expect(approved.body).toMatchObject({ status: 'confirmed', opportunityId, eventId })

    const mine = await call(server, 'GET', '/api/v1/volunteer-matching/matches/by-user/me', { token: volunteer })
    expect(z.array(z.unknown()).parse(mine.body)).toHaveLength(1)

    const inbox = await call(server, 'GET', '/api/v1/notifications', { token: volunteer })
    expect(inbox.body).toMatchObject({
      notifications: [{ type: 'match_request_approved', subject: 'Volunteer Application Approved' }],
      total: 1,
      unreadCount: 1
    })

    const annId = z.object({ userId: z.string() }).parse(approved.body).userId
    const stranger = await call(server, 'GET', `/api/v1/volunteer-matching/matches/by-user/${annId}`, {
      token: tokenFor('ben')
    })
    expect(stranger.status).toBe(403)

    const staffView = await call(server, 'GET', `/api/v1/notifications/user/${annId}?unreadOnly=true`, {
      token: organizer
    })
    expect(staffView.status).toBe(200)
    expect(staffView.body).toMatchObject({ total: 1, unreadCount: 1 })
    const snooping = await call(server, 'GET', `/api/v1/notifications/user/${annId}`, { token: tokenFor('ben') })
    expect(snooping.status).toBe(403)
  })

  describe('reports', () => {
    it('serves CSV downloads to staff', async () => {
      const res = await call(server, 'GET', '/api/v1/reports/events/csv', { token: organizer })
      expect(res.status).toBe(200)
      expect(res.headers.get('content-type')).toBe('text/csv; charset=utf-8')
      expect(res.headers.get('content-disposition')).toMatch(/^attachment; filename="events-\d{4}-\d{2}-\d{2}\.csv"$/)
      expect(res.text).toBe(
        'Event ID,Title,Description,Status,Location,City,State,Required Skills,Start Date,End Date,Capacity\n'
      )
    })

    it('refuses volunteers', async () => {
      const res = await call(server, 'GET', '/api/v1/reports/events/csv', { token: volunteer })
      expect(res.status).toBe(403)
    })
  })
})
