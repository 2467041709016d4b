import { describe, it, expect, beforeEach } from 'vitest'
import type { User, VolunteerEvent, VolunteerHistoryEntry } from '../src/types.js'
import { addPublishedEvent, addUser, createTestContext, type TestContext } from './support/fixtures.js'

describe('VolunteerHistoryService', () => {
  let ctx: TestContext
  let ann: User
  let ben: User
  let foodDrive: VolunteerEvent
  let cleanup: VolunteerEvent
  let entries: VolunteerHistoryEntry[]

  beforeEach(async () => {
    ctx = createTestContext()
    ann = await addUser(ctx, 'ann')
    ben = await addUser(ctx, 'ben')
    foodDrive = await addPublishedEvent(ctx)
    cleanup = await addPublishedEvent(ctx, { title: 'Park cleanup' })

    const history = ctx.services.history
    entries = [
      await history.create({ userId: ann.id, eventId: foodDrive.id, role: 'Cook', hours: 3, date: new Date('2030-01-10T12:00:00.000Z') }),
      await history.create({ userId: ann.id, eventId: foodDrive.id, role: 'Server', hours: 2.5, date: new Date('2030-02-14T12:00:00.000Z') }),
      await history.create({ userId: ann.id, eventId: cleanup.id, role: 'Cook', hours: 4, date: new Date('2030-03-01T12:00:00.000Z') }),
      await history.create({ userId: ben.id, eventId: foodDrive.id, role: 'Driver', hours: 8, date: new Date('2030-02-01T12:00:00.000Z') })
    ]
  })

  it('validates entries', async () => {
    await expect(
      ctx.services.history.create({
        userId: ann.id,
        eventId: foodDrive.id,
        role: ' ',
        hours: 25,
        date: new Date('2030-03-05T00:00:00.000Z'),
        notes: 'x'.repeat(1001)
      })
    ).rejects.toMatchObject({
      status: 422,
      details: [
        { path: 'role', message: 'Role is required' },
        { path: 'hours', message: 'Hours cannot exceed 24 for a single entry' },
        { path: 'date', message: 'Date cannot be in the future' },
        { path: 'notes', message: 'Notes must be 1000 characters or less' }
      ]
    })
  })

  it('needs an existing user and event', async () => {
    const entry = { role: 'Cook', hours: 1, date: new Date('2030-01-01T00:00:00.000Z') }
    await expect(ctx.services.history.create({ ...entry, userId: 'missing', eventId: foodDrive.id })).rejects.toMatchObject({
      status: 404,
      message: 'User not found'
    })
    await expect(ctx.services.history.create({ ...entry, userId: ann.id, eventId: 'missing' })).rejects.toMatchObject({
      status: 404,
      message: 'Event not found'
    })
  })

  it('lists a user history most recent first', async () => {
    const listed = await ctx.services.history.byUser(ann.id)
    expect(listed.map((entry) => entry.id)).toEqual([entries[2].id, entries[1].id, entries[0].id])
  })

  it('totals hours overall and within a period', async () => {
    expect(await ctx.services.history.totalHours(ann.id)).toBe(9.5)
    expect(
      await ctx.services.history.hoursInPeriod(ann.id, new Date('2030-02-01T00:00:00.000Z'), new Date('2030-02-28T23:59:59.000Z'))
    ).toBe(2.5)
    await expect(
      ctx.services.history.hoursInPeriod(ann.id, new Date('2030-03-01T00:00:00.000Z'), new Date('2030-02-01T00:00:00.000Z'))
    ).rejects.toMatchObject({ status: 422, message: 'Start date must be before end date' })
  })

  it('counts distinct events and roles', async () => {
    expect(await ctx.services.history.eventCount(ann.id)).toBe(2)
    expect(await ctx.services.history.roles(ann.id)).toEqual(['Cook', 'Server'])
  })

  it('summarizes a volunteer', async () => {
    expect(await ctx.services.history.statistics(ann.id)).toEqual({
      totalHours: 9.5,
      totalEvents: 2,
      uniqueRoles: 2,
      firstVolunteerDate: new Date('2030-01-10T12:00:00.000Z'),
      lastVolunteerDate: new Date('2030-03-01T12:00:00.000Z'),
      averageHoursPerEvent: 4.75,
      mostCommonRole: 'Cook'
    })
    expect(await ctx.services.history.statistics('nobody')).toMatchObject({ totalHours: 0, mostCommonRole: null })
  })

  it('breaks hours down by month', async () => {
    expect(await ctx.services.history.monthlyHours(ann.id, 2030)).toEqual({
      1: 3,
      2: 2.5,
      3: 4,
      4: 0,
      5: 0,
      6: 0,
      7: 0,
      8: 0,
      9: 0,
      10: 0,
      11: 0,
      12: 0
    })
  })

  it('ranks top volunteers', async () => {
    expect(await ctx.services.history.topVolunteersByHours()).toEqual([
      { userId: ann.id, value: 9.5 },
      { userId: ben.id, value: 8 }
    ])
    expect(await ctx.services.history.topVolunteersByEvents(1)).toEqual([{ userId: ann.id, value: 2 }])
  })

  it('returns recent entries', async () => {
    const recent = await ctx.services.history.recent(30)
    expect(recent.map((entry) => entry.id)).toEqual([entries[2].id, entries[1].id])
  })

  it('updates and deletes entries', async () => {
    const updated = await ctx.services.history.update(entries[0].id, { hours: 5, notes: '  Stayed late ' })
    expect(updated).toMatchObject({ hours: 5, notes: 'Stayed late', role: 'Cook' })
    expect(await ctx.services.history.totalHours(ann.id)).toBe(11.5)

    await ctx.services.history.delete(entries[0].id)
    await expect(ctx.services.history.get(entries[0].id)).rejects.toMatchObject({
      status: 404,
      message: 'History entry not found'
    })
    expect(await ctx.services.history.byEvent(foodDrive.id)).toHaveLength(2)
  })
})
