import { describe, it, expect, beforeEach } from 'vitest'
import type { Notification } from '../src/types.js'
import { NOW, addUser, addVolunteer, createTestContext, type TestContext } from './support/fixtures.js'

describe('NotificationService', () => {
  let ctx: TestContext

  beforeEach(() => {
    ctx = createTestContext()
  })

  it('delivers through the first channel the recipient enabled', async () => {
    const ann = await addVolunteer(ctx, 'ann', {
      notificationPreferences: { email: false, sms: true, push: true, inApp: true }
    })

    const notification = await ctx.services.notifications.send({
      recipientId: ann.id,
      type: 'profile_update_reminder',
      subject: '  Please update your profile ',
      body: 'Add your availability.'
    })

    expect(notification).toMatchObject({
      subject: 'Please update your profile',
      channel: 'in_app',
      priority: 'normal',
      status: 'sent',
      read: false,
      queuedAt: NOW,
      sentAt: NOW,
      error: null,
      attempts: 1
    })
    expect(ctx.dispatcher.delivered.map((n) => n.id)).toEqual([notification.id])
  })

  it('uses email for recipients without a profile unless a channel is given', async () => {
    const user = await addUser(ctx, 'ann')
    const message = { recipientId: user.id, type: 'event_update', subject: 'Hello', body: 'World' } as const

    expect((await ctx.services.notifications.send(message)).channel).toBe('email')
    expect((await ctx.services.notifications.send({ ...message, channel: 'sms' })).channel).toBe('sms')
  })

  it('validates the message', async () => {
    const user = await addUser(ctx, 'ann')
    await expect(
      ctx.services.notifications.send({
        recipientId: user.id,
        type: 'event_update',
        subject: 'x'.repeat(201),
        body: ' ',
        priority: 'asap'
      })
    ).rejects.toMatchObject({
      status: 422,
      details: [
        { path: 'subject', message: 'Subject must be 200 characters or less' },
        { path: 'body', message: 'Body is required' },
        { path: 'priority', message: 'Priority must be one of: low, normal, high, urgent' }
      ]
    })
  })

  it('needs a known recipient', async () => {
    await expect(
      ctx.services.notifications.send({ recipientId: 'missing', type: 'event_update', subject: 'Hi', body: 'There' })
    ).rejects.toMatchObject({ status: 404, message: 'Recipient not found' })
  })

  it('records failed deliveries and retries them', async () => {
    const user = await addUser(ctx, 'ann')
    ctx.dispatcher.failWith = 'Mail server unavailable'

    const failed = await ctx.services.notifications.send({
      recipientId: user.id,
      type: 'event_update',
      subject: 'Hi',
      body: 'There'
    })
    expect(failed).toMatchObject({ status: 'failed', error: 'Mail server unavailable', sentAt: null, attempts: 1 })

    ctx.dispatcher.failWith = null
    expect(await ctx.services.notifications.retryFailed()).toBe(1)
    expect(await ctx.services.notifications.get(failed.id)).toMatchObject({ status: 'sent', error: null, attempts: 2 })
    expect(await ctx.services.notifications.retryFailed()).toBe(0)
  })

  it('lists newest first and counts unread', async () => {
    const user = await addUser(ctx, 'ann')
    const sent: Notification[] = []
    for (const [hour, subject] of [[9, 'First'], [10, 'Second'], [11, 'Third']] as const) {
      ctx.clock.now = new Date(`2030-03-04T${String(hour).padStart(2, '0')}:30:00.000Z`)
      sent.push(await ctx.services.notifications.send({ recipientId: user.id, type: 'event_update', subject, body: 'Body' }))
    }
    await ctx.services.notifications.markRead(sent[1].id)

    const page = await ctx.services.notifications.listForUser(user.id, { limit: 2 })
    expect(page.notifications.map((n) => n.subject)).toEqual(['Third', 'Second'])
    expect(page.total).toBe(3)
    expect(page.unreadCount).toBe(2)

    const unread = await ctx.services.notifications.listForUser(user.id, { unreadOnly: true })
    expect(unread.notifications.map((n) => n.subject)).toEqual(['Third', 'First'])
    expect(await ctx.services.notifications.unreadCount(user.id)).toBe(2)
  })

  it('keeps the first read time', async () => {
    const user = await addUser(ctx, 'ann')
    const notification = await ctx.services.notifications.send({
      recipientId: user.id,
      type: 'event_update',
      subject: 'Hi',
      body: 'There'
    })

    await ctx.services.notifications.markRead(notification.id)
    ctx.clock.now = new Date('2030-03-05T09:00:00.000Z')
    expect(await ctx.services.notifications.markRead(notification.id)).toMatchObject({ read: true, readAt: NOW })
  })

  it('returns queued notifications as pending', async () => {
    const user = await addUser(ctx, 'ann')
    const queued = await ctx.services.notifications.send({
      recipientId: user.id,
      type: 'event_update',
      subject: 'Hi',
      body: 'There'
    })
    ctx.uow.tables.notifications.set(queued.id, { ...queued, status: 'queued', sentAt: null })

    expect((await ctx.services.notifications.pending()).map((n) => n.id)).toEqual([queued.id])
  })

  it('fills the event assignment template', async () => {
    const user = await addUser(ctx, 'ann')
    const notification = await ctx.services.notifications.sendEventAssignment(user.id, {
      title: 'Food Drive',
      startsAt: new Date('2030-03-06T15:45:00.000Z'),
      location: 'Community Hall'
    })

    expect(notification).toMatchObject({
      type: 'event_assignment',
      subject: 'Event Assignment: Food Drive',
      body:
        "You have been assigned to the 'Food Drive' event.\n\n" +
        'Date: March 06, 2030 at 03:45 PM\n' +
        'Location: Community Hall\n\n' +
        'Please confirm your attendance and prepare accordingly.'
    })
  })

  it('fills the rejection template without a reason', async () => {
    const user = await addUser(ctx, 'ann')
    const notification = await ctx.services.notifications.sendMatchRequestRejected(user.id, 'Food Drive', 'Kitchen prep')

    expect(notification.subject).toBe('Volunteer Application Update')
    expect(notification.body).toBe(
      'Thank you for your interest in volunteering.\n\n' +
        'Event: Food Drive\n' +
        'Role: Kitchen prep\n\n' +
        'Unfortunately, we are unable to accept your application at this time.'
    )
  })
})
