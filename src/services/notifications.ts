import { randomUUID } from 'node:crypto'
import { NotFoundError, ValidationError, type ErrorDetail } from '../errors.js'
import type { UnitOfWorkManager } from '../repositories/interfaces.js'
import {
  NOTIFICATION_PRIORITIES,
  type Clock,
  type Notification,
  type NotificationChannel,
  type NotificationPreferences,
  type NotificationPriority,
  type NotificationStatus,
  type NotificationType
} from '../types.js'
import { formatEventDate } from '../utils/dates.js'
import type { Logger } from '../utils/logger.js'
import type { NotificationDispatcher } from './notification-dispatcher.js'

export interface SendNotificationInput {
  recipientId: string
  type: NotificationType
  subject: string
  body: string
  channel?: NotificationChannel
  priority?: NotificationPriority | string
}

export interface NotificationListOptions {
  limit?: number
  status?: NotificationStatus
  unreadOnly?: boolean
}

export interface EventDetails {
  title: string
  startsAt: Date
  location: string
}

// Fallback order when no channel is given
const CHANNEL_ORDER: { channel: NotificationChannel; enabled: (p: NotificationPreferences) => boolean }[] = [
  { channel: 'email', enabled: (p) => p.email },
  { channel: 'in_app', enabled: (p) => p.inApp },
  { channel: 'push', enabled: (p) => p.push },
  { channel: 'sms', enabled: (p) => p.sms }
]

function isPriority(value: string): value is NotificationPriority {
  return NOTIFICATION_PRIORITIES.some((priority) => priority === value)
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class NotificationService {
  constructor(
    private readonly uow: UnitOfWorkManager,
    private readonly dispatcher: NotificationDispatcher,
    private readonly logger: Logger,
    private readonly clock: Clock = () => new Date()
  ) {}

  async send(input: SendNotificationInput): Promise<Notification> {
    const subject = input.subject.trim()
    const body = input.body.trim()
    const priority = input.priority ?? 'normal'

    const problems: ErrorDetail[] = []
    if (subject.length === 0) problems.push({ path: 'subject', message: 'Subject is required' })
    if (subject.length > 200) problems.push({ path: 'subject', message: 'Subject must be 200 characters or less' })
    if (body.length === 0) problems.push({ path: 'body', message: 'Body is required' })
    if (body.length > 2000) problems.push({ path: 'body', message: 'Body must be 2000 characters or less' })
    if (!isPriority(priority)) {
      problems.push({ path: 'priority', message: 'Priority must be one of: low, normal, high, urgent' })
    }
    if (problems.length > 0 || !isPriority(priority)) {
      throw new ValidationError(problems)
    }

    const notification = await this.uow.run(async (uow) => {
      const recipient = await uow.users.get(input.recipientId)
      if (!recipient) {
        throw new NotFoundError('Recipient not found')
      }
      const profile = await uow.profiles.get(input.recipientId)
      const channel = input.channel ?? this.preferredChannel(profile?.notificationPreferences ?? null)

      const queued: Notification = {
        id: randomUUID(),
        recipientId: input.recipientId,
        type: input.type,
        subject,
        body,
        channel,
        priority,
        status: 'queued',
        read: false,
        readAt: null,
        queuedAt: this.clock(),
        sentAt: null,
        error: null,
        attempts: 0
      }
      await uow.notifications.save(queued)
      return queued
    })

    const processed = await this.process(notification)
    this.logger.info('Notification sent', {
      notificationId: processed.id,
      type: processed.type,
      recipientId: processed.recipientId,
      status: processed.status
    })
    return processed
  }

  sendEventAssignment(recipientId: string, event: EventDetails): Promise<Notification> {
    return this.send({
      recipientId,
      type: 'event_assignment',
      subject: `Event Assignment: ${event.title}`,
      body:
        `You have been assigned to the '${event.title}' event.\n\n` +
        `Date: ${formatEventDate(event.startsAt)}\n` +
        `Location: ${event.location}\n\n` +
        'Please confirm your attendance and prepare accordingly.'
    })
  }

  sendEventReminder(recipientId: string, event: EventDetails, hoursBefore = 24): Promise<Notification> {
    const lead = hoursBefore >= 24 ? `${Math.floor(hoursBefore / 24)} day(s)` : `${hoursBefore} hour(s)`
    return this.send({
      recipientId,
      type: 'event_reminder',
      subject: `Reminder: ${event.title}`,
      body:
        `Reminder: You have a volunteer event in ${lead}.\n\n` +
        `Event: ${event.title}\n` +
        `Date: ${formatEventDate(event.startsAt)}\n` +
        `Location: ${event.location}\n\n` +
        'Please arrive on time and bring any necessary items.'
    })
  }

  sendEventUpdate(recipientId: string, eventTitle: string, updateDetails: string): Promise<Notification> {
    return this.send({
      recipientId,
      type: 'event_update',
      subject: `Event Update: ${eventTitle}`,
      body:
        `There has been an update to the '${eventTitle}' event:\n\n` +
        `${updateDetails}\n\n` +
        'Please review the changes and adjust your plans accordingly.',
      priority: 'high'
    })
  }

  sendEventCancellation(recipientId: string, eventTitle: string, reason?: string): Promise<Notification> {
    let body = `Unfortunately, the '${eventTitle}' event has been cancelled.`
    if (reason) {
      body += `\n\nReason: ${reason}`
    }
    return this.send({
      recipientId,
      type: 'event_cancellation',
      subject: `Event Cancelled: ${eventTitle}`,
      body,
      priority: 'high'
    })
  }

  sendMatchRequestApproved(recipientId: string, eventTitle: string, opportunityTitle: string): Promise<Notification> {
    return this.send({
      recipientId,
      type: 'match_request_approved',
      subject: 'Volunteer Application Approved',
      body:
        'Great news! Your application has been approved.\n\n' +
        `Event: ${eventTitle}\n` +
        `Role: ${opportunityTitle}\n\n` +
        'You will receive further details about the event soon.'
    })
  }

  sendMatchRequestRejected(
    recipientId: string,
    eventTitle: string,
    opportunityTitle: string,
    reason?: string
  ): Promise<Notification> {
    let body =
      'Thank you for your interest in volunteering.\n\n' +
      `Event: ${eventTitle}\n` +
      `Role: ${opportunityTitle}\n\n` +
      'Unfortunately, we are unable to accept your application at this time.'
    if (reason) {
      body += `\n\nReason: ${reason}`
    }
    return this.send({
      recipientId,
      type: 'match_request_rejected',
      subject: 'Volunteer Application Update',
      body
    })
  }

  sendNewOpportunity(
    recipientId: string,
    eventTitle: string,
    opportunityTitle: string,
    matchingSkills: string[]
  ): Promise<Notification> {
    return this.send({
      recipientId,
      type: 'new_opportunity',
      subject: 'New Volunteer Opportunity',
      body:
        'A new volunteer opportunity matches your skills!\n\n' +
        `Event: ${eventTitle}\n` +
        `Role: ${opportunityTitle}\n` +
        `Matching Skills: ${matchingSkills.join(', ')}\n\n` +
        'Apply now to secure your spot!'
    })
  }

  async get(id: string): Promise<Notification> {
    const notification = await this.uow.run((uow) => uow.notifications.get(id))
    if (!notification) {
      throw new NotFoundError('Notification not found')
    }
    return notification
  }

  /** Newest first, with the total before `limit` is applied. */
  async listForUser(
    userId: string,
    options: NotificationListOptions = {}
  ): Promise<{ notifications: Notification[]; total: number; unreadCount: number }> {
    const all = await this.uow.run((uow) => uow.notifications.listByRecipient(userId))
    const filtered = all.filter(
      (notification) =>
        (!options.status || notification.status === options.status) &&
        (!options.unreadOnly || !notification.read)
    )
    return {
      notifications: options.limit ? filtered.slice(0, options.limit) : filtered,
      total: filtered.length,
      unreadCount: all.filter(isUnread).length
    }
  }

  async markRead(id: string): Promise<Notification> {
    return this.uow.run(async (uow) => {
      const notification = await uow.notifications.get(id)
      if (!notification) {
        throw new NotFoundError('Notification not found')
      }
      if (notification.read) return notification

      const updated: Notification = { ...notification, read: true, readAt: this.clock() }
      await uow.notifications.save(updated)
      this.logger.info('Notification marked as read', { notificationId: id })
      return updated
    })
  }

  async unreadCount(userId: string): Promise<number> {
    const all = await this.uow.run((uow) => uow.notifications.listByRecipient(userId))
    return all.filter(isUnread).length
  }

  pending(): Promise<Notification[]> {
    return this.uow.run((uow) => uow.notifications.listByStatus('queued'))
  }

  /** Redelivers every failed notification; resolves to the number now sent. */
  async retryFailed(): Promise<number> {
    const failed = await this.uow.run((uow) => uow.notifications.listByStatus('failed'))
    let sent = 0
    for (const notification of failed) {
      const result = await this.process(notification)
      if (result.status === 'sent') sent++
    }
    this.logger.info('Retried failed notifications', { attempted: failed.length, sent })
    return sent
  }

  private preferredChannel(preferences: NotificationPreferences | null): NotificationChannel {
    if (!preferences) return 'email'
    return CHANNEL_ORDER.find((entry) => entry.enabled(preferences))?.channel ?? 'email'
  }

  private async process(notification: Notification): Promise<Notification> {
    let result: Notification
    try {
      await this.dispatcher.deliver(notification)
      result = {
        ...notification,
        status: 'sent',
        sentAt: this.clock(),
        error: null,
        attempts: notification.attempts + 1
      }
    } catch (error) {
      this.logger.warn('Notification delivery failed', {
        notificationId: notification.id,
        channel: notification.channel,
        error: errorMessage(error)
      })
      result = {
        ...notification,
        status: 'failed',
        error: errorMessage(error),
        attempts: notification.attempts + 1
      }
    }
    await this.uow.run((uow) => uow.notifications.save(result))
    return result
  }
}

function isUnread(notification: Notification): boolean {
  return notification.status === 'sent' && !notification.read
}
