import type { Server } from 'socket.io'
import type { Notification } from '../types.js'
import type { Logger } from '../utils/logger.js'
import { getUserSockets } from '../utils/userSockets.js'

/**
 * Hands a stored notification to its channel. Rejecting marks the
 * notification failed.
 */
export interface NotificationDispatcher {
  deliver(notification: Notification): Promise<void>
}

export interface NotificationPayload {
  id: string
  type: Notification['type']
  subject: string
  body: string
  priority: Notification['priority']
  queuedAt: string
}

export function toPayload(notification: Notification): NotificationPayload {
  return {
    id: notification.id,
    type: notification.type,
    subject: notification.subject,
    body: notification.body,
    priority: notification.priority,
    queuedAt: notification.queuedAt.toISOString()
  }
}

/**
 * Pushes in-app notifications to the recipient's open sockets. Email, SMS and
 * push belong to external providers and are only recorded as handed off.
 */
export class SocketNotificationDispatcher implements NotificationDispatcher {
  constructor(
    private readonly io: Server,
    private readonly logger: Logger
  ) {}

  async deliver(notification: Notification): Promise<void> {
    if (notification.channel !== 'in_app') {
      this.logger.info('Notification handed off', {
        notificationId: notification.id,
        channel: notification.channel
      })
      return
    }

    const socketIds = getUserSockets(notification.recipientId)
    if (socketIds.length === 0) {
      this.logger.debug('Recipient offline, notification kept for later', {
        notificationId: notification.id
      })
      return
    }
    this.io.to(socketIds).emit('new-notification', toPayload(notification))
  }
}
