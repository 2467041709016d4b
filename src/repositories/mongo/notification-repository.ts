import type { ClientSession } from 'mongoose'
import { NotificationModel, type NotificationDoc } from '../../models/Notification.js'
import type { Notification, NotificationStatus } from '../../types.js'
import type { NotificationRepository } from '../interfaces.js'
import { sessionOptions } from './session.js'

function toNotification(doc: NotificationDoc): Notification {
  return {
    id: doc._id,
    recipientId: doc.recipientId,
    type: doc.type,
    subject: doc.subject,
    body: doc.body,
    channel: doc.channel,
    priority: doc.priority,
    status: doc.status,
    read: doc.read,
    readAt: doc.readAt ?? null,
    queuedAt: doc.queuedAt,
    sentAt: doc.sentAt ?? null,
    error: doc.error ?? null,
    attempts: doc.attempts
  }
}

export class MongoNotificationRepository implements NotificationRepository {
  constructor(private readonly session: ClientSession | null) {}

  async get(id: string): Promise<Notification | null> {
    const doc = await NotificationModel.findById(id).session(this.session).lean<NotificationDoc>().exec()
    return doc ? toNotification(doc) : null
  }

  async listByRecipient(recipientId: string): Promise<Notification[]> {
    const docs = await NotificationModel.find({ recipientId })
      .sort({ queuedAt: -1 })
      .session(this.session)
      .lean<NotificationDoc[]>()
      .exec()
    return docs.map(toNotification)
  }

  async listByStatus(status: NotificationStatus): Promise<Notification[]> {
    const docs = await NotificationModel.find({ status })
      .sort({ queuedAt: 1 })
      .session(this.session)
      .lean<NotificationDoc[]>()
      .exec()
    return docs.map(toNotification)
  }

  async save(notification: Notification): Promise<void> {
    const { id, ...rest } = notification
    const doc: NotificationDoc = { _id: id, ...rest }
    await NotificationModel.replaceOne({ _id: id }, doc, { upsert: true, ...sessionOptions(this.session) }).exec()
  }
}
