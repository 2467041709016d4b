import mongoose from 'mongoose'
import {
  NOTIFICATION_CHANNELS,
  NOTIFICATION_PRIORITIES,
  NOTIFICATION_STATUSES,
  NOTIFICATION_TYPES,
  type NotificationChannel,
  type NotificationPriority,
  type NotificationStatus,
  type NotificationType
} from '../types.js'

export interface NotificationDoc {
  _id: string
  recipientId: string
  type: NotificationType
  subject: string
  body: string
  channel: NotificationChannel
  priority: NotificationPriority
  status: NotificationStatus
  read: boolean
  readAt: Date | null
  queuedAt: Date
  sentAt: Date | null
  error: string | null
  attempts: number
}

const notificationSchema = new mongoose.Schema<NotificationDoc>({
  _id: {
    type: String,
    required: true
  },
  recipientId: {
    type: String,
    ref: 'User',
    required: true
  },
  type: {
    type: String,
    enum: NOTIFICATION_TYPES,
    required: true
  },
  subject: {
    type: String,
    required: true,
    maxlength: 200
  },
  body: {
    type: String,
    required: true,
    maxlength: 2000
  },
  channel: {
    type: String,
    enum: NOTIFICATION_CHANNELS,
    default: 'email'
  },
  priority: {
    type: String,
    enum: NOTIFICATION_PRIORITIES,
    default: 'normal'
  },
  status: {
    type: String,
    enum: NOTIFICATION_STATUSES,
    default: 'queued'
  },
  read: {
    type: Boolean,
    default: false
  },
  readAt: {
    type: Date,
    default: null
  },
  queuedAt: {
    type: Date,
    default: Date.now
  },
  sentAt: {
    type: Date,
    default: null
  },
  error: {
    type: String,
    default: null
  },
  attempts: {
    type: Number,
    default: 0
  }
}, {
  collection: 'notifications'
})

notificationSchema.index({ recipientId: 1, queuedAt: -1 })
notificationSchema.index({ status: 1 })

export const NotificationModel = mongoose.model<NotificationDoc>('Notification', notificationSchema)
