import mongoose from 'mongoose'
import { EVENT_STATUSES, type EventLocation, type EventStatus } from '../types.js'

export interface EventDoc {
  _id: string
  title: string
  description: string
  location: EventLocation
  requiredSkills: string[]
  startsAt: Date
  endsAt: Date | null
  capacity: number | null
  status: EventStatus
  createdBy: string | null
  createdAt: Date
  updatedAt: Date
}

const locationSchema = new mongoose.Schema<EventLocation>({
  name: { type: String, required: true },
  address: { type: String, default: null },
  city: { type: String, default: null },
  state: { type: String, default: null },
  postalCode: { type: String, default: null },
  latitude: { type: Number, default: null },
  longitude: { type: Number, default: null }
}, { _id: false })

const eventSchema = new mongoose.Schema<EventDoc>({
  _id: {
    type: String,
    required: true
  },
  title: {
    type: String,
    required: true,
    trim: true,
    maxlength: 100
  },
  description: {
    type: String,
    required: true,
    maxlength: 500
  },
  location: {
    type: locationSchema,
    required: true
  },
  requiredSkills: {
    type: [String],
    default: []
  },
  startsAt: {
    type: Date,
    required: true
  },
  endsAt: {
    type: Date,
    default: null
  },
  capacity: {
    type: Number,
    default: null
  },
  status: {
    type: String,
    enum: EVENT_STATUSES,
    default: 'draft'
  },
  createdBy: {
    type: String,
    ref: 'User',
    default: null
  },
  createdAt: {
    type: Date,
    default: Date.now
  },
  updatedAt: {
    type: Date,
    default: Date.now
  }
}, {
  collection: 'events'
})

eventSchema.index({ status: 1, startsAt: 1 })
eventSchema.index({ requiredSkills: 1 })

export const EventModel = mongoose.model<EventDoc>('Event', eventSchema)
