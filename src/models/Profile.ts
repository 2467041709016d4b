import mongoose from 'mongoose'
import type { AvailabilityWindow, NotificationPreferences, ProfileLocation } from '../types.js'

export interface ProfileDoc {
  _id: string
  displayName: string
  phone: string | null
  skills: string[]
  tags: string[]
  availability: AvailabilityWindow[]
  location: ProfileLocation | null
  maxTravelKm: number | null
  notificationPreferences: NotificationPreferences
  updatedAt: Date
}

const availabilityWindowSchema = new mongoose.Schema<AvailabilityWindow>({
  weekday: { type: Number, required: true, min: 0, max: 6 },
  start: { type: String, required: true },
  end: { type: String, required: true }
}, { _id: false })

const locationSchema = new mongoose.Schema<ProfileLocation>({
  city: { type: String, default: null },
  state: { type: String, default: null },
  latitude: { type: Number, default: null },
  longitude: { type: Number, default: null }
}, { _id: false })

const preferencesSchema = new mongoose.Schema<NotificationPreferences>({
  email: { type: Boolean, default: true },
  sms: { type: Boolean, default: false },
  push: { type: Boolean, default: true },
  inApp: { type: Boolean, default: true }
}, { _id: false })

// _id is the owning user's id: one profile per user
const profileSchema = new mongoose.Schema<ProfileDoc>({
  _id: {
    type: String,
    required: true
  },
  displayName: {
    type: String,
    required: true,
    trim: true,
    maxlength: 100
  },
  phone: {
    type: String,
    default: null
  },
  skills: {
    type: [String],
    default: []
  },
  tags: {
    type: [String],
    default: []
  },
  availability: {
    type: [availabilityWindowSchema],
    default: []
  },
  location: {
    type: locationSchema,
    default: null
  },
  maxTravelKm: {
    type: Number,
    default: null
  },
  notificationPreferences: {
    type: preferencesSchema,
    default: () => ({})
  },
  updatedAt: {
    type: Date,
    default: Date.now
  }
}, {
  collection: 'profiles'
})

profileSchema.index({ skills: 1 })
profileSchema.index({ tags: 1 })

export const ProfileModel = mongoose.model<ProfileDoc>('Profile', profileSchema)
