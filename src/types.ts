export const USER_ROLES = ['admin', 'organizer', 'volunteer'] as const
export type UserRole = (typeof USER_ROLES)[number]

export const EVENT_STATUSES = ['draft', 'published', 'cancelled'] as const
export type EventStatus = (typeof EVENT_STATUSES)[number]

export const MATCH_REQUEST_STATUSES = ['pending', 'approved', 'rejected', 'expired'] as const
export type MatchRequestStatus = (typeof MATCH_REQUEST_STATUSES)[number]

export const MATCH_STATUSES = ['confirmed', 'cancelled'] as const
export type MatchStatus = (typeof MATCH_STATUSES)[number]

export const NOTIFICATION_CHANNELS = ['email', 'sms', 'push', 'in_app'] as const
export type NotificationChannel = (typeof NOTIFICATION_CHANNELS)[number]

export const NOTIFICATION_STATUSES = ['queued', 'sent', 'failed'] as const
export type NotificationStatus = (typeof NOTIFICATION_STATUSES)[number]

export const NOTIFICATION_PRIORITIES = ['low', 'normal', 'high', 'urgent'] as const
export type NotificationPriority = (typeof NOTIFICATION_PRIORITIES)[number]

export const NOTIFICATION_TYPES = [
  'event_assignment',
  'event_update',
  'event_reminder',
  'event_cancellation',
  'match_request_approved',
  'match_request_rejected',
  'new_opportunity',
  'profile_update_reminder'
] as const
export type NotificationType = (typeof NOTIFICATION_TYPES)[number]

export interface User {
  id: string
  email: string
  roles: UserRole[]
  /** `sub` claim of the identity provider token this user signs in with. */
  authSubject: string | null
  createdAt: Date
}

/** Weekly slot; weekday 0 = Monday .. 6 = Sunday, times are `HH:MM`. */
export interface AvailabilityWindow {
  weekday: number
  start: string
  end: string
}

export interface ProfileLocation {
  city: string | null
  state: string | null
  latitude: number | null
  longitude: number | null
}

export interface NotificationPreferences {
  email: boolean
  sms: boolean
  push: boolean
  inApp: boolean
}

export interface Profile {
  userId: string
  displayName: string
  phone: string | null
  skills: string[]
  /** Free-form interests such as "spanish", "driver", "outdoors". */
  tags: string[]
  availability: AvailabilityWindow[]
  location: ProfileLocation | null
  maxTravelKm: number | null
  notificationPreferences: NotificationPreferences
  updatedAt: Date
}

export interface EventLocation {
  name: string
  address: string | null
  city: string | null
  state: string | null
  postalCode: string | null
  latitude: number | null
  longitude: number | null
}

export interface VolunteerEvent {
  id: string
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

export interface Opportunity {
  id: string
  eventId: string
  title: string
  description: string | null
  requiredSkills: string[]
  minHours: number | null
  maxSlots: number | null
  createdAt: Date
}

export interface MatchRequest {
  id: string
  userId: string
  opportunityId: string
  status: MatchRequestStatus
  score: number | null
  requestedAt: Date
  decidedAt: Date | null
  decisionReason: string | null
}

export interface Match {
  id: string
  userId: string
  opportunityId: string
  eventId: string
  status: MatchStatus
  score: number | null
  createdAt: Date
  cancelledAt: Date | null
}

export interface MatchScore {
  totalScore: number
  skillMatchScore: number
  availabilityScore: number
  preferenceScore: number
  distanceScore: number
}

export interface Notification {
  id: string
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

export interface VolunteerHistoryEntry {
  id: string
  userId: string
  eventId: string
  role: string
  hours: number
  date: Date
  notes: string | null
  createdAt: Date
}

export type Clock = () => Date
