import { BadRequestError, NotFoundError, ValidationError, type ErrorDetail } from '../errors.js'
import type { UnitOfWork, UnitOfWorkManager } from '../repositories/interfaces.js'
import type {
  AvailabilityWindow,
  Clock,
  NotificationPreferences,
  Profile,
  ProfileLocation
} from '../types.js'
import type { Logger } from '../utils/logger.js'
import { parseTime } from './scoring.js'

export const MAX_SKILLS = 50
export const MAX_TAGS = 20

const PHONE_PATTERN = /^\+?[\d\s\-()]{10,20}$/
const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/

export const DEFAULT_NOTIFICATION_PREFERENCES: NotificationPreferences = {
  email: true,
  sms: false,
  push: true,
  inApp: true
}

export interface ProfileInput {
  displayName: string
  phone?: string | null
  skills?: string[]
  tags?: string[]
  availability?: AvailabilityWindow[]
  location?: ProfileLocation | null
  maxTravelKm?: number | null
  notificationPreferences?: Partial<NotificationPreferences>
}

export type ProfileUpdate = Partial<ProfileInput>

function uniqueTrimmed(values: string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter((value) => value.length > 0))]
}

function normalizeTags(tags: string[]): string[] {
  return uniqueTrimmed(tags.map((tag) => tag.toLowerCase()))
}

export function isValidWindow(window: AvailabilityWindow): boolean {
  return (
    Number.isInteger(window.weekday) &&
    window.weekday >= 0 &&
    window.weekday <= 6 &&
    TIME_PATTERN.test(window.start) &&
    TIME_PATTERN.test(window.end) &&
    parseTime(window.start) < parseTime(window.end)
  )
}

export function windowsOverlap(a: AvailabilityWindow, b: AvailabilityWindow): boolean {
  if (a.weekday !== b.weekday) return false
  return !(parseTime(a.end) <= parseTime(b.start) || parseTime(b.end) <= parseTime(a.start))
}

function validateAvailability(windows: AvailabilityWindow[], problems: ErrorDetail[]): void {
  windows.forEach((window, index) => {
    if (!isValidWindow(window)) {
      problems.push({ path: `availability.${index}`, message: 'Invalid availability window' })
      return
    }
    const clash = windows.slice(0, index).some((earlier) => isValidWindow(earlier) && windowsOverlap(earlier, window))
    if (clash) {
      problems.push({ path: `availability.${index}`, message: 'Availability window overlaps with existing window' })
    }
  })
}

function validateProfile(input: ProfileUpdate): void {
  const problems: ErrorDetail[] = []

  if (input.displayName !== undefined) {
    const name = input.displayName.trim()
    if (name.length === 0) problems.push({ path: 'displayName', message: 'Display name is required' })
    if (name.length > 100) problems.push({ path: 'displayName', message: 'Display name must be 100 characters or less' })
  }
  if (input.phone) {
    const phone = input.phone.trim()
    if (phone.length > 20) {
      problems.push({ path: 'phone', message: 'Phone number must be 20 characters or less' })
    } else if (!PHONE_PATTERN.test(phone)) {
      problems.push({ path: 'phone', message: 'Phone number format is invalid' })
    }
  }
  if (input.skills && uniqueTrimmed(input.skills).length > MAX_SKILLS) {
    problems.push({ path: 'skills', message: `Cannot have more than ${MAX_SKILLS} skills` })
  }
  if (input.tags && normalizeTags(input.tags).length > MAX_TAGS) {
    problems.push({ path: 'tags', message: `Cannot have more than ${MAX_TAGS} tags` })
  }
  if (input.availability) {
    validateAvailability(input.availability, problems)
  }
  if (input.maxTravelKm !== undefined && input.maxTravelKm !== null && input.maxTravelKm <= 0) {
    problems.push({ path: 'maxTravelKm', message: 'Maximum travel distance must be greater than 0' })
  }

  if (problems.length > 0) {
    throw new ValidationError(problems)
  }
}

export class ProfileService {
  constructor(
    private readonly uow: UnitOfWorkManager,
    private readonly logger: Logger,
    private readonly clock: Clock = () => new Date()
  ) {}

  async create(userId: string, input: ProfileInput): Promise<Profile> {
    validateProfile(input)

    return this.uow.run(async (uow) => {
      if (!(await uow.users.get(userId))) {
        throw new NotFoundError('User not found')
      }
      if (await uow.profiles.get(userId)) {
        throw new BadRequestError('Profile already exists for this user')
      }

      const profile: Profile = {
        userId,
        displayName: input.displayName.trim(),
        phone: input.phone?.trim() || null,
        skills: uniqueTrimmed(input.skills ?? []),
        tags: normalizeTags(input.tags ?? []),
        availability: input.availability ?? [],
        location: input.location ?? null,
        maxTravelKm: input.maxTravelKm ?? null,
        notificationPreferences: { ...DEFAULT_NOTIFICATION_PREFERENCES, ...input.notificationPreferences },
        updatedAt: this.clock()
      }
      await uow.profiles.save(profile)
      this.logger.info('Profile created', { userId, displayName: profile.displayName })
      return profile
    })
  }

  async get(userId: string): Promise<Profile> {
    const profile = await this.uow.run((uow) => uow.profiles.get(userId))
    if (!profile) {
      throw new NotFoundError('Profile not found')
    }
    return profile
  }

  list(): Promise<Profile[]> {
    return this.uow.run((uow) => uow.profiles.list())
  }

  async update(userId: string, patch: ProfileUpdate): Promise<Profile> {
    validateProfile(patch)

    return this.modify(userId, (profile) => ({
      ...profile,
      displayName: patch.displayName !== undefined ? patch.displayName.trim() : profile.displayName,
      phone: patch.phone !== undefined ? patch.phone?.trim() || null : profile.phone,
      skills: patch.skills ? uniqueTrimmed(patch.skills) : profile.skills,
      tags: patch.tags ? normalizeTags(patch.tags) : profile.tags,
      availability: patch.availability ?? profile.availability,
      location: patch.location !== undefined ? patch.location : profile.location,
      maxTravelKm: patch.maxTravelKm !== undefined ? patch.maxTravelKm : profile.maxTravelKm,
      notificationPreferences: { ...profile.notificationPreferences, ...patch.notificationPreferences }
    }), 'Profile updated')
  }

  async addSkill(userId: string, skill: string): Promise<Profile> {
    const value = skill.trim()
    if (value.length === 0) {
      throw ValidationError.field('skill', 'Skill cannot be empty')
    }
    return this.modify(userId, (profile) => {
      if (profile.skills.includes(value)) return profile
      if (profile.skills.length >= MAX_SKILLS) {
        throw ValidationError.field('skills', `Cannot have more than ${MAX_SKILLS} skills`)
      }
      return { ...profile, skills: [...profile.skills, value] }
    }, 'Skill added')
  }

  async removeSkill(userId: string, skill: string): Promise<Profile> {
    const value = skill.trim()
    return this.modify(userId, (profile) => {
      if (!profile.skills.includes(value)) {
        throw new NotFoundError('Skill not found on profile')
      }
      return { ...profile, skills: profile.skills.filter((existing) => existing !== value) }
    }, 'Skill removed')
  }

  async addTag(userId: string, tag: string): Promise<Profile> {
    const value = tag.trim().toLowerCase()
    if (value.length === 0) {
      throw ValidationError.field('tag', 'Tag cannot be empty')
    }
    return this.modify(userId, (profile) => {
      if (profile.tags.includes(value)) return profile
      if (profile.tags.length >= MAX_TAGS) {
        throw ValidationError.field('tags', `Cannot have more than ${MAX_TAGS} tags`)
      }
      return { ...profile, tags: [...profile.tags, value] }
    }, 'Tag added')
  }

  async removeTag(userId: string, tag: string): Promise<Profile> {
    const value = tag.trim().toLowerCase()
    return this.modify(userId, (profile) => {
      if (!profile.tags.includes(value)) {
        throw new NotFoundError('Tag not found on profile')
      }
      return { ...profile, tags: profile.tags.filter((existing) => existing !== value) }
    }, 'Tag removed')
  }

  async addAvailability(userId: string, window: AvailabilityWindow): Promise<Profile> {
    if (!isValidWindow(window)) {
      throw ValidationError.field('availability', 'Invalid availability window')
    }
    return this.modify(userId, (profile) => {
      if (profile.availability.some((existing) => windowsOverlap(existing, window))) {
        throw new BadRequestError('Availability window overlaps with existing window')
      }
      return { ...profile, availability: [...profile.availability, window] }
    }, 'Availability window added')
  }

  async removeAvailability(userId: string, window: AvailabilityWindow): Promise<Profile> {
    return this.modify(userId, (profile) => {
      const index = profile.availability.findIndex(
        (existing) =>
          existing.weekday === window.weekday && existing.start === window.start && existing.end === window.end
      )
      if (index === -1) {
        throw new NotFoundError('Availability window not found')
      }
      return { ...profile, availability: profile.availability.filter((_, i) => i !== index) }
    }, 'Availability window removed')
  }

  /** Profiles holding any of `skills` (case-insensitive). */
  async searchBySkills(skills: string[]): Promise<Profile[]> {
    const wanted = new Set(skills.map((skill) => skill.trim().toLowerCase()))
    const profiles = await this.list()
    return profiles.filter((profile) => profile.skills.some((skill) => wanted.has(skill.toLowerCase())))
  }

  /** Profiles holding any of `tags` (case-insensitive). */
  async searchByTags(tags: string[]): Promise<Profile[]> {
    const wanted = new Set(tags.map((tag) => tag.trim().toLowerCase()))
    const profiles = await this.list()
    return profiles.filter((profile) => profile.tags.some((tag) => wanted.has(tag)))
  }

  /** Profiles with one window covering the whole `start`..`end` range on `weekday`. */
  async findAvailable(weekday: number, start: string, end: string): Promise<Profile[]> {
    const from = parseTime(start)
    const to = parseTime(end)
    if (from >= to) {
      throw ValidationError.field('end', 'End time must be after start time')
    }
    const profiles = await this.list()
    return profiles.filter((profile) =>
      profile.availability.some(
        (window) => window.weekday === weekday && parseTime(window.start) <= from && parseTime(window.end) >= to
      )
    )
  }

  async delete(userId: string): Promise<void> {
    await this.uow.run(async (uow) => {
      if (!(await uow.profiles.delete(userId))) {
        throw new NotFoundError('Profile not found')
      }
    })
    this.logger.info('Profile deleted', { userId })
  }

  async getNotificationPreferences(userId: string): Promise<NotificationPreferences> {
    const profile = await this.get(userId)
    return profile.notificationPreferences
  }

  async setNotificationPreferences(
    userId: string,
    preferences: Partial<NotificationPreferences>
  ): Promise<NotificationPreferences> {
    const profile = await this.modify(userId, (current) => ({
      ...current,
      notificationPreferences: { ...current.notificationPreferences, ...preferences }
    }), 'Notification preferences updated')
    return profile.notificationPreferences
  }

  private async modify(
    userId: string,
    change: (profile: Profile) => Profile,
    message: string
  ): Promise<Profile> {
    return this.uow.run(async (uow: UnitOfWork) => {
      const profile = await uow.profiles.get(userId)
      if (!profile) {
        throw new NotFoundError('Profile not found')
      }
      const next = change(profile)
      if (next === profile) return profile

      const saved: Profile = { ...next, updatedAt: this.clock() }
      await uow.profiles.save(saved)
      this.logger.info(message, { userId })
      return saved
    })
  }
}
