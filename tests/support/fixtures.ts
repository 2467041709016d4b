import { createServices, type Services } from '../../src/services/index.js'
import type { NotificationDispatcher } from '../../src/services/notification-dispatcher.js'
import type { Notification, Profile, User, UserRole, VolunteerEvent } from '../../src/types.js'
import { logger } from '../../src/utils/logger.js'
import { MemoryUnitOfWorkManager } from './memory-store.js'

/** Monday 2030-03-04 09:00 UTC */
export const NOW = new Date('2030-03-04T09:00:00.000Z')

export const MATCHING_OPTIONS = {
  minScore: 0.5,
  requestExpiryDays: 30,
  defaultMaxTravelKm: 50
}

export class RecordingDispatcher implements NotificationDispatcher {
  readonly delivered: Notification[] = []
  failWith: string | null = null

  async deliver(notification: Notification): Promise<void> {
    if (this.failWith) {
      throw new Error(this.failWith)
    }
    this.delivered.push(notification)
  }
}

export interface TestContext {
  uow: MemoryUnitOfWorkManager
  dispatcher: RecordingDispatcher
  services: Services
  clock: { now: Date }
}

export function createTestContext(): TestContext {
  const uow = new MemoryUnitOfWorkManager()
  const dispatcher = new RecordingDispatcher()
  const clock = { now: NOW }
  const services = createServices({
    uow,
    dispatcher,
    logger,
    matching: MATCHING_OPTIONS,
    clock: () => clock.now
  })
  return { uow, dispatcher, services, clock }
}

export async function addUser(ctx: TestContext, subject: string, roles: UserRole[] = ['volunteer']): Promise<User> {
  return ctx.services.users.findOrCreateBySubject({ subject, email: `${subject}@example.org`, roles })
}

export async function addVolunteer(
  ctx: TestContext,
  subject: string,
  profile: Partial<Omit<Profile, 'userId' | 'updatedAt'>> = {}
): Promise<User> {
  const user = await addUser(ctx, subject)
  await ctx.services.profiles.create(user.id, {
    displayName: profile.displayName ?? subject,
    skills: profile.skills ?? [],
    tags: profile.tags ?? [],
    availability: profile.availability ?? [],
    location: profile.location ?? null,
    maxTravelKm: profile.maxTravelKm ?? null,
    notificationPreferences: profile.notificationPreferences
  })
  return user
}

export interface EventOptions {
  title?: string
  startsAt?: Date
  endsAt?: Date | null
  capacity?: number | null
  requiredSkills?: string[]
  city?: string
  state?: string
}

/** Creates and publishes an event. */
export async function addPublishedEvent(ctx: TestContext, options: EventOptions = {}): Promise<VolunteerEvent> {
  const event = await ctx.services.events.create({
    title: options.title ?? 'Food Drive',
    description: 'Sorting donated food',
    location: { name: 'Community Hall', city: options.city ?? 'Springfield', state: options.state ?? 'IL' },
    requiredSkills: options.requiredSkills ?? ['Cooking'],
    // Wednesday 2030-03-06 10:00-14:00 UTC
    startsAt: options.startsAt ?? new Date('2030-03-06T10:00:00.000Z'),
    endsAt: options.endsAt === undefined ? new Date('2030-03-06T14:00:00.000Z') : options.endsAt,
    capacity: options.capacity ?? null
  })
  return ctx.services.events.publish(event.id)
}
