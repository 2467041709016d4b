/**
 * Persistence ports.
 *
 * Services only talk to these interfaces; `repositories/mongo` implements them
 * on mongoose models and the tests supply an in-memory store.
 */

import type {
  EventStatus,
  Match,
  MatchRequest,
  Notification,
  NotificationStatus,
  Opportunity,
  Profile,
  User,
  VolunteerEvent,
  VolunteerHistoryEntry
} from '../types.js'

export interface UserRepository {
  get(id: string): Promise<User | null>
  getBySubject(subject: string): Promise<User | null>
  save(user: User): Promise<void>
}

export interface ProfileRepository {
  get(userId: string): Promise<Profile | null>
  list(): Promise<Profile[]>
  save(profile: Profile): Promise<void>
  delete(userId: string): Promise<boolean>
}

export interface EventFilter {
  status?: EventStatus
  startsAtOrAfter?: Date
}

export interface EventRepository {
  get(id: string): Promise<VolunteerEvent | null>
  /** Sorted by start time, earliest first. */
  list(filter?: EventFilter): Promise<VolunteerEvent[]>
  save(event: VolunteerEvent): Promise<void>
  delete(id: string): Promise<boolean>
}

export interface OpportunityRepository {
  get(id: string): Promise<Opportunity | null>
  list(): Promise<Opportunity[]>
  listByEvent(eventId: string): Promise<Opportunity[]>
  save(opportunity: Opportunity): Promise<void>
  deleteByEvent(eventId: string): Promise<number>
}

export interface MatchRequestRepository {
  get(id: string): Promise<MatchRequest | null>
  listByUser(userId: string): Promise<MatchRequest[]>
  listByOpportunity(opportunityId: string): Promise<MatchRequest[]>
  /** The pending or approved request for the pair, if any. */
  findActive(userId: string, opportunityId: string): Promise<MatchRequest | null>
  listPendingRequestedBefore(cutoff: Date): Promise<MatchRequest[]>
  save(request: MatchRequest): Promise<void>
  deleteByOpportunity(opportunityId: string): Promise<number>
}

export interface MatchRepository {
  get(id: string): Promise<Match | null>
  listByUser(userId: string): Promise<Match[]>
  listByOpportunity(opportunityId: string): Promise<Match[]>
  findConfirmed(userId: string, opportunityId: string): Promise<Match | null>
  countConfirmed(opportunityId: string): Promise<number>
  save(match: Match): Promise<void>
  deleteByOpportunity(opportunityId: string): Promise<number>
}

export interface NotificationRepository {
  get(id: string): Promise<Notification | null>
  /** Newest first. */
  listByRecipient(recipientId: string): Promise<Notification[]>
  listByStatus(status: NotificationStatus): Promise<Notification[]>
  save(notification: Notification): Promise<void>
}

export interface VolunteerHistoryRepository {
  get(id: string): Promise<VolunteerHistoryEntry | null>
  /** Entries dated on or after `since` (all when omitted), most recent first. */
  list(since?: Date): Promise<VolunteerHistoryEntry[]>
  listByUser(userId: string): Promise<VolunteerHistoryEntry[]>
  listByEvent(eventId: string): Promise<VolunteerHistoryEntry[]>
  save(entry: VolunteerHistoryEntry): Promise<void>
  delete(id: string): Promise<boolean>
}

export interface UnitOfWork {
  users: UserRepository
  profiles: ProfileRepository
  events: EventRepository
  opportunities: OpportunityRepository
  matchRequests: MatchRequestRepository
  matches: MatchRepository
  notifications: NotificationRepository
  history: VolunteerHistoryRepository
}

/**
 * Runs `work` against repositories bound to one transaction. The transaction
 * commits when `work` resolves and rolls back when it rejects.
 */
export interface UnitOfWorkManager {
  run<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T>
}
