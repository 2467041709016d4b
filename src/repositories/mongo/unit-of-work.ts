import type { ClientSession, Connection } from 'mongoose'
import type { UnitOfWork, UnitOfWorkManager } from '../interfaces.js'
import { MongoEventRepository } from './event-repository.js'
import { MongoMatchRepository } from './match-repository.js'
import { MongoMatchRequestRepository } from './match-request-repository.js'
import { MongoNotificationRepository } from './notification-repository.js'
import { MongoOpportunityRepository } from './opportunity-repository.js'
import { MongoProfileRepository } from './profile-repository.js'
import { MongoUserRepository } from './user-repository.js'
import { MongoVolunteerHistoryRepository } from './volunteer-history-repository.js'

export function createMongoUnitOfWork(session: ClientSession | null): UnitOfWork {
  return {
    users: new MongoUserRepository(session),
    profiles: new MongoProfileRepository(session),
    events: new MongoEventRepository(session),
    opportunities: new MongoOpportunityRepository(session),
    matchRequests: new MongoMatchRequestRepository(session),
    matches: new MongoMatchRepository(session),
    notifications: new MongoNotificationRepository(session),
    history: new MongoVolunteerHistoryRepository(session)
  }
}

/**
 * Unit of work over a mongoose connection. With `useTransactions` each `run`
 * is one multi-document transaction (replica set required); without it the
 * repositories write directly.
 */
export class MongoUnitOfWorkManager implements UnitOfWorkManager {
  constructor(
    private readonly connection: Connection,
    private readonly useTransactions: boolean
  ) {}

  async run<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    if (!this.useTransactions) {
      return work(createMongoUnitOfWork(null))
    }
    return this.connection.transaction((session) => work(createMongoUnitOfWork(session)))
  }
}
