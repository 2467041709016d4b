import type { AppConfig } from '../config.js'
import type { UnitOfWorkManager } from '../repositories/interfaces.js'
import type { Clock } from '../types.js'
import type { Logger } from '../utils/logger.js'
import { EventService } from './events.js'
import { VolunteerHistoryService } from './history.js'
import { MatchingService } from './matching.js'
import type { NotificationDispatcher } from './notification-dispatcher.js'
import { NotificationService } from './notifications.js'
import { ProfileService } from './profiles.js'
import { ReportService } from './reports.js'
import { UserService } from './users.js'

export interface Services {
  users: UserService
  profiles: ProfileService
  events: EventService
  matching: MatchingService
  notifications: NotificationService
  history: VolunteerHistoryService
  reports: ReportService
}

export interface ServiceDeps {
  uow: UnitOfWorkManager
  dispatcher: NotificationDispatcher
  logger: Logger
  matching: AppConfig['matching']
  clock?: Clock
}

export function createServices({ uow, dispatcher, logger, matching, clock }: ServiceDeps): Services {
  const now = clock ?? (() => new Date())
  const notifications = new NotificationService(uow, dispatcher, logger, now)

  return {
    users: new UserService(uow, logger, now),
    profiles: new ProfileService(uow, logger, now),
    events: new EventService(uow, notifications, logger, now),
    matching: new MatchingService(uow, notifications, logger, matching, now),
    notifications,
    history: new VolunteerHistoryService(uow, logger, now),
    reports: new ReportService(uow, logger, now)
  }
}
