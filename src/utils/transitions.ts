import { InvalidTransitionError } from '../errors.js'
import type { EventStatus, MatchRequestStatus, MatchStatus } from '../types.js'

type TransitionTable<S extends string> = Readonly<Record<S, readonly S[]>>

export const EVENT_TRANSITIONS: TransitionTable<EventStatus> = {
  draft: ['published', 'cancelled'],
  published: ['cancelled'],
  cancelled: []
}

export const MATCH_REQUEST_TRANSITIONS: TransitionTable<MatchRequestStatus> = {
  pending: ['approved', 'rejected', 'expired'],
  approved: [],
  rejected: [],
  expired: []
}

export const MATCH_TRANSITIONS: TransitionTable<MatchStatus> = {
  confirmed: ['cancelled'],
  cancelled: []
}

export function canTransition<S extends string>(table: TransitionTable<S>, from: S, to: S): boolean {
  return table[from].includes(to)
}

export function assertTransition<S extends string>(
  entity: string,
  table: TransitionTable<S>,
  from: S,
  to: S
): void {
  if (!canTransition(table, from, to)) {
    throw new InvalidTransitionError(entity, from, to)
  }
}
