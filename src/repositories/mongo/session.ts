import type { ClientSession } from 'mongoose'

/** Write options carrying the transaction session, when there is one. */
export function sessionOptions(session: ClientSession | null): { session?: ClientSession } {
  return session ? { session } : {}
}
