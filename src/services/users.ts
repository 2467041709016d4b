import { randomUUID } from 'node:crypto'
import { NotFoundError } from '../errors.js'
import type { UnitOfWorkManager } from '../repositories/interfaces.js'
import type { Clock, User, UserRole } from '../types.js'
import type { Logger } from '../utils/logger.js'

/** What a verified bearer token says about its holder. */
export interface TokenIdentity {
  subject: string
  email?: string
  /** Present only when the token carries the roles claim. */
  roles?: UserRole[]
}

function sameRoles(a: UserRole[], b: UserRole[]): boolean {
  return a.length === b.length && a.every((role) => b.includes(role))
}

export class UserService {
  constructor(
    private readonly uow: UnitOfWorkManager,
    private readonly logger: Logger,
    private readonly clock: Clock = () => new Date()
  ) {}

  /**
   * Links a token subject to its user, creating one on first sight. Roles on
   * the token replace the stored ones.
   */
  async findOrCreateBySubject(identity: TokenIdentity): Promise<User> {
    return this.uow.run(async (uow) => {
      const existing = await uow.users.getBySubject(identity.subject)
      if (existing) {
        if (identity.roles && identity.roles.length > 0 && !sameRoles(existing.roles, identity.roles)) {
          const updated: User = { ...existing, roles: identity.roles }
          await uow.users.save(updated)
          this.logger.info('User roles synchronized', { userId: updated.id, roles: updated.roles })
          return updated
        }
        return existing
      }

      const id = randomUUID()
      const user: User = {
        id,
        email: identity.email?.toLowerCase() ?? `user-${id}@example.com`,
        roles: identity.roles && identity.roles.length > 0 ? identity.roles : ['volunteer'],
        authSubject: identity.subject,
        createdAt: this.clock()
      }
      await uow.users.save(user)
      this.logger.info('User created', { userId: user.id, subject: identity.subject })
      return user
    })
  }

  async get(id: string): Promise<User> {
    const user = await this.uow.run((uow) => uow.users.get(id))
    if (!user) {
      throw new NotFoundError('User not found')
    }
    return user
  }

  async getBySubject(subject: string): Promise<User> {
    const user = await this.uow.run((uow) => uow.users.getBySubject(subject))
    if (!user) {
      throw new NotFoundError('User not found')
    }
    return user
  }

  async updateEmail(id: string, email: string): Promise<User> {
    return this.uow.run(async (uow) => {
      const user = await uow.users.get(id)
      if (!user) {
        throw new NotFoundError('User not found')
      }
      const updated: User = { ...user, email: email.trim().toLowerCase() }
      await uow.users.save(updated)
      this.logger.info('User email updated', { userId: id })
      return updated
    })
  }
}
