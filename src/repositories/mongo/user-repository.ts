import type { ClientSession } from 'mongoose'
import { UserModel, type UserDoc } from '../../models/User.js'
import type { User } from '../../types.js'
import type { UserRepository } from '../interfaces.js'
import { sessionOptions } from './session.js'

function toUser(doc: UserDoc): User {
  return {
    id: doc._id,
    email: doc.email,
    roles: [...doc.roles],
    authSubject: doc.authSubject ?? null,
    createdAt: doc.createdAt
  }
}

export class MongoUserRepository implements UserRepository {
  constructor(private readonly session: ClientSession | null) {}

  async get(id: string): Promise<User | null> {
    const doc = await UserModel.findById(id).session(this.session).lean<UserDoc>().exec()
    return doc ? toUser(doc) : null
  }

  async getBySubject(subject: string): Promise<User | null> {
    const doc = await UserModel.findOne({ authSubject: subject }).session(this.session).lean<UserDoc>().exec()
    return doc ? toUser(doc) : null
  }

  async save(user: User): Promise<void> {
    const doc: UserDoc = {
      _id: user.id,
      email: user.email,
      roles: user.roles,
      authSubject: user.authSubject,
      createdAt: user.createdAt
    }
    await UserModel.replaceOne({ _id: user.id }, doc, { upsert: true, ...sessionOptions(this.session) }).exec()
  }
}
