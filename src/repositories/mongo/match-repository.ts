import type { ClientSession } from 'mongoose'
import { MatchModel, type MatchDoc } from '../../models/Match.js'
import type { Match } from '../../types.js'
import type { MatchRepository } from '../interfaces.js'
import { sessionOptions } from './session.js'

function toMatch(doc: MatchDoc): Match {
  return {
    id: doc._id,
    userId: doc.userId,
    opportunityId: doc.opportunityId,
    eventId: doc.eventId,
    status: doc.status,
    score: doc.score ?? null,
    createdAt: doc.createdAt,
    cancelledAt: doc.cancelledAt ?? null
  }
}

export class MongoMatchRepository implements MatchRepository {
  constructor(private readonly session: ClientSession | null) {}

  async get(id: string): Promise<Match | null> {
    const doc = await MatchModel.findById(id).session(this.session).lean<MatchDoc>().exec()
    return doc ? toMatch(doc) : null
  }

  async listByUser(userId: string): Promise<Match[]> {
    const docs = await MatchModel.find({ userId }).sort({ createdAt: -1 }).session(this.session).lean<MatchDoc[]>().exec()
    return docs.map(toMatch)
  }

  async listByOpportunity(opportunityId: string): Promise<Match[]> {
    const docs = await MatchModel.find({ opportunityId })
      .sort({ createdAt: -1 })
      .session(this.session)
      .lean<MatchDoc[]>()
      .exec()
    return docs.map(toMatch)
  }

  async findConfirmed(userId: string, opportunityId: string): Promise<Match | null> {
    const doc = await MatchModel.findOne({ userId, opportunityId, status: 'confirmed' })
      .session(this.session)
      .lean<MatchDoc>()
      .exec()
    return doc ? toMatch(doc) : null
  }

  async countConfirmed(opportunityId: string): Promise<number> {
    return MatchModel.countDocuments({ opportunityId, status: 'confirmed' }).session(this.session).exec()
  }

  async save(match: Match): Promise<void> {
    const { id, ...rest } = match
    const doc: MatchDoc = { _id: id, ...rest }
    await MatchModel.replaceOne({ _id: id }, doc, { upsert: true, ...sessionOptions(this.session) }).exec()
  }

  async deleteByOpportunity(opportunityId: string): Promise<number> {
    const result = await MatchModel.deleteMany({ opportunityId }, sessionOptions(this.session)).exec()
    return result.deletedCount
  }
}
