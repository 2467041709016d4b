import type { ClientSession } from 'mongoose'
import { MatchRequestModel, type MatchRequestDoc } from '../../models/MatchRequest.js'
import type { MatchRequest } from '../../types.js'
import type { MatchRequestRepository } from '../interfaces.js'
import { sessionOptions } from './session.js'

function toMatchRequest(doc: MatchRequestDoc): MatchRequest {
  return {
    id: doc._id,
    userId: doc.userId,
    opportunityId: doc.opportunityId,
    status: doc.status,
    score: doc.score ?? null,
    requestedAt: doc.requestedAt,
    decidedAt: doc.decidedAt ?? null,
    decisionReason: doc.decisionReason ?? null
  }
}

export class MongoMatchRequestRepository implements MatchRequestRepository {
  constructor(private readonly session: ClientSession | null) {}

  async get(id: string): Promise<MatchRequest | null> {
    const doc = await MatchRequestModel.findById(id).session(this.session).lean<MatchRequestDoc>().exec()
    return doc ? toMatchRequest(doc) : null
  }

  async listByUser(userId: string): Promise<MatchRequest[]> {
    const docs = await MatchRequestModel.find({ userId })
      .sort({ requestedAt: -1 })
      .session(this.session)
      .lean<MatchRequestDoc[]>()
      .exec()
    return docs.map(toMatchRequest)
  }

  async listByOpportunity(opportunityId: string): Promise<MatchRequest[]> {
    const docs = await MatchRequestModel.find({ opportunityId })
      .sort({ requestedAt: -1 })
      .session(this.session)
      .lean<MatchRequestDoc[]>()
      .exec()
    return docs.map(toMatchRequest)
  }

  async findActive(userId: string, opportunityId: string): Promise<MatchRequest | null> {
    const doc = await MatchRequestModel.findOne({
      userId,
      opportunityId,
      status: { $in: ['pending', 'approved'] }
    })
      .session(this.session)
      .lean<MatchRequestDoc>()
      .exec()
    return doc ? toMatchRequest(doc) : null
  }

  async listPendingRequestedBefore(cutoff: Date): Promise<MatchRequest[]> {
    const docs = await MatchRequestModel.find({ status: 'pending', requestedAt: { $lt: cutoff } })
      .session(this.session)
      .lean<MatchRequestDoc[]>()
      .exec()
    return docs.map(toMatchRequest)
  }

  async save(request: MatchRequest): Promise<void> {
    const { id, ...rest } = request
    const doc: MatchRequestDoc = { _id: id, ...rest }
    await MatchRequestModel.replaceOne({ _id: id }, doc, { upsert: true, ...sessionOptions(this.session) }).exec()
  }

  async deleteByOpportunity(opportunityId: string): Promise<number> {
    const result = await MatchRequestModel.deleteMany({ opportunityId }, sessionOptions(this.session)).exec()
    return result.deletedCount
  }
}
