import type { ClientSession } from 'mongoose'
import { OpportunityModel, type OpportunityDoc } from '../../models/Opportunity.js'
import type { Opportunity } from '../../types.js'
import type { OpportunityRepository } from '../interfaces.js'
import { sessionOptions } from './session.js'

function toOpportunity(doc: OpportunityDoc): Opportunity {
  return {
    id: doc._id,
    eventId: doc.eventId,
    title: doc.title,
    description: doc.description ?? null,
    requiredSkills: [...doc.requiredSkills],
    minHours: doc.minHours ?? null,
    maxSlots: doc.maxSlots ?? null,
    createdAt: doc.createdAt
  }
}

export class MongoOpportunityRepository implements OpportunityRepository {
  constructor(private readonly session: ClientSession | null) {}

  async get(id: string): Promise<Opportunity | null> {
    const doc = await OpportunityModel.findById(id).session(this.session).lean<OpportunityDoc>().exec()
    return doc ? toOpportunity(doc) : null
  }

  async list(): Promise<Opportunity[]> {
    const docs = await OpportunityModel.find().sort({ createdAt: 1 }).session(this.session).lean<OpportunityDoc[]>().exec()
    return docs.map(toOpportunity)
  }

  async listByEvent(eventId: string): Promise<Opportunity[]> {
    const docs = await OpportunityModel.find({ eventId })
      .sort({ createdAt: 1 })
      .session(this.session)
      .lean<OpportunityDoc[]>()
      .exec()
    return docs.map(toOpportunity)
  }

  async save(opportunity: Opportunity): Promise<void> {
    const { id, ...rest } = opportunity
    const doc: OpportunityDoc = { _id: id, ...rest }
    await OpportunityModel.replaceOne({ _id: id }, doc, { upsert: true, ...sessionOptions(this.session) }).exec()
  }

  async deleteByEvent(eventId: string): Promise<number> {
    const result = await OpportunityModel.deleteMany({ eventId }, sessionOptions(this.session)).exec()
    return result.deletedCount
  }
}
