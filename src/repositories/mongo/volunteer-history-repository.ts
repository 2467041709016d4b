import type { ClientSession, FilterQuery } from 'mongoose'
import { VolunteerHistoryModel, type VolunteerHistoryDoc } from '../../models/VolunteerHistory.js'
import type { VolunteerHistoryEntry } from '../../types.js'
import type { VolunteerHistoryRepository } from '../interfaces.js'
import { sessionOptions } from './session.js'

function toEntry(doc: VolunteerHistoryDoc): VolunteerHistoryEntry {
  return {
    id: doc._id,
    userId: doc.userId,
    eventId: doc.eventId,
    role: doc.role,
    hours: doc.hours,
    date: doc.date,
    notes: doc.notes ?? null,
    createdAt: doc.createdAt
  }
}

export class MongoVolunteerHistoryRepository implements VolunteerHistoryRepository {
  constructor(private readonly session: ClientSession | null) {}

  async get(id: string): Promise<VolunteerHistoryEntry | null> {
    const doc = await VolunteerHistoryModel.findById(id).session(this.session).lean<VolunteerHistoryDoc>().exec()
    return doc ? toEntry(doc) : null
  }

  async list(since?: Date): Promise<VolunteerHistoryEntry[]> {
    const query: FilterQuery<VolunteerHistoryDoc> = since ? { date: { $gte: since } } : {}
    return this.find(query)
  }

  async listByUser(userId: string): Promise<VolunteerHistoryEntry[]> {
    return this.find({ userId })
  }

  async listByEvent(eventId: string): Promise<VolunteerHistoryEntry[]> {
    return this.find({ eventId })
  }

  async save(entry: VolunteerHistoryEntry): Promise<void> {
    const { id, ...rest } = entry
    const doc: VolunteerHistoryDoc = { _id: id, ...rest }
    await VolunteerHistoryModel.replaceOne({ _id: id }, doc, { upsert: true, ...sessionOptions(this.session) }).exec()
  }

  async delete(id: string): Promise<boolean> {
    const result = await VolunteerHistoryModel.deleteOne({ _id: id }, sessionOptions(this.session)).exec()
    return result.deletedCount > 0
  }

  private async find(query: FilterQuery<VolunteerHistoryDoc>): Promise<VolunteerHistoryEntry[]> {
    const docs = await VolunteerHistoryModel.find(query)
      .sort({ date: -1 })
      .session(this.session)
      .lean<VolunteerHistoryDoc[]>()
      .exec()
    return docs.map(toEntry)
  }
}
