import type { ClientSession, FilterQuery } from 'mongoose'
import { EventModel, type EventDoc } from '../../models/Event.js'
import type { VolunteerEvent } from '../../types.js'
import type { EventFilter, EventRepository } from '../interfaces.js'
import { sessionOptions } from './session.js'

function toEvent(doc: EventDoc): VolunteerEvent {
  return {
    id: doc._id,
    title: doc.title,
    description: doc.description,
    location: {
      name: doc.location.name,
      address: doc.location.address ?? null,
      city: doc.location.city ?? null,
      state: doc.location.state ?? null,
      postalCode: doc.location.postalCode ?? null,
      latitude: doc.location.latitude ?? null,
      longitude: doc.location.longitude ?? null
    },
    requiredSkills: [...doc.requiredSkills],
    startsAt: doc.startsAt,
    endsAt: doc.endsAt ?? null,
    capacity: doc.capacity ?? null,
    status: doc.status,
    createdBy: doc.createdBy ?? null,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt
  }
}

export class MongoEventRepository implements EventRepository {
  constructor(private readonly session: ClientSession | null) {}

  async get(id: string): Promise<VolunteerEvent | null> {
    const doc = await EventModel.findById(id).session(this.session).lean<EventDoc>().exec()
    return doc ? toEvent(doc) : null
  }

  async list(filter: EventFilter = {}): Promise<VolunteerEvent[]> {
    const query: FilterQuery<EventDoc> = {}
    if (filter.status) {
      query.status = filter.status
    }
    if (filter.startsAtOrAfter) {
      query.startsAt = { $gte: filter.startsAtOrAfter }
    }
    const docs = await EventModel.find(query).sort({ startsAt: 1 }).session(this.session).lean<EventDoc[]>().exec()
    return docs.map(toEvent)
  }

  async save(event: VolunteerEvent): Promise<void> {
    const { id, ...rest } = event
    const doc: EventDoc = { _id: id, ...rest }
    await EventModel.replaceOne({ _id: id }, doc, { upsert: true, ...sessionOptions(this.session) }).exec()
  }

  async delete(id: string): Promise<boolean> {
    const result = await EventModel.deleteOne({ _id: id }, sessionOptions(this.session)).exec()
    return result.deletedCount > 0
  }
}
