import type { ClientSession } from 'mongoose'
import { ProfileModel, type ProfileDoc } from '../../models/Profile.js'
import type { Profile } from '../../types.js'
import type { ProfileRepository } from '../interfaces.js'
import { sessionOptions } from './session.js'

function toProfile(doc: ProfileDoc): Profile {
  return {
    userId: doc._id,
    displayName: doc.displayName,
    phone: doc.phone ?? null,
    skills: [...doc.skills],
    tags: [...doc.tags],
    availability: doc.availability.map((window) => ({
      weekday: window.weekday,
      start: window.start,
      end: window.end
    })),
    location: doc.location
      ? {
          city: doc.location.city ?? null,
          state: doc.location.state ?? null,
          latitude: doc.location.latitude ?? null,
          longitude: doc.location.longitude ?? null
        }
      : null,
    maxTravelKm: doc.maxTravelKm ?? null,
    notificationPreferences: {
      email: doc.notificationPreferences.email,
      sms: doc.notificationPreferences.sms,
      push: doc.notificationPreferences.push,
      inApp: doc.notificationPreferences.inApp
    },
    updatedAt: doc.updatedAt
  }
}

function toDoc(profile: Profile): ProfileDoc {
  return {
    _id: profile.userId,
    displayName: profile.displayName,
    phone: profile.phone,
    skills: profile.skills,
    tags: profile.tags,
    availability: profile.availability,
    location: profile.location,
    maxTravelKm: profile.maxTravelKm,
    notificationPreferences: profile.notificationPreferences,
    updatedAt: profile.updatedAt
  }
}

export class MongoProfileRepository implements ProfileRepository {
  constructor(private readonly session: ClientSession | null) {}

  async get(userId: string): Promise<Profile | null> {
    const doc = await ProfileModel.findById(userId).session(this.session).lean<ProfileDoc>().exec()
    return doc ? toProfile(doc) : null
  }

  async list(): Promise<Profile[]> {
    const docs = await ProfileModel.find().sort({ displayName: 1 }).session(this.session).lean<ProfileDoc[]>().exec()
    return docs.map(toProfile)
  }

  async save(profile: Profile): Promise<void> {
    await ProfileModel.replaceOne(
      { _id: profile.userId },
      toDoc(profile),
      { upsert: true, ...sessionOptions(this.session) }
    ).exec()
  }

  async delete(userId: string): Promise<boolean> {
    const result = await ProfileModel.deleteOne({ _id: userId }, sessionOptions(this.session)).exec()
    return result.deletedCount > 0
  }
}
