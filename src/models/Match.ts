import mongoose from 'mongoose'
import { MATCH_STATUSES, type MatchStatus } from '../types.js'

export interface MatchDoc {
  _id: string
  userId: string
  opportunityId: string
  eventId: string
  status: MatchStatus
  score: number | null
  createdAt: Date
  cancelledAt: Date | null
}

const matchSchema = new mongoose.Schema<MatchDoc>({
  _id: {
    type: String,
    required: true
  },
  userId: {
    type: String,
    ref: 'User',
    required: true
  },
  opportunityId: {
    type: String,
    ref: 'Opportunity',
    required: true
  },
  eventId: {
    type: String,
    ref: 'Event',
    required: true
  },
  status: {
    type: String,
    enum: MATCH_STATUSES,
    default: 'confirmed'
  },
  score: {
    type: Number,
    default: null
  },
  createdAt: {
    type: Date,
    default: Date.now
  },
  cancelledAt: {
    type: Date,
    default: null
  }
}, {
  collection: 'matches'
})

// At most one confirmed match per user and opportunity
matchSchema.index(
  { userId: 1, opportunityId: 1 },
  {
    unique: true,
    partialFilterExpression: { status: 'confirmed' },
    name: 'unique_confirmed_match'
  }
)
matchSchema.index({ opportunityId: 1, status: 1 })

export const MatchModel = mongoose.model<MatchDoc>('Match', matchSchema)
