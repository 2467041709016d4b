import mongoose from 'mongoose'
import { MATCH_REQUEST_STATUSES, type MatchRequestStatus } from '../types.js'

export interface MatchRequestDoc {
  _id: string
  userId: string
  opportunityId: string
  status: MatchRequestStatus
  score: number | null
  requestedAt: Date
  decidedAt: Date | null
  decisionReason: string | null
}

const matchRequestSchema = new mongoose.Schema<MatchRequestDoc>({
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
  status: {
    type: String,
    enum: MATCH_REQUEST_STATUSES,
    default: 'pending'
  },
  score: {
    type: Number,
    default: null
  },
  requestedAt: {
    type: Date,
    default: Date.now
  },
  decidedAt: {
    type: Date,
    default: null
  },
  decisionReason: {
    type: String,
    default: null
  }
}, {
  collection: 'match_requests'
})

matchRequestSchema.index({ userId: 1, opportunityId: 1 })
matchRequestSchema.index({ status: 1, requestedAt: 1 })

export const MatchRequestModel = mongoose.model<MatchRequestDoc>('MatchRequest', matchRequestSchema)
