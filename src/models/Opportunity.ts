import mongoose from 'mongoose'

export interface OpportunityDoc {
  _id: string
  eventId: string
  title: string
  description: string | null
  requiredSkills: string[]
  minHours: number | null
  maxSlots: number | null
  createdAt: Date
}

const opportunitySchema = new mongoose.Schema<OpportunityDoc>({
  _id: {
    type: String,
    required: true
  },
  eventId: {
    type: String,
    ref: 'Event',
    required: true
  },
  title: {
    type: String,
    required: true,
    trim: true,
    maxlength: 100
  },
  description: {
    type: String,
    default: null,
    maxlength: 500
  },
  requiredSkills: {
    type: [String],
    default: []
  },
  minHours: {
    type: Number,
    default: null
  },
  maxSlots: {
    type: Number,
    default: null
  },
  createdAt: {
    type: Date,
    default: Date.now
  }
}, {
  collection: 'opportunities'
})

opportunitySchema.index({ eventId: 1 })

export const OpportunityModel = mongoose.model<OpportunityDoc>('Opportunity', opportunitySchema)
