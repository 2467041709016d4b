import mongoose from 'mongoose'

export interface VolunteerHistoryDoc {
  _id: string
  userId: string
  eventId: string
  role: string
  hours: number
  date: Date
  notes: string | null
  createdAt: Date
}

const volunteerHistorySchema = new mongoose.Schema<VolunteerHistoryDoc>({
  _id: {
    type: String,
    required: true
  },
  userId: {
    type: String,
    ref: 'User',
    required: true
  },
  eventId: {
    type: String,
    ref: 'Event',
    required: true
  },
  role: {
    type: String,
    required: true,
    trim: true,
    maxlength: 100
  },
  hours: {
    type: Number,
    required: true,
    min: 0,
    max: 24
  },
  date: {
    type: Date,
    required: true
  },
  notes: {
    type: String,
    default: null,
    maxlength: 1000
  },
  createdAt: {
    type: Date,
    default: Date.now
  }
}, {
  collection: 'volunteer_history'
})

volunteerHistorySchema.index({ userId: 1, date: -1 })
volunteerHistorySchema.index({ eventId: 1 })
volunteerHistorySchema.index({ date: -1 })

export const VolunteerHistoryModel = mongoose.model<VolunteerHistoryDoc>('VolunteerHistory', volunteerHistorySchema)
