import mongoose from 'mongoose'
import { USER_ROLES, type UserRole } from '../types.js'

export interface UserDoc {
  _id: string
  email: string
  roles: UserRole[]
  authSubject: string | null
  createdAt: Date
}

const userSchema = new mongoose.Schema<UserDoc>({
  _id: {
    type: String,
    required: true
  },
  email: {
    type: String,
    required: [true, 'Email is required'],
    trim: true,
    lowercase: true,
    match: [/^[^\s@]+@[^\s@]+\.[^\s@]+$/, 'Please enter a valid email']
  },
  roles: {
    type: [{ type: String, enum: USER_ROLES }],
    default: ['volunteer']
  },
  authSubject: {
    type: String,
    default: null
  },
  createdAt: {
    type: Date,
    default: Date.now
  }
}, {
  collection: 'users'
})

// One account per identity-provider subject
userSchema.index(
  { authSubject: 1 },
  {
    unique: true,
    partialFilterExpression: { authSubject: { $type: 'string' } },
    name: 'unique_auth_subject'
  }
)

export const UserModel = mongoose.model<UserDoc>('User', userSchema)
