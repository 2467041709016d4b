import dotenv from 'dotenv'
import { z } from 'zod'

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((value) => value === 'true')

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(5000),

    MONGO_URL: z.string().min(1, 'MONGO_URL is required'),
    // Multi-document transactions need a replica set; turn off for a standalone mongod.
    MONGO_TRANSACTIONS: booleanFlag,

    CORS_ORIGINS: z.string().default('http://localhost:5173'),

    AUTH0_DOMAIN: z.string().optional(),
    AUTH0_AUDIENCE: z.string().optional(),
    AUTH0_ALGORITHM: z.enum(['RS256', 'RS384', 'RS512']).default('RS256'),
    JWT_SECRET: z.string().optional(),
    JWT_ISSUER: z.string().optional(),
    AUTH_ROLES_CLAIM: z.string().default('https://volunteer-hub/roles'),

    // Read directly by utils/logger.
    LOG_LEVEL: z.enum(['ERROR', 'WARN', 'INFO', 'DEBUG']).default('INFO'),

    MATCH_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.5),
    MATCH_REQUEST_EXPIRY_DAYS: z.coerce.number().int().min(0).max(3650).default(30),
    MATCH_DEFAULT_MAX_TRAVEL_KM: z.coerce.number().positive().default(50)
  })
  .refine((env) => Boolean(env.AUTH0_DOMAIN) || Boolean(env.JWT_SECRET), {
    message: 'Either AUTH0_DOMAIN or JWT_SECRET must be set',
    path: ['AUTH0_DOMAIN']
  })

export type AuthConfig =
  | { mode: 'jwks'; domain: string; audience?: string; algorithm: 'RS256' | 'RS384' | 'RS512' }
  | { mode: 'secret'; secret: string; audience?: string; issuer?: string }

export interface AppConfig {
  port: number
  mongoUrl: string
  mongoTransactions: boolean
  corsOrigins: string[]
  auth: AuthConfig
  rolesClaim: string
  matching: {
    minScore: number
    requestExpiryDays: number
    defaultMaxTravelKm: number
  }
}

/** Splits a comma-separated list, dropping blanks and stray spaces. */
export function parseOrigins(raw: string): string[] {
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0)
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(
    Object.fromEntries(Object.entries(source).filter(([, value]) => value !== ''))
  )
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid environment configuration:\n  ${problems.join('\n  ')}`)
  }
  const env = parsed.data

  const auth: AuthConfig = env.AUTH0_DOMAIN
    ? {
        mode: 'jwks',
        domain: env.AUTH0_DOMAIN,
        audience: env.AUTH0_AUDIENCE,
        algorithm: env.AUTH0_ALGORITHM
      }
    : { mode: 'secret', secret: env.JWT_SECRET ?? '', audience: env.AUTH0_AUDIENCE, issuer: env.JWT_ISSUER }

  return {
    port: env.PORT,
    mongoUrl: env.MONGO_URL,
    mongoTransactions: env.MONGO_TRANSACTIONS,
    corsOrigins: parseOrigins(env.CORS_ORIGINS),
    auth,
    rolesClaim: env.AUTH_ROLES_CLAIM,
    matching: {
      minScore: env.MATCH_MIN_SCORE,
      requestExpiryDays: env.MATCH_REQUEST_EXPIRY_DAYS,
      defaultMaxTravelKm: env.MATCH_DEFAULT_MAX_TRAVEL_KM
    }
  }
}

export function loadEnvironment(): AppConfig {
  dotenv.config()
  return loadConfig(process.env)
}
