import jwt, { type JwtPayload } from 'jsonwebtoken'
import jwksClient, { type JwksClient } from 'jwks-rsa'
import { z } from 'zod'
import type { AuthConfig } from '../config.js'
import { UnauthorizedError } from '../errors.js'
import type { TokenIdentity } from '../services/users.js'
import { USER_ROLES, type UserRole } from '../types.js'

const claimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().email().optional()
}).passthrough()

const rolesSchema = z.array(z.string())

function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value)
}

/**
 * Verifies bearer tokens issued by the identity provider (JWKS) or, for local
 * development, signed with a shared HS256 secret.
 */
export class TokenVerifier {
  private readonly jwks: JwksClient | null

  constructor(
    private readonly config: AuthConfig,
    private readonly rolesClaim: string
  ) {
    this.jwks = config.mode === 'jwks'
      ? jwksClient({
          jwksUri: `https://${config.domain}/.well-known/jwks.json`,
          cache: true,
          rateLimit: true
        })
      : null
  }

  async verify(token: string): Promise<TokenIdentity> {
    let payload: string | JwtPayload
    try {
      payload = await this.decode(token)
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new UnauthorizedError('Token expired')
      }
      throw new UnauthorizedError('Invalid token')
    }

    const claims = claimsSchema.safeParse(payload)
    if (!claims.success) {
      throw new UnauthorizedError('Invalid token')
    }

    const roles = rolesSchema.safeParse(claims.data[this.rolesClaim])
    return {
      subject: claims.data.sub,
      email: claims.data.email,
      roles: roles.success ? roles.data.filter(isUserRole) : undefined
    }
  }

  private async decode(token: string): Promise<string | JwtPayload> {
    const config = this.config
    if (config.mode === 'secret') {
      return jwt.verify(token, config.secret, {
        algorithms: ['HS256'],
        audience: config.audience,
        issuer: config.issuer
      })
    }

    const header = jwt.decode(token, { complete: true })?.header
    if (!header?.kid || !this.jwks) {
      throw new jwt.JsonWebTokenError('Token has no key id')
    }
    const key = await this.jwks.getSigningKey(header.kid)
    return jwt.verify(token, key.getPublicKey(), {
      algorithms: [config.algorithm],
      audience: config.audience,
      issuer: `https://${config.domain}/`
    })
  }
}
