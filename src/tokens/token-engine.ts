import crypto from 'node:crypto'
import { ROLES, type Account, type Role } from '../accounts/types/account.ts'
import { type JwtAlgorithm, parseJwt, signJwt, verifyJwtSignature } from './jwt.ts'
import { algorithmForKey } from './key-material.ts'
import type { SessionClaims } from './types/session-claims.ts'

export class SigningError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SigningError'
  }
}

/**
 * Every verification failure looks the same to callers. The reason is kept
 * as `cause` for server-side logs.
 */
export class InvalidTokenError extends Error {
  constructor(options?: ErrorOptions) {
    super('invalid token', options)
    this.name = 'InvalidTokenError'
  }
}

export interface TokenEngineOptions {
  /** PEM (SPKI) public key; its type fixes the signature algorithm */
  publicKey: string | Buffer
  /** PEM (PKCS#8) private key. Verify-only engines leave it out. */
  privateKey?: string | Buffer
  issuer: string
  validitySeconds: number
}

export interface TokenEngine {
  readonly algorithm: JwtAlgorithm
  issue: (account: Pick<Account, 'id' | 'role'>) => string
  verify: (token: string) => SessionClaims
  publicKeyMaterial: () => Buffer
}

const isRole = (value: unknown): value is Role =>
  typeof value === 'string' && ROLES.some((role) => role === value)

const toClaims = (payload: Record<string, unknown>): SessionClaims => {
  const { iss, sub, role, iat, exp } = payload
  if (typeof exp !== 'number' || !Number.isFinite(exp)) {
    throw new Error('Missing or invalid exp claim')
  }
  if (typeof iss !== 'string' || typeof sub !== 'string' || sub === '') {
    throw new Error('Missing iss or sub claim')
  }
  if (!isRole(role)) {
    throw new Error('Missing or unknown role claim')
  }
  return {
    iss,
    sub,
    role,
    iat: typeof iat === 'number' ? iat : 0,
    exp,
  }
}

export const createTokenEngine = (options: TokenEngineOptions): TokenEngine => {
  const publicKey = crypto.createPublicKey(options.publicKey)
  const exported = publicKey.export({ type: 'spki', format: 'pem' })
  const rawPublicKey =
    typeof exported === 'string' ? Buffer.from(exported, 'utf8') : exported
  const algorithm = algorithmForKey(publicKey)

  let signingKey: crypto.KeyObject | undefined

  const getSigningKey = (): crypto.KeyObject => {
    if (signingKey) {
      return signingKey
    }
    if (!options.privateKey) {
      throw new SigningError('No private key configured')
    }
    let key: crypto.KeyObject
    try {
      key = crypto.createPrivateKey(options.privateKey)
    } catch (error) {
      throw new SigningError('Private key is unusable', { cause: error })
    }
    let keyAlgorithm: JwtAlgorithm
    try {
      keyAlgorithm = algorithmForKey(key)
    } catch (error) {
      throw new SigningError('Private key is unusable', { cause: error })
    }
    if (keyAlgorithm !== algorithm) {
      throw new SigningError(
        `Private key is for ${keyAlgorithm} but the engine signs with ${algorithm}`,
      )
    }
    signingKey = key
    return key
  }

  const issue = (account: Pick<Account, 'id' | 'role'>): string => {
    const key = getSigningKey()
    const now = Math.floor(Date.now() / 1000)
    const claims: SessionClaims = {
      iss: options.issuer,
      sub: account.id,
      role: account.role,
      iat: now,
      exp: now + options.validitySeconds,
    }
    try {
      return signJwt(claims, key, algorithm)
    } catch (error) {
      throw new SigningError('Failed to sign token', { cause: error })
    }
  }

  const verify = (token: string): SessionClaims => {
    try {
      const parsed = parseJwt(token)
      verifyJwtSignature(parsed, publicKey, algorithm)
      const claims = toClaims(parsed.payload)

      const now = Math.floor(Date.now() / 1000)
      if (now >= claims.exp) {
        throw new Error('JWT has expired')
      }
      const { nbf } = parsed.payload
      if (typeof nbf === 'number' && now < nbf) {
        throw new Error('JWT is not yet valid (nbf claim)')
      }
      return claims
    } catch (error) {
      throw new InvalidTokenError({ cause: error })
    }
  }

  return {
    algorithm,
    issue,
    verify,
    publicKeyMaterial: () => Buffer.from(rawPublicKey),
  }
}
