import crypto from 'node:crypto'
import type { JwtHeader } from './types/jwt-header.ts'

export type JwtAlgorithm = 'EdDSA' | 'ES256' | 'RS256'

export const isJwtAlgorithm = (value: unknown): value is JwtAlgorithm =>
  value === 'EdDSA' || value === 'ES256' || value === 'RS256'

/**
 * Encodes a Buffer to Base64URL format
 * Base64URL is Base64 with URL-safe characters and no padding
 */
export const base64UrlEncode = (buffer: Buffer): string => {
  return buffer
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=/g, '')
}

/**
 * Decodes a Base64URL string to a Buffer
 * Handles padding restoration for proper Base64 decoding
 */
export const base64UrlDecode = (str: string): Buffer => {
  let base64 = str.replace(/-/g, '+').replace(/_/g, '/')
  // Add padding if needed
  while (base64.length % 4) {
    base64 += '='
  }
  return Buffer.from(base64, 'base64')
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const encodeJson = (value: object): string =>
  base64UrlEncode(Buffer.from(JSON.stringify(value), 'utf8'))

const decodeJson = (part: string): Record<string, unknown> => {
  const decoded: unknown = JSON.parse(base64UrlDecode(part).toString('utf8'))
  if (!isRecord(decoded)) {
    throw new Error('Invalid JWT format: part is not a JSON object')
  }
  return decoded
}

// EdDSA hashes internally, so Node takes no digest name for it.
// ECDSA signatures use IEEE P1363 encoding (RFC 7518) instead of DER.
const signatureOptions = (
  algorithm: JwtAlgorithm,
  key: crypto.KeyObject,
): { digest: string | null; key: crypto.KeyObject | crypto.SignKeyObjectInput } => {
  switch (algorithm) {
    case 'EdDSA':
      return { digest: null, key }
    case 'ES256':
      return { digest: 'sha256', key: { key, dsaEncoding: 'ieee-p1363' } }
    case 'RS256':
      return { digest: 'sha256', key }
  }
}

/**
 * Signs a payload and returns the compact JWS serialization.
 */
export const signJwt = (
  payload: object,
  privateKey: crypto.KeyObject,
  algorithm: JwtAlgorithm,
): string => {
  const header: JwtHeader = { alg: algorithm, typ: 'JWT' }
  const signingInput = `${encodeJson(header)}.${encodeJson(payload)}`
  const { digest, key } = signatureOptions(algorithm, privateKey)
  const signature = crypto.sign(digest, Buffer.from(signingInput), key)
  return `${signingInput}.${base64UrlEncode(signature)}`
}

export interface ParsedJwt {
  header: Record<string, unknown>
  payload: Record<string, unknown>
  signature: Buffer
  signingInput: string
}

/**
 * Parses a JWT token into its component parts without checking the signature
 */
export const parseJwt = (token: string): ParsedJwt => {
  const parts = token.split('.')
  if (parts.length !== 3) {
    throw new Error('Invalid JWT format: token must have three parts')
  }

  const [encodedHeader, encodedPayload, encodedSignature] = parts

  try {
    return {
      header: decodeJson(encodedHeader),
      payload: decodeJson(encodedPayload),
      signature: base64UrlDecode(encodedSignature),
      signingInput: `${encodedHeader}.${encodedPayload}`,
    }
  } catch (error) {
    throw new Error(
      `Invalid JWT format: failed to parse token parts - ${error instanceof Error ? error.message : String(error)}`,
    )
  }
}

/**
 * Checks the signature of a parsed token against a public key. The header's
 * `alg` must equal `algorithm`; the caller decides which algorithm it trusts.
 */
export const verifyJwtSignature = (
  parsed: ParsedJwt,
  publicKey: crypto.KeyObject,
  algorithm: JwtAlgorithm,
): void => {
  if (parsed.header.alg !== algorithm) {
    throw new Error(
      `JWT algorithm mismatch: token uses ${String(parsed.header.alg)} but ${algorithm} is required`,
    )
  }

  const { digest, key } = signatureOptions(algorithm, publicKey)
  let isValid: boolean
  try {
    isValid = crypto.verify(
      digest,
      Buffer.from(parsed.signingInput),
      key,
      parsed.signature,
    )
  } catch (error) {
    throw new Error('Invalid JWT signature', { cause: error })
  }
  if (!isValid) {
    throw new Error('Invalid JWT signature')
  }
}
