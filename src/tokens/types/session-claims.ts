import type { Role } from '../../accounts/types/account.ts'

/**
 * Claims carried by a session credential. Validity is decided entirely by
 * the signature and `exp`; nothing backs them server-side.
 */
export interface SessionClaims {
  iss: string
  /** Account id */
  sub: string
  role: Role
  iat: number
  exp: number
}
