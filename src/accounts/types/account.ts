import type { ProviderKind } from '../../providers/types/provider.ts'

export const ROLES = ['standard', 'administrator'] as const

export type Role = (typeof ROLES)[number]

export interface ProviderLink {
  provider: ProviderKind
  /** The provider's own identifier for the user */
  providerUserId: string
}

export interface Account {
  id: string
  name: string
  /** Used only as a linking hint, never as a unique key */
  email: string
  role: Role
  providers: ProviderLink[]
}

export interface AccountInput {
  id: string
  name: string
  email: string
  role: Role
  providers: ProviderLink[]
}
