import type { ProviderKind } from '../providers/types/provider.ts'
import type { Account, AccountInput, ProviderLink } from './types/account.ts'

export interface StoreCallOptions {
  signal?: AbortSignal
}

/**
 * Persistent account storage. Every lookup miss throws NotFoundError.
 * Implementations must refuse a second claim of the same provider link with
 * ProviderLinkConflictError.
 */
export interface AccountStore {
  findById: (id: string, options?: StoreCallOptions) => Promise<Account>
  findByProvider: (
    provider: ProviderKind,
    providerUserId: string,
    options?: StoreCallOptions,
  ) => Promise<Account>
  /** Oldest account carrying this email */
  findByEmail: (email: string, options?: StoreCallOptions) => Promise<Account>
  linkProvider: (
    accountId: string,
    link: ProviderLink,
    options?: StoreCallOptions,
  ) => Promise<Account>
  create: (input: AccountInput, options?: StoreCallOptions) => Promise<Account>
}

export class ProviderLinkConflictError extends Error {
  readonly link: ProviderLink

  constructor(link: ProviderLink) {
    super(
      `Provider identity ${link.provider}:${link.providerUserId} is already linked to an account`,
    )
    this.name = 'ProviderLinkConflictError'
    this.link = link
  }
}

export const providerLinkKey = (link: ProviderLink): string =>
  `${link.provider}:${link.providerUserId}`
