import { NotFoundError } from '../plumbing/errors.ts'
import {
  type AccountStore,
  ProviderLinkConflictError,
  providerLinkKey,
} from './store.ts'
import type { Account, ProviderLink } from './types/account.ts'

const copyAccount = (account: Account): Account => ({
  ...account,
  providers: account.providers.map((link) => ({ ...link })),
})

/**
 * Account store held in process memory. Suitable for tests and a single
 * development node; data is lost on restart.
 */
export const createMemoryAccountStore = (
  seed: Account[] = [],
): AccountStore => {
  const accounts = new Map<string, Account>()
  // Insertion order doubles as creation order for email lookups
  const accountIdByLink = new Map<string, string>()

  const claimLinks = (accountId: string, links: ProviderLink[]): void => {
    for (const link of links) {
      if (accountIdByLink.has(providerLinkKey(link))) {
        throw new ProviderLinkConflictError(link)
      }
    }
    for (const link of links) {
      accountIdByLink.set(providerLinkKey(link), accountId)
    }
  }

  for (const account of seed) {
    claimLinks(account.id, account.providers)
    accounts.set(account.id, copyAccount(account))
  }

  const getAccount = (id: string): Account => {
    const account = accounts.get(id)
    if (!account) {
      throw new NotFoundError(`account not found: ${id}`)
    }
    return account
  }

  return {
    findById: async (id) => copyAccount(getAccount(id)),

    findByProvider: async (provider, providerUserId) => {
      const accountId = accountIdByLink.get(
        providerLinkKey({ provider, providerUserId }),
      )
      if (!accountId) {
        throw new NotFoundError(
          `no account linked to ${provider}:${providerUserId}`,
        )
      }
      return copyAccount(getAccount(accountId))
    },

    findByEmail: async (email) => {
      const normalized = email.toLowerCase()
      for (const account of accounts.values()) {
        if (account.email !== '' && account.email === normalized) {
          return copyAccount(account)
        }
      }
      throw new NotFoundError('no account with this email')
    },

    linkProvider: async (accountId, link) => {
      const account = getAccount(accountId)
      claimLinks(accountId, [link])
      account.providers.push({ ...link })
      return copyAccount(account)
    },

    create: async (input) => {
      if (accounts.has(input.id)) {
        throw new Error(`Account id already exists: ${input.id}`)
      }
      claimLinks(input.id, input.providers)
      const account = copyAccount({
        ...input,
        email: input.email.toLowerCase(),
      })
      accounts.set(account.id, account)
      return copyAccount(account)
    },
  }
}
