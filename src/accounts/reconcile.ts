import { randomUUID } from 'node:crypto'
import { isNotFound } from '../plumbing/errors.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import type { ExternalIdentity } from '../providers/types/provider.ts'
import type { AccountStore, StoreCallOptions } from './store.ts'
import type { Account, ProviderLink } from './types/account.ts'

/**
 * Runs one lookup step. A miss yields null so the caller can fall through;
 * every other failure propagates unchanged.
 */
const lookup = async (
  step: () => Promise<Account>,
): Promise<Account | null> => {
  try {
    return await step()
  } catch (error) {
    if (isNotFound(error)) {
      return null
    }
    throw error
  }
}

/**
 * Map an external identity to a local account.
 *
 * 1. An account already linked to (provider, providerUserId) is returned as is.
 * 2. Otherwise an account with the same email gets the new link appended.
 * 3. Otherwise a new standard account is created with the single link.
 *
 * The first step is what keeps one provider identity on one account. Two
 * concurrent first logins of the same identity race between steps 1 and 3;
 * the store's link uniqueness makes the loser fail with
 * ProviderLinkConflictError instead of creating a second account.
 */
export const reconcileAccount = async (
  store: AccountStore,
  identity: ExternalIdentity,
  options: StoreCallOptions = {},
): Promise<Account> => {
  const link: ProviderLink = {
    provider: identity.provider,
    providerUserId: identity.providerUserId,
  }

  // Case 1: Provider identity already linked
  const linked = await lookup(() =>
    store.findByProvider(link.provider, link.providerUserId, options),
  )
  if (linked) {
    return linked
  }

  // Case 2: Account exists by email - link provider identity
  const email = identity.email.trim().toLowerCase()
  if (email) {
    const existing = await lookup(() => store.findByEmail(email, options))
    if (existing) {
      const account = await store.linkProvider(existing.id, link, options)
      logSecurityEvent({
        event: 'account_linked',
        account_id: account.id,
        provider: link.provider,
      })
      return account
    }
  }

  // Case 3: New account
  const account = await store.create(
    {
      id: randomUUID(),
      name: identity.name,
      email,
      role: 'standard',
      providers: [link],
    },
    options,
  )
  logSecurityEvent({
    event: 'account_created',
    account_id: account.id,
    provider: link.provider,
  })
  return account
}
