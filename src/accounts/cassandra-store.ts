import type { Client, types } from 'cassandra-driver'
import {
  InternalError,
  NotFoundError,
  isNotFound,
} from '../plumbing/errors.ts'
import { PROVIDER_KINDS, type ProviderKind } from '../providers/types/provider.ts'
import {
  type AccountStore,
  ProviderLinkConflictError,
  type StoreCallOptions,
} from './store.ts'
import {
  type Account,
  type AccountInput,
  type ProviderLink,
  ROLES,
  type Role,
} from './types/account.ts'

export interface CassandraAccountStoreOptions {
  client: Pick<Client, 'execute'>
  keyspace: string
}

const QUERY_OPTIONS = { prepare: true } as const

const toRole = (value: unknown): Role => {
  const role = ROLES.find((candidate) => candidate === value)
  if (!role) {
    throw new Error(`Unknown role stored for account: ${String(value)}`)
  }
  return role
}

const toProviderKind = (value: unknown): ProviderKind => {
  const kind = PROVIDER_KINDS.find((candidate) => candidate === value)
  if (!kind) {
    throw new Error(`Unknown provider stored for account: ${String(value)}`)
  }
  return kind
}

/**
 * Account store on ScyllaDB / Cassandra. Provider identities are claimed with
 * a lightweight transaction on provider_accounts, whose primary key is
 * (provider, provider_user_id); a claim that is not applied means another
 * account already owns the identity.
 */
export const createCassandraAccountStore = ({
  client,
  keyspace,
}: CassandraAccountStoreOptions): AccountStore => {
  // The driver takes no abort signal; a cancelled request stops before its next query
  const execute = (
    query: string,
    params: unknown[],
    options: StoreCallOptions,
  ): Promise<types.ResultSet> => {
    options.signal?.throwIfAborted()
    return client.execute(query, params, QUERY_OPTIONS)
  }

  const findById = async (
    id: string,
    options: StoreCallOptions = {},
  ): Promise<Account> => {
    const accountResult = await execute(
      `SELECT account_id, name, email, role FROM ${keyspace}.accounts WHERE account_id = ?`,
      [id],
      options,
    )
    const row = accountResult.first()
    if (!row) {
      throw new NotFoundError(`account not found: ${id}`)
    }

    const linksResult = await execute(
      `SELECT provider, provider_user_id FROM ${keyspace}.provider_accounts_by_account WHERE account_id = ?`,
      [id],
      options,
    )

    return {
      id: String(row.account_id),
      name: String(row.name ?? ''),
      email: String(row.email ?? ''),
      role: toRole(row.role),
      providers: linksResult.rows.map((link) => ({
        provider: toProviderKind(link.provider),
        providerUserId: String(link.provider_user_id),
      })),
    }
  }

  const claimLink = async (
    accountId: string,
    link: ProviderLink,
    linkedAt: Date,
    options: StoreCallOptions,
  ): Promise<void> => {
    const claim = await execute(
      `INSERT INTO ${keyspace}.provider_accounts (provider, provider_user_id, account_id, linked_at)
       VALUES (?, ?, ?, ?)
       IF NOT EXISTS`,
      [link.provider, link.providerUserId, accountId, linkedAt],
      options,
    )
    if (!claim.wasApplied()) {
      throw new ProviderLinkConflictError(link)
    }
    await execute(
      `INSERT INTO ${keyspace}.provider_accounts_by_account (account_id, provider, provider_user_id, linked_at)
       VALUES (?, ?, ?, ?)`,
      [accountId, link.provider, link.providerUserId, linkedAt],
      options,
    )
  }

  // Runs even for an aborted request so nothing is left half-created
  const releaseAccount = async (
    accountId: string,
    links: ProviderLink[],
  ): Promise<void> => {
    for (const link of links) {
      await client.execute(
        `DELETE FROM ${keyspace}.provider_accounts WHERE provider = ? AND provider_user_id = ? IF account_id = ?`,
        [link.provider, link.providerUserId, accountId],
        QUERY_OPTIONS,
      )
      await client.execute(
        `DELETE FROM ${keyspace}.provider_accounts_by_account WHERE account_id = ? AND provider = ? AND provider_user_id = ?`,
        [accountId, link.provider, link.providerUserId],
        QUERY_OPTIONS,
      )
    }
    await client.execute(
      `DELETE FROM ${keyspace}.accounts WHERE account_id = ?`,
      [accountId],
      QUERY_OPTIONS,
    )
  }

  const findByProvider = async (
    provider: ProviderKind,
    providerUserId: string,
    options: StoreCallOptions = {},
  ): Promise<Account> => {
    const result = await execute(
      `SELECT account_id FROM ${keyspace}.provider_accounts WHERE provider = ? AND provider_user_id = ?`,
      [provider, providerUserId],
      options,
    )
    const row = result.first()
    if (!row) {
      throw new NotFoundError(
        `no account linked to ${provider}:${providerUserId}`,
      )
    }
    const accountId = String(row.account_id)
    try {
      return await findById(accountId, options)
    } catch (error) {
      // A link naming a missing account is corrupt data, not a lookup miss
      if (isNotFound(error)) {
        throw new InternalError(
          `${provider}:${providerUserId} is linked to missing account ${accountId}`,
          { cause: error },
        )
      }
      throw error
    }
  }

  const findByEmail = async (
    email: string,
    options: StoreCallOptions = {},
  ): Promise<Account> => {
    const result = await execute(
      `SELECT account_id FROM ${keyspace}.accounts_by_email WHERE email = ? LIMIT 1`,
      [email.toLowerCase()],
      options,
    )
    const row = result.first()
    if (!row) {
      throw new NotFoundError('no account with this email')
    }
    return findById(String(row.account_id), options)
  }

  const linkProvider = async (
    accountId: string,
    link: ProviderLink,
    options: StoreCallOptions = {},
  ): Promise<Account> => {
    const now = new Date()
    await claimLink(accountId, link, now, options)
    await execute(
      `UPDATE ${keyspace}.accounts SET updated_at = ? WHERE account_id = ?`,
      [now, accountId],
      options,
    )
    return findById(accountId, options)
  }

  /**
   * The account row is written before its links are claimed, so a claimed
   * link always names an existing account. A lost claim removes the row again.
   */
  const create = async (
    input: AccountInput,
    options: StoreCallOptions = {},
  ): Promise<Account> => {
    const now = new Date()
    const email = input.email.toLowerCase()
    await execute(
      `INSERT INTO ${keyspace}.accounts (account_id, name, email, role, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [input.id, input.name, email, input.role, now, now],
      options,
    )
    const claimed: ProviderLink[] = []
    try {
      for (const link of input.providers) {
        await claimLink(input.id, link, now, options)
        claimed.push(link)
      }
    } catch (error) {
      if (error instanceof ProviderLinkConflictError) {
        await releaseAccount(input.id, claimed)
      }
      throw error
    }
    if (email) {
      await execute(
        `INSERT INTO ${keyspace}.accounts_by_email (email, created_at, account_id)
         VALUES (?, ?, ?)`,
        [email, now, input.id],
        options,
      )
    }
    return {
      id: input.id,
      name: input.name,
      email,
      role: input.role,
      providers: input.providers.map((link) => ({ ...link })),
    }
  }

  return {
    findById,
    findByProvider,
    findByEmail,
    linkProvider,
    create,
  }
}
