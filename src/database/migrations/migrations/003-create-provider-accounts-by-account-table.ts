import type { Client } from 'cassandra-driver'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '003',
  name: 'create_provider_accounts_by_account_table',
  description: 'Create provider_accounts_by_account lookup table',
  up: async (client: Client, keyspace: string): Promise<void> => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.provider_accounts_by_account (
        account_id UUID,
        provider TEXT,
        provider_user_id TEXT,
        linked_at TIMESTAMP,
        PRIMARY KEY (account_id, provider, provider_user_id)
      )
    `)
  },
  down: async (client: Client, keyspace: string): Promise<void> => {
    await client.execute(
      `DROP TABLE IF EXISTS ${keyspace}.provider_accounts_by_account`,
    )
  },
}
