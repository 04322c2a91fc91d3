import type { Client } from 'cassandra-driver'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '002',
  name: 'create_provider_accounts_table',
  description:
    'Create provider_accounts table; its primary key makes each provider identity claimable once',
  up: async (client: Client, keyspace: string): Promise<void> => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.provider_accounts (
        provider TEXT,
        provider_user_id TEXT,
        account_id UUID,
        linked_at TIMESTAMP,
        PRIMARY KEY ((provider, provider_user_id))
      )
    `)
  },
  down: async (client: Client, keyspace: string): Promise<void> => {
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.provider_accounts`)
  },
}
