import type { Client } from 'cassandra-driver'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '001',
  name: 'create_accounts_table',
  description: 'Create accounts table',
  up: async (client: Client, keyspace: string): Promise<void> => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.accounts (
        account_id UUID,
        name TEXT,
        email TEXT,
        role TEXT,
        created_at TIMESTAMP,
        updated_at TIMESTAMP,
        PRIMARY KEY (account_id)
      )
    `)
  },
  down: async (client: Client, keyspace: string): Promise<void> => {
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.accounts`)
  },
}
