import type { Client } from 'cassandra-driver'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '004',
  name: 'create_accounts_by_email_table',
  description:
    'Create accounts_by_email lookup table; several accounts may share an email',
  up: async (client: Client, keyspace: string): Promise<void> => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.accounts_by_email (
        email TEXT,
        created_at TIMESTAMP,
        account_id UUID,
        PRIMARY KEY (email, created_at, account_id)
      ) WITH CLUSTERING ORDER BY (created_at ASC, account_id ASC)
    `)
  },
  down: async (client: Client, keyspace: string): Promise<void> => {
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.accounts_by_email`)
  },
}
