import type { Client } from 'cassandra-driver'

export interface Migration {
  version: string
  name: string
  description: string
  up: (client: Client, keyspace: string) => Promise<void>
  down: (client: Client, keyspace: string) => Promise<void>
}
