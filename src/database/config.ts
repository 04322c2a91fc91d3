import { parseList, parseNumber } from '../plumbing/parse-env.ts'
import type { DatabaseConfig } from './types/database-config.ts'

const DEFAULT_KEYSPACE = 'federated_login'

export const getDatabaseConfig = (): DatabaseConfig => {
  const hosts = parseList(process.env.SCYLLA_HOSTS)
  const username = process.env.SCYLLA_USERNAME?.trim()
  const password = process.env.SCYLLA_PASSWORD?.trim()

  return {
    hosts: hosts.length > 0 ? hosts : ['localhost'],
    port: parseNumber(process.env.SCYLLA_PORT, 9042),
    keyspace: process.env.SCYLLA_KEYSPACE?.trim() || DEFAULT_KEYSPACE,
    localDataCenter:
      process.env.SCYLLA_LOCAL_DATACENTER?.trim() || 'datacenter1',
    username: username || undefined,
    password: password || undefined,
    isSslEnabled: process.env.SCYLLA_SSL === 'true',
    connectTimeoutMs: parseNumber(
      process.env.SCYLLA_CONNECT_TIMEOUT_MS,
      10_000,
    ),
  }
}
