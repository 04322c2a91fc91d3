import { Client, type ClientOptions } from 'cassandra-driver'
import { describeError, log, logError } from '../plumbing/logger.ts'
import { parseNumber } from '../plumbing/parse-env.ts'
import { getDatabaseConfig } from './config.ts'

let databaseClient: Client | null = null

export const isDatabaseEnabledForEnv = (): boolean => {
  if (process.env.SCYLLA_DISABLED === 'true') {
    return false
  }
  // Tests never open real connections unless asked to
  if (
    process.env.NODE_ENV === 'test' &&
    process.env.SCYLLA_ENABLE_IN_TESTS !== 'true'
  ) {
    return false
  }
  return true
}

const createCassandraClient = (options?: {
  skipKeyspace?: boolean
}): Client => {
  const config = getDatabaseConfig()

  const clientOptions: ClientOptions = {
    contactPoints: config.hosts.map((host) => `${host}:${config.port}`),
    localDataCenter: config.localDataCenter,
    // Migrations connect without a keyspace so they can create it
    keyspace: options?.skipKeyspace ? undefined : config.keyspace,
    credentials:
      config.username && config.password
        ? { username: config.username, password: config.password }
        : undefined,
    sslOptions: config.isSslEnabled ? { rejectUnauthorized: true } : undefined,
    socketOptions: {
      connectTimeout: config.connectTimeoutMs,
    },
  }

  return new Client(clientOptions)
}

export const getDatabaseClient = (): Client => {
  if (!databaseClient) {
    throw new Error(
      'Database client not initialized. Call initializeDatabase() first.',
    )
  }
  return databaseClient
}

/**
 * Connects once at startup. Startup is the only place that waits and tries
 * again; request handling never does.
 */
export const initializeDatabase = async (options?: {
  skipKeyspace?: boolean
}): Promise<void> => {
  if (!isDatabaseEnabledForEnv()) {
    log('Database initialization skipped for current environment')
    return
  }
  if (databaseClient) {
    return
  }

  const maxAttempts = parseNumber(process.env.SCYLLA_CONNECT_RETRIES, 3)
  const retryDelayMs = parseNumber(
    process.env.SCYLLA_CONNECT_RETRY_DELAY_MS,
    1_000,
  )

  for (let attempt = 1; ; attempt += 1) {
    const client = createCassandraClient(options)
    try {
      await client.connect()
      databaseClient = client
      log({
        message: 'Database connection established',
        keyspace: options?.skipKeyspace
          ? '(none - for migrations)'
          : getDatabaseConfig().keyspace,
        attempt,
      })
      return
    } catch (error) {
      logError({
        message: 'Failed to connect to database',
        attempt,
        ...describeError(error),
      })
      await client.shutdown().catch((shutdownError: unknown) => {
        logError({
          message: 'Error shutting down failed client',
          ...describeError(shutdownError),
        })
      })
      if (attempt >= maxAttempts) {
        throw error
      }
      await new Promise((resolve) => {
        setTimeout(resolve, retryDelayMs)
      })
    }
  }
}

export const shutdownDatabase = async (): Promise<void> => {
  const client = databaseClient
  databaseClient = null
  if (!client) {
    return
  }
  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    logError({
      message: 'Error while closing database connection',
      ...describeError(error),
    })
  }
}
