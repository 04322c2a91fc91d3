import 'dotenv/config'
import { serve } from '@hono/node-server'
import { createMemoryAccountStore } from './accounts/memory-store.ts'
import { createCassandraAccountStore } from './accounts/cassandra-store.ts'
import type { AccountStore } from './accounts/store.ts'
import { createCookieFlowSessionStore } from './auth/flow-session.ts'
import { getAppConfig } from './config/app-config.ts'
import type { AppConfig } from './config/types/app-config.ts'
import { getDatabaseClient, initializeDatabase, shutdownDatabase } from './database/client.ts'
import { getDatabaseConfig } from './database/config.ts'
import { checkDatabaseHealth } from './database/health.ts'
import { describeError, log, logError } from './plumbing/logger.ts'
import { createConfiguredProviders, createProviderRegistry } from './providers/registry.ts'
import { createApp } from './server.ts'
import { createTokenEngine } from './tokens/token-engine.ts'

const createAccountStore = async (config: AppConfig): Promise<AccountStore> => {
  if (config.accountStore === 'memory') {
    log('Accounts are held in memory and are lost on restart')
    return createMemoryAccountStore()
  }
  await initializeDatabase()
  return createCassandraAccountStore({
    client: getDatabaseClient(),
    keyspace: getDatabaseConfig().keyspace,
  })
}

const start = async (): Promise<void> => {
  const config = getAppConfig()
  const accounts = await createAccountStore(config)

  const tokens = createTokenEngine({
    publicKey: config.signingPublicKey,
    privateKey: config.signingPrivateKey,
    issuer: config.tokenIssuer,
    validitySeconds: config.tokenValiditySeconds,
  })
  const providers = createProviderRegistry(createConfiguredProviders(config))

  const app = createApp({
    providers,
    accounts,
    tokens,
    flowSessions: createCookieFlowSessionStore({
      cookieName: config.flowCookieName,
      secret: config.flowCookieSecret,
      secure: config.baseUrl.protocol !== 'http:',
      basePath: config.baseUrl.pathname,
    }),
    baseUrl: config.baseUrl,
    allowedReturnUrls: config.allowedReturnUrls,
    sessionCookieName: config.sessionCookieName,
    tokenValiditySeconds: config.tokenValiditySeconds,
    checkDatabaseHealth:
      config.accountStore === 'cassandra' ? checkDatabaseHealth : undefined,
  })

  const server = serve({ fetch: app.fetch, port: config.port }, (address) => {
    log({
      message: 'Federated login service listening',
      port: address.port,
      baseUrl: config.baseUrl.origin,
      algorithm: tokens.algorithm,
      providers: providers.list().map((provider) => provider.id),
    })
  })

  const shutdown = (signal: string): void => {
    log({ message: 'Shutting down', signal })
    server.close()
    shutdownDatabase().then(
      () => process.exit(0),
      (error: unknown) => {
        logError({ message: 'Shutdown failed', ...describeError(error) })
        process.exit(1)
      },
    )
  }
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

start().catch((error: unknown) => {
  logError({ message: 'Failed to start service', ...describeError(error) })
  process.exit(1)
})
