import { Hono } from 'hono'
import { createAccountRoutes } from './accounts/account-routes.ts'
import info from '../package.json' with { type: 'json' }
import { type OAuthRoutesOptions, createOAuthRoutes } from './auth/oauth-routes.ts'
import type { DatabaseHealthStatus } from './database/health.ts'
import { extractSessionClaims } from './middleware/session-claims.ts'
import { securityHeaders } from './middleware/security-headers.ts'
import { handleError } from './plumbing/error-response.ts'

const { name, version } = info

export interface AppDependencies extends OAuthRoutesOptions {
  /** Left out when accounts live in memory */
  checkDatabaseHealth?: () => Promise<DatabaseHealthStatus>
}

export const createApp = (deps: AppDependencies): Hono => {
  const app = new Hono()

  app.onError(handleError)
  app.use('*', securityHeaders)
  app.use('*', extractSessionClaims(deps.tokens, deps.sessionCookieName))

  app.get('/about', (c) => c.json({ name, version }))

  app.get('/health', async (c) => {
    if (!deps.checkDatabaseHealth) {
      return c.json({ status: 'ok', database: 'not used' })
    }
    const database = await deps.checkDatabaseHealth()
    return c.json(
      { status: database.isHealthy ? 'ok' : 'degraded', database },
      database.isHealthy ? 200 : 503,
    )
  })

  // Lets other services verify credentials offline
  app.get('/oauth/public-key', (c) => {
    c.header('Content-Type', 'application/x-pem-file')
    c.header('Cache-Control', 'public, max-age=300')
    return c.body(deps.tokens.publicKeyMaterial().toString('utf8'))
  })

  app.route('/', createOAuthRoutes(deps))

  app.route('/', createAccountRoutes(deps))

  return app
}
