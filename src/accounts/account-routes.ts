import { type Context, Hono } from 'hono'
import { requireSession } from '../middleware/session-claims.ts'
import { BadRequestError, ForbiddenError } from '../plumbing/errors.ts'
import { PROVIDER_KINDS } from '../providers/types/provider.ts'
import type { SessionClaims } from '../tokens/types/session-claims.ts'
import type { AccountStore } from './store.ts'

export interface AccountRoutesOptions {
  accounts: AccountStore
}

// requireSession runs first, so a missing value is a wiring mistake
const claimsOf = (c: Context): SessionClaims => {
  const claims = c.get('sessionClaims')
  if (!claims) {
    throw new Error('Session claims missing behind requireSession')
  }
  return claims
}

/**
 * Account lookups for signed-in callers. Everything here sits behind
 * requireSession; authorization is decided from the verified claims alone.
 */
export const createAccountRoutes = ({ accounts }: AccountRoutesOptions): Hono => {
  const app = new Hono()

  app.use('/whoami', requireSession)
  app.use('/users/*', requireSession)

  app.get('/whoami', async (c) => {
    const claims = claimsOf(c)
    const account = await accounts.findById(claims.sub, {
      signal: c.req.raw.signal,
    })
    return c.json(account)
  })

  /**
   * GET /users/by-provider/:provider/:providerUserId
   * Administrators only.
   */
  app.get('/users/by-provider/:provider/:providerUserId', async (c) => {
    const claims = claimsOf(c)
    if (claims.role !== 'administrator') {
      throw new ForbiddenError('administrator role required')
    }
    const provider = PROVIDER_KINDS.find(
      (kind) => kind === c.req.param('provider'),
    )
    if (!provider) {
      throw new BadRequestError(
        `unknown provider: ${c.req.param('provider')}`,
      )
    }
    const account = await accounts.findByProvider(
      provider,
      c.req.param('providerUserId'),
      { signal: c.req.raw.signal },
    )
    return c.json(account)
  })

  /**
   * GET /users/:id
   * A caller may only read their own account.
   */
  app.get('/users/:id', async (c) => {
    const claims = claimsOf(c)
    const id = c.req.param('id')
    if (claims.sub !== id) {
      throw new ForbiddenError('accounts can only be read by their owner')
    }
    const account = await accounts.findById(id, { signal: c.req.raw.signal })
    return c.json(account)
  })

  return app
}
