import { type Context, Hono } from 'hono'
import { reconcileAccount } from '../accounts/reconcile.ts'
import type { AccountStore } from '../accounts/store.ts'
import { BadRequestError, toAuthError } from '../plumbing/errors.ts'
import { log } from '../plumbing/logger.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import type { ProviderRegistry } from '../providers/registry.ts'
import type { OAuthProvider } from '../providers/types/provider.ts'
import type { TokenEngine } from '../tokens/token-engine.ts'
import { setCredentialCookie } from './credential-cookie.ts'
import { generateState, statesMatch } from './csrf.ts'
import type { FlowSession, FlowSessionStore } from './flow-session.ts'
import { DEFAULT_RETURN_TARGET, parseReturnTarget } from './return-target.ts'

export interface OAuthRoutesOptions {
  providers: ProviderRegistry
  accounts: AccountStore
  tokens: TokenEngine
  flowSessions: FlowSessionStore
  baseUrl: URL
  allowedReturnUrls: URL[]
  sessionCookieName: string
  tokenValiditySeconds: number
}

/**
 * The callback URL sent to the provider. The provider sends the user back
 * here, and the same value is repeated in the code exchange.
 */
export const buildCallbackUrl = (
  baseUrl: URL,
  provider: Pick<OAuthProvider, 'kind' | 'id'>,
): string =>
  `${baseUrl.href.replace(/\/$/, '')}/oauth/callback/${encodeURIComponent(provider.kind)}/${encodeURIComponent(provider.id)}`

/**
 * Login and callback endpoints of the OAuth flow. Per attempt the flow moves
 * idle → awaiting_callback (login) → completed | failed (callback); the phase
 * is carried in the flow session, never in server memory.
 */
export const createOAuthRoutes = (options: OAuthRoutesOptions): Hono => {
  const { providers, accounts, tokens, flowSessions, baseUrl } = options

  /**
   * GET /oauth/login/:providerId
   * Start a login attempt and redirect to the provider.
   */
  const handleLogin = async (c: Context): Promise<Response> => {
    const provider = providers.resolve(c.req.param('providerId') ?? '')

    // A new attempt always replaces a stale one
    const session = await flowSessions.create(c)
    const returnTo = parseReturnTarget(
      options.allowedReturnUrls,
      c.req.query('return'),
    )

    const state = generateState()
    const next: FlowSession = {
      ...session,
      phase: 'awaiting_callback',
      csrfToken: state,
      returnTo,
    }
    await flowSessions.save(c, next)

    logSecurityEvent({
      event: 'login_started',
      provider: provider.kind,
      provider_id: provider.id,
      has_return_target: returnTo !== undefined,
    })

    const loginUrl = provider.buildLoginUrl(
      state,
      buildCallbackUrl(baseUrl, provider),
    )
    return c.redirect(loginUrl, 302)
  }

  const completeCallback = async (
    c: Context,
    session: FlowSession | null,
  ): Promise<Response> => {
    const provider = providers.resolve(c.req.param('providerId') ?? '')
    if (c.req.param('providerType') !== provider.kind) {
      throw new BadRequestError('provider type mismatch')
    }

    const errorParam = c.req.query('error')
    if (errorParam) {
      log({
        message: 'OAuth callback error from provider',
        provider_id: provider.id,
        error: errorParam,
        error_description: c.req.query('error_description') ?? '',
      })
      throw new BadRequestError(errorParam)
    }

    const state = c.req.query('state')
    if (!state) {
      throw new BadRequestError('state not found')
    }
    if (
      !session?.csrfToken ||
      session.phase !== 'awaiting_callback' ||
      !statesMatch(session.csrfToken, state)
    ) {
      throw new BadRequestError('state mismatch')
    }

    const code = c.req.query('code')
    if (!code) {
      throw new BadRequestError('code not found')
    }

    const signal = c.req.raw.signal
    const { identity } = await provider.exchangeCodeForUser({
      code,
      redirectUri: buildCallbackUrl(baseUrl, provider),
      signal,
    })
    const account = await reconcileAccount(accounts, identity, { signal })

    const token = tokens.issue(account)
    logSecurityEvent({
      event: 'token_issued',
      account_id: account.id,
      role: account.role,
      expires_at: Math.floor(Date.now() / 1000) + options.tokenValiditySeconds,
    })

    const returnTo = session.returnTo ?? DEFAULT_RETURN_TARGET
    setCredentialCookie(c, token, returnTo, {
      cookieName: options.sessionCookieName,
      baseUrl,
      maxAgeSeconds: options.tokenValiditySeconds,
    })

    logSecurityEvent({
      event: 'auth_success',
      account_id: account.id,
      provider: provider.kind,
      provider_id: provider.id,
    })
    return c.redirect(returnTo, 302)
  }

  /**
   * GET /oauth/callback/:providerType/:providerId
   * The flow session is consumed before anything else, so it is used at most
   * once whatever the outcome.
   */
  const handleCallback = async (c: Context): Promise<Response> => {
    const session = await flowSessions.load(c)
    await flowSessions.destroy(c)

    try {
      return await completeCallback(c, session)
    } catch (error) {
      logSecurityEvent({
        event: 'auth_failure',
        provider_id: c.req.param('providerId') ?? '',
        reason: toAuthError(error).kind,
      })
      throw error
    }
  }

  const routes = new Hono()
  routes.get('/oauth/login/:providerId', handleLogin)
  routes.get('/oauth/callback/:providerType/:providerId', handleCallback)
  return routes
}
