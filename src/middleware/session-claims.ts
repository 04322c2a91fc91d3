import type { Context, Next } from 'hono'
import { getCookie } from 'hono/cookie'
import { describeError, logWarning } from '../plumbing/logger.ts'
import type { TokenEngine } from '../tokens/token-engine.ts'

const extractBearerToken = (authHeader: string | undefined): string | null => {
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null
  }
  const token = authHeader.slice(7).trim()
  return token.length > 0 ? token : null
}

/**
 * Verifies the credential a request carries, from the Authorization header
 * first and the session cookie otherwise, and attaches its claims as
 * `sessionClaims`. A missing or invalid credential leaves the request
 * anonymous; use {@link requireSession} where one is needed.
 */
export const extractSessionClaims = (
  engine: Pick<TokenEngine, 'verify'>,
  cookieName: string,
): ((c: Context, next: Next) => Promise<void>) => {
  return async (c, next) => {
    const token =
      extractBearerToken(c.req.header('Authorization')) ??
      getCookie(c, cookieName)

    if (token) {
      try {
        c.set('sessionClaims', engine.verify(token))
      } catch (error) {
        logWarning({
          message: 'Ignoring invalid session credential',
          ...describeError(error instanceof Error ? error.cause : error),
        })
      }
    }
    await next()
  }
}

export const requireSession = async (
  c: Context,
  next: Next,
): Promise<Response | undefined> => {
  if (!c.get('sessionClaims')) {
    c.status(401)
    c.header(
      'WWW-Authenticate',
      'Bearer error="invalid_token", error_description="Valid session required"',
    )
    return c.json({
      error: 'invalid_token',
      error_description: 'Valid session required',
    })
  }
  await next()
  return undefined
}
