import type { Context } from 'hono'
import { setCookie } from 'hono/cookie'

export interface CredentialCookieOptions {
  cookieName: string
  /** The service's own base URL; plain http turns `Secure` off for local development */
  baseUrl: URL
  maxAgeSeconds: number
}

/**
 * Attach the session credential for the host the caller returns to. A
 * relative return target keeps the cookie host-only on this service.
 */
export const setCredentialCookie = (
  c: Context,
  token: string,
  returnTo: string,
  options: CredentialCookieOptions,
): void => {
  const domain = returnTo.startsWith('/')
    ? undefined
    : new URL(returnTo).hostname

  setCookie(c, options.cookieName, token, {
    path: '/',
    domain,
    httpOnly: true,
    sameSite: 'Lax',
    secure: options.baseUrl.protocol !== 'http:',
    maxAge: options.maxAgeSeconds,
  })
}
