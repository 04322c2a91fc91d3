import type { Context, Next } from 'hono'

const HSTS_HEADER = 'max-age=31536000; includeSubDomains'

const isHttps = (c: Context): boolean =>
  new URL(c.req.url).protocol === 'https:' ||
  c.req.header('x-forwarded-proto') === 'https'

/**
 * Standard security headers on every response. HSTS only when the request
 * came in over HTTPS.
 */
export const securityHeaders = async (c: Context, next: Next): Promise<void> => {
  await next()
  c.header('X-Content-Type-Options', 'nosniff')
  c.header('X-Frame-Options', 'DENY')
  c.header('Referrer-Policy', 'strict-origin-when-cross-origin')
  if (isHttps(c)) {
    c.header('Strict-Transport-Security', HSTS_HEADER)
  }
}
