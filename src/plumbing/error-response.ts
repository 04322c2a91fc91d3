import type { Context } from 'hono'
import { nanoid } from 'nanoid'
import { type AuthErrorKind, toAuthError } from './errors.ts'
import { describeError, logError } from './logger.ts'

const STATUS_BY_KIND = {
  bad_request: 400,
  forbidden: 403,
  provider: 502,
  not_found: 404,
  internal: 500,
} as const satisfies Record<AuthErrorKind, number>

export type ErrorStatus = (typeof STATUS_BY_KIND)[AuthErrorKind]

export interface ErrorBody {
  error: AuthErrorKind
  error_description: string
  /** Only on internal errors; matches the server-side log entry */
  reference?: string
}

/**
 * Classifies any thrown value. Internal failures are logged in full under a
 * random reference and the caller only gets the reference back.
 */
export const describeFailure = (
  error: unknown,
): { body: ErrorBody; status: ErrorStatus } => {
  const authError = toAuthError(error)
  const status = STATUS_BY_KIND[authError.kind]

  if (authError.kind === 'internal') {
    const reference = nanoid(12)
    logError({
      message: 'Internal error',
      reference,
      ...describeError(authError),
    })
    return {
      body: {
        error: 'internal',
        error_description: 'internal error',
        reference,
      },
      status,
    }
  }

  return {
    body: { error: authError.kind, error_description: authError.message },
    status,
  }
}

/**
 * Hono `onError` handler. Built on the context so headers already set (the
 * cookie that discards a consumed login session, for one) stay on the response.
 */
export const handleError = (error: Error, c: Context): Response => {
  const { body, status } = describeFailure(error)
  c.header('Cache-Control', 'no-store')
  c.header('Pragma', 'no-cache')
  return c.json(body, status)
}
