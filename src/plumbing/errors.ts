export type AuthErrorKind =
  | 'bad_request'
  | 'forbidden'
  | 'provider'
  | 'not_found'
  | 'internal'

/**
 * Tagged error consumed by the HTTP boundary to pick a status code.
 * Only `internal` errors have their message hidden from the caller.
 */
export class AuthError extends Error {
  readonly kind: AuthErrorKind

  constructor(kind: AuthErrorKind, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'AuthError'
    this.kind = kind
  }
}

export class BadRequestError extends AuthError {
  constructor(message: string, options?: ErrorOptions) {
    super('bad_request', message, options)
    this.name = 'BadRequestError'
  }
}

export class ForbiddenError extends AuthError {
  constructor(message: string, options?: ErrorOptions) {
    super('forbidden', message, options)
    this.name = 'ForbiddenError'
  }
}

export class ProviderError extends AuthError {
  readonly provider: string

  constructor(provider: string, message: string, options?: ErrorOptions) {
    super('provider', message, options)
    this.name = 'ProviderError'
    this.provider = provider
  }
}

/** Lookup miss. Reconciliation uses it as a control-flow signal. */
export class NotFoundError extends AuthError {
  constructor(message: string, options?: ErrorOptions) {
    super('not_found', message, options)
    this.name = 'NotFoundError'
  }
}

export class InternalError extends AuthError {
  constructor(message: string, options?: ErrorOptions) {
    super('internal', message, options)
    this.name = 'InternalError'
  }
}

export const isNotFound = (error: unknown): error is NotFoundError =>
  error instanceof AuthError && error.kind === 'not_found'

/**
 * Anything that is not an AuthError is an unexpected failure.
 */
export const toAuthError = (error: unknown): AuthError => {
  if (error instanceof AuthError) {
    return error
  }
  return new InternalError(
    error instanceof Error ? error.message : String(error),
    { cause: error },
  )
}
