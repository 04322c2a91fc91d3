import { BadRequestError } from '../plumbing/errors.ts'

export const DEFAULT_RETURN_TARGET = '/'

/**
 * Validate the `return` parameter of a login request against the allow-list.
 * It must be absolute, and its scheme and host must both match one entry.
 * A rejected target fails the whole login; it is never silently dropped.
 */
export const parseReturnTarget = (
  allowedReturnUrls: URL[],
  value: string | undefined,
): string | undefined => {
  if (!value) {
    return undefined
  }

  let returnUrl: URL
  try {
    returnUrl = new URL(value)
  } catch {
    throw new BadRequestError('invalid return url: must be an absolute URL')
  }

  const sameHost = allowedReturnUrls.filter((url) => url.host === returnUrl.host)
  if (sameHost.length === 0) {
    throw new BadRequestError('invalid return url: host is not allowed')
  }
  if (!sameHost.some((url) => url.protocol === returnUrl.protocol)) {
    throw new BadRequestError('invalid return url: scheme is not allowed')
  }

  return returnUrl.href
}
