import { ProviderError } from '../plumbing/errors.ts'

/**
 * Performs one request against a provider and returns the parsed JSON body.
 * Network failures, non-2xx statuses and unparseable bodies all become
 * ProviderError. Nothing is retried.
 */
export const fetchProviderJson = async (
  provider: string,
  url: string,
  init: RequestInit,
  description: string,
): Promise<unknown> => {
  let response: Response
  try {
    response = await fetch(url, init)
  } catch (error) {
    if (init.signal?.aborted) {
      throw error
    }
    throw new ProviderError(
      provider,
      `${description} failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }

  if (!response.ok) {
    const errText = await response.text()
    throw new ProviderError(
      provider,
      `${description} failed: ${response.status} ${response.statusText} ${errText}`.trim(),
    )
  }

  try {
    return await response.json()
  } catch (error) {
    throw new ProviderError(
      provider,
      `${description} returned a malformed response`,
      { cause: error },
    )
  }
}
