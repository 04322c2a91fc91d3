import { ProviderError } from '../plumbing/errors.ts'
import {
  GITHUB_AUTH_URL,
  GITHUB_SCOPES,
  GITHUB_TOKEN_URL,
  GITHUB_USER_EMAILS_URL,
  GITHUB_USER_URL,
} from './github-config.ts'
import { fetchProviderJson } from './http.ts'
import type {
  CodeExchangeInput,
  CodeExchangeResult,
  OAuthProvider,
  OAuthProviderOptions,
} from './types/provider.ts'

interface TokenResponse {
  access_token?: string
  error?: string
  error_description?: string
}

interface UserResponse {
  id?: number
  login?: string
  name?: string | null
  email?: string | null
}

interface EmailResponse {
  email?: string
  primary?: boolean
  verified?: boolean
}

const isEmailEntry = (value: unknown): value is EmailResponse =>
  typeof value === 'object' &&
  value !== null &&
  'email' in value &&
  typeof value.email === 'string'

const API_HEADERS = {
  Accept: 'application/vnd.github+json',
  'User-Agent': 'federated-login',
} as const

/**
 * The profile email is empty when the user keeps it private; fall back to
 * the primary verified address.
 */
const fetchPrimaryEmail = async (
  accessToken: string,
  signal: AbortSignal | undefined,
): Promise<string> => {
  const emails = await fetchProviderJson(
    'github',
    GITHUB_USER_EMAILS_URL,
    {
      headers: { ...API_HEADERS, Authorization: `Bearer ${accessToken}` },
      signal,
    },
    'GitHub email lookup',
  )

  if (!Array.isArray(emails)) {
    throw new ProviderError('github', 'GitHub email lookup returned no list')
  }
  const entries = emails.filter(isEmailEntry)
  const primary =
    entries.find((entry) => entry.primary === true && entry.verified === true) ??
    entries.find((entry) => entry.verified === true)
  return primary?.email ?? ''
}

export const createGitHubProvider = (
  options: OAuthProviderOptions,
): OAuthProvider => {
  const { clientId, clientSecret } = options

  /**
   * Build the GitHub OAuth authorization URL.
   */
  const buildLoginUrl = (state: string, redirectUri: string): string => {
    const params = new URLSearchParams({
      client_id: clientId,
      redirect_uri: redirectUri,
      scope: GITHUB_SCOPES.join(' '),
      state,
    })
    return `${GITHUB_AUTH_URL}?${params.toString()}`
  }

  const exchangeCodeForUser = async ({
    code,
    redirectUri,
    signal,
  }: CodeExchangeInput): Promise<CodeExchangeResult> => {
    // GitHub answers token errors with 200 and an `error` field
    const tokenData = (await fetchProviderJson(
      'github',
      GITHUB_TOKEN_URL,
      {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: new URLSearchParams({
          client_id: clientId,
          client_secret: clientSecret,
          code,
          redirect_uri: redirectUri,
        }),
        signal,
      },
      'GitHub token exchange',
    )) as TokenResponse | null

    if (tokenData?.error || !tokenData?.access_token) {
      throw new ProviderError(
        'github',
        tokenData?.error_description ??
          tokenData?.error ??
          'No access_token in response',
      )
    }
    const accessToken = tokenData.access_token

    const user = (await fetchProviderJson(
      'github',
      GITHUB_USER_URL,
      {
        headers: { ...API_HEADERS, Authorization: `Bearer ${accessToken}` },
        signal,
      },
      'GitHub user fetch',
    )) as UserResponse | null

    if (typeof user?.id !== 'number' || !user.login) {
      throw new ProviderError('github', 'GitHub user info did not return an id')
    }

    const email = user.email || (await fetchPrimaryEmail(accessToken, signal))

    return {
      identity: {
        provider: 'github',
        providerUserId: String(user.id),
        email: email.toLowerCase(),
        name: user.name || user.login,
      },
      raw: user,
    }
  }

  return {
    kind: 'github',
    id: options.id ?? 'github',
    buildLoginUrl,
    exchangeCodeForUser,
  }
}
