import { ProviderError } from '../plumbing/errors.ts'
import {
  GOOGLE_AUTH_URL,
  GOOGLE_SCOPES,
  GOOGLE_TOKEN_URL,
  GOOGLE_USER_INFO_URL,
} from './google-config.ts'
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
}

interface UserInfoResponse {
  sub?: string
  email?: string
  email_verified?: boolean
  name?: string
}

export const createGoogleProvider = (
  options: OAuthProviderOptions,
): OAuthProvider => {
  const { clientId, clientSecret } = options

  const buildLoginUrl = (state: string, redirectUri: string): string => {
    const params = new URLSearchParams({
      client_id: clientId,
      redirect_uri: redirectUri,
      response_type: 'code',
      scope: GOOGLE_SCOPES.join(' '),
      state,
    })
    return `${GOOGLE_AUTH_URL}?${params.toString()}`
  }

  /**
   * Exchange the code at the token endpoint, then read the profile from the
   * userinfo endpoint with the access token.
   */
  const exchangeCodeForUser = async ({
    code,
    redirectUri,
    signal,
  }: CodeExchangeInput): Promise<CodeExchangeResult> => {
    const tokenData = (await fetchProviderJson(
      'google',
      GOOGLE_TOKEN_URL,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          grant_type: 'authorization_code',
          code,
          redirect_uri: redirectUri,
          client_id: clientId,
          client_secret: clientSecret,
        }),
        signal,
      },
      'Google token exchange',
    )) as TokenResponse | null

    if (tokenData?.error || !tokenData?.access_token) {
      throw new ProviderError(
        'google',
        tokenData?.error ?? 'No access_token in response',
      )
    }

    const userInfo = (await fetchProviderJson(
      'google',
      GOOGLE_USER_INFO_URL,
      {
        headers: { Authorization: `Bearer ${tokenData.access_token}` },
        signal,
      },
      'Google user info fetch',
    )) as UserInfoResponse | null

    if (!userInfo?.sub) {
      throw new ProviderError('google', 'Google user info did not return sub')
    }

    // An unverified address must never drive account linking
    const email = userInfo.email_verified ? (userInfo.email ?? '') : ''

    return {
      identity: {
        provider: 'google',
        providerUserId: userInfo.sub,
        email: email.toLowerCase(),
        name: userInfo.name ?? email,
      },
      raw: userInfo,
    }
  }

  return {
    kind: 'google',
    id: options.id ?? 'google',
    buildLoginUrl,
    exchangeCodeForUser,
  }
}
