export type ProviderKind = 'github' | 'google'

export const PROVIDER_KINDS: readonly ProviderKind[] = ['github', 'google']

/**
 * Identity returned by a provider after a successful code exchange.
 * Normalized across providers; email is lower-cased and may be empty.
 */
export interface ExternalIdentity {
  provider: ProviderKind
  providerUserId: string
  email: string
  name: string
}

export interface CodeExchangeInput {
  code: string
  /** Must equal the redirect URI sent with the login URL */
  redirectUri: string
  signal?: AbortSignal
}

export interface CodeExchangeResult {
  identity: ExternalIdentity
  /** The provider's profile payload, untouched */
  raw: unknown
}

/**
 * Capability every OAuth provider supplies. Failures of any kind surface as
 * ProviderError.
 */
export interface OAuthProvider {
  readonly kind: ProviderKind
  /** Registry key and the last segment of the callback path */
  readonly id: string
  buildLoginUrl: (state: string, redirectUri: string) => string
  exchangeCodeForUser: (input: CodeExchangeInput) => Promise<CodeExchangeResult>
}

export interface OAuthProviderOptions {
  /** Defaults to the provider kind */
  id?: string
  clientId: string
  clientSecret: string
}
