export interface ProviderCredentials {
  clientId: string
  clientSecret: string
}

export interface AppConfig {
  port: number
  /** Public base URL of this service, used to build OAuth callback URLs */
  baseUrl: URL
  /** Origins a login may return to after the callback */
  allowedReturnUrls: URL[]
  tokenIssuer: string
  tokenValiditySeconds: number
  signingPrivateKey: string
  signingPublicKey: string
  sessionCookieName: string
  flowCookieName: string
  flowCookieSecret: string
  accountStore: 'memory' | 'cassandra'
  providers: {
    github?: ProviderCredentials
    google?: ProviderCredentials
  }
}
