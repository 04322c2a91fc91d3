export const GITHUB_AUTH_URL = 'https://github.com/login/oauth/authorize'
export const GITHUB_TOKEN_URL = 'https://github.com/login/oauth/access_token'
export const GITHUB_USER_URL = 'https://api.github.com/user'
export const GITHUB_USER_EMAILS_URL = 'https://api.github.com/user/emails'

export const GITHUB_SCOPES = ['read:user', 'user:email'] as const

export const getGitHubConfig = (): {
  clientId: string
  clientSecret: string
  isConfigured: boolean
} => {
  const clientId = process.env.GITHUB_CLIENT_ID?.trim() ?? ''
  const clientSecret = process.env.GITHUB_CLIENT_SECRET?.trim() ?? ''
  return {
    clientId,
    clientSecret,
    isConfigured: clientId.length > 0 && clientSecret.length > 0,
  }
}
