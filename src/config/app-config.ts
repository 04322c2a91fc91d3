import { isDatabaseEnabledForEnv } from '../database/client.ts'
import { log, logWarning } from '../plumbing/logger.ts'
import { parseList, parseNumber, parsePem } from '../plumbing/parse-env.ts'
import { getGitHubConfig } from '../providers/github-config.ts'
import { getGoogleConfig } from '../providers/google-config.ts'
import { generateSigningKeyPair } from '../tokens/key-material.ts'
import type { AppConfig, ProviderCredentials } from './types/app-config.ts'

const DEFAULT_TOKEN_VALIDITY_SECONDS = 24 * 60 * 60

let cachedConfig: AppConfig | null = null

const parseUrl = (value: string, label: string, errors: string[]): URL | null => {
  try {
    const url = new URL(value)
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      errors.push(`${label} must use http:// or https://: ${value}`)
      return null
    }
    return url
  } catch {
    errors.push(`${label} must be an absolute URL: ${value}`)
    return null
  }
}

const credentials = (config: {
  clientId: string
  clientSecret: string
  isConfigured: boolean
}): ProviderCredentials | undefined =>
  config.isConfigured
    ? { clientId: config.clientId, clientSecret: config.clientSecret }
    : undefined

/**
 * Outside production a missing key pair is replaced with an ephemeral one so
 * the service starts; tokens then stop verifying on every restart.
 */
const resolveSigningKeys = (
  errors: string[],
): { privateKey: string; publicKey: string } => {
  const privateKey = parsePem(process.env.TOKEN_SIGNING_PRIVATE_KEY)
  const publicKey = parsePem(process.env.TOKEN_SIGNING_PUBLIC_KEY)
  if (privateKey && publicKey) {
    return { privateKey, publicKey }
  }
  if (process.env.NODE_ENV === 'production') {
    errors.push(
      'TOKEN_SIGNING_PRIVATE_KEY and TOKEN_SIGNING_PUBLIC_KEY must be set in production',
    )
    return { privateKey: '', publicKey: '' }
  }
  logWarning(
    'Token signing keys not configured - using an ephemeral Ed25519 key pair',
  )
  return generateSigningKeyPair('EdDSA')
}

export const getAppConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  const errors: string[] = []
  const port = parseNumber(process.env.PORT, 3000)
  const baseUrl = parseUrl(
    process.env.APP_BASE_URL?.trim() || `http://localhost:${port}`,
    'APP_BASE_URL',
    errors,
  )
  const allowedReturnUrls = parseList(process.env.ALLOWED_RETURN_URLS)
    .map((value) => parseUrl(value, 'ALLOWED_RETURN_URLS entry', errors))
    .filter((url): url is URL => url !== null)

  const tokenValiditySeconds = parseNumber(
    process.env.TOKEN_VALIDITY_SECONDS,
    DEFAULT_TOKEN_VALIDITY_SECONDS,
  )
  if (tokenValiditySeconds <= 0) {
    errors.push('TOKEN_VALIDITY_SECONDS must be positive')
  }

  const flowCookieSecret = process.env.FLOW_COOKIE_SECRET?.trim() ?? ''
  if (!flowCookieSecret && process.env.NODE_ENV === 'production') {
    errors.push('FLOW_COOKIE_SECRET must be set in production')
  }

  const accountStore = process.env.ACCOUNT_STORE?.trim() || 'memory'
  if (accountStore !== 'memory' && accountStore !== 'cassandra') {
    errors.push(`ACCOUNT_STORE must be "memory" or "cassandra": ${accountStore}`)
  } else if (accountStore === 'cassandra' && !isDatabaseEnabledForEnv()) {
    errors.push(
      'ACCOUNT_STORE=cassandra needs the database, which SCYLLA_DISABLED=true or NODE_ENV=test (without SCYLLA_ENABLE_IN_TESTS=true) turns off',
    )
  }

  const keys = resolveSigningKeys(errors)

  if (errors.length > 0 || !baseUrl) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`)
  }

  const config: AppConfig = {
    port,
    baseUrl,
    allowedReturnUrls,
    tokenIssuer: process.env.TOKEN_ISSUER?.trim() || baseUrl.origin,
    tokenValiditySeconds,
    signingPrivateKey: keys.privateKey,
    signingPublicKey: keys.publicKey,
    sessionCookieName: process.env.SESSION_COOKIE_NAME?.trim() || 'fl_session',
    flowCookieName: process.env.FLOW_COOKIE_NAME?.trim() || 'fl_flow',
    flowCookieSecret: flowCookieSecret || 'development-flow-secret',
    accountStore: accountStore === 'cassandra' ? 'cassandra' : 'memory',
    providers: {
      github: credentials(getGitHubConfig()),
      google: credentials(getGoogleConfig()),
    },
  }

  cachedConfig = config
  log({
    message: 'Configuration validated and loaded',
    baseUrl: baseUrl.origin,
    allowedReturnUrls: allowedReturnUrls.map((url) => url.origin),
    providers: Object.entries(config.providers)
      .filter(([, value]) => value !== undefined)
      .map(([kind]) => kind),
    accountStore: config.accountStore,
  })

  return config
}

export const clearConfigCache = (): void => {
  cachedConfig = null
}
