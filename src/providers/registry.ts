import type { AppConfig } from '../config/types/app-config.ts'
import { BadRequestError } from '../plumbing/errors.ts'
import { createGitHubProvider } from './github.ts'
import { createGoogleProvider } from './google.ts'
import type { OAuthProvider } from './types/provider.ts'

export interface ProviderRegistry {
  /** Throws BadRequestError for an unknown id */
  resolve: (id: string) => OAuthProvider
  list: () => OAuthProvider[]
}

export const createProviderRegistry = (
  providers: OAuthProvider[],
): ProviderRegistry => {
  const byId = new Map<string, OAuthProvider>()
  for (const provider of providers) {
    if (byId.has(provider.id)) {
      throw new Error(`Duplicate provider id: ${provider.id}`)
    }
    byId.set(provider.id, provider)
  }

  return {
    resolve: (id: string): OAuthProvider => {
      const provider = byId.get(id)
      if (!provider) {
        throw new BadRequestError(`unknown provider: ${id}`)
      }
      return provider
    },
    list: () => Array.from(byId.values()),
  }
}

/**
 * Builds the providers whose client credentials are configured.
 */
export const createConfiguredProviders = (
  config: Pick<AppConfig, 'providers'>,
): OAuthProvider[] => {
  const providers: OAuthProvider[] = []
  const { github, google } = config.providers
  if (github) {
    providers.push(createGitHubProvider(github))
  }
  if (google) {
    providers.push(createGoogleProvider(google))
  }
  return providers
}
