import { afterEach, describe, expect, it, vi } from 'vitest'
import { ProviderError } from '../../plumbing/errors.ts'
import { createGitHubProvider } from '../github.ts'

const jsonResponse = (body: unknown, init?: ResponseInit): Response =>
  new Response(JSON.stringify(body), {
    headers: { 'Content-Type': 'application/json' },
    ...init,
  })

const REDIRECT_URI = 'https://login.example.com/oauth/callback/github/github'

const provider = createGitHubProvider({
  clientId: 'test-github-client-id',
  clientSecret: 'test-secret',
})

describe('createGitHubProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should default its id to the provider kind', () => {
    expect(provider.kind).toBe('github')
    expect(provider.id).toBe('github')
    expect(
      createGitHubProvider({ id: 'github-enterprise', clientId: 'a', clientSecret: 'b' }).id,
    ).toBe('github-enterprise')
  })

  describe('buildLoginUrl', () => {
    it('should build the authorize URL with client id, scopes and state', () => {
      const url = new URL(provider.buildLoginUrl('state-123', REDIRECT_URI))

      expect(`${url.origin}${url.pathname}`).toBe(
        'https://github.com/login/oauth/authorize',
      )
      expect(url.searchParams.get('client_id')).toBe('test-github-client-id')
      expect(url.searchParams.get('redirect_uri')).toBe(REDIRECT_URI)
      expect(url.searchParams.get('scope')).toBe('read:user user:email')
      expect(url.searchParams.get('state')).toBe('state-123')
    })
  })

  describe('exchangeCodeForUser', () => {
    it('should exchange the code and map the profile to an identity', async () => {
      const fetchMock = vi
        .fn()
        .mockResolvedValueOnce(jsonResponse({ access_token: 'gho_test' }))
        .mockResolvedValueOnce(
          jsonResponse({
            id: 4242,
            login: 'octocat',
            name: 'The Octocat',
            email: 'Octocat@Example.com',
          }),
        )
      vi.stubGlobal('fetch', fetchMock)

      const { identity } = await provider.exchangeCodeForUser({
        code: 'code-1',
        redirectUri: REDIRECT_URI,
      })

      expect(identity).toEqual({
        provider: 'github',
        providerUserId: '4242',
        email: 'octocat@example.com',
        name: 'The Octocat',
      })
      expect(fetchMock).toHaveBeenCalledTimes(2)

      const [tokenUrl, tokenInit] = fetchMock.mock.calls[0]
      expect(tokenUrl).toBe('https://github.com/login/oauth/access_token')
      expect(tokenInit.method).toBe('POST')
      expect(tokenInit.headers.Accept).toBe('application/json')
      const body = new URLSearchParams(String(tokenInit.body))
      expect(body.get('code')).toBe('code-1')
      expect(body.get('client_secret')).toBe('test-secret')
      expect(body.get('redirect_uri')).toBe(REDIRECT_URI)

      const [userUrl, userInit] = fetchMock.mock.calls[1]
      expect(userUrl).toBe('https://api.github.com/user')
      expect(userInit.headers.Authorization).toBe('Bearer gho_test')
    })

    it('should fall back to the primary verified email', async () => {
      const fetchMock = vi
        .fn()
        .mockResolvedValueOnce(jsonResponse({ access_token: 'gho_test' }))
        .mockResolvedValueOnce(
          jsonResponse({ id: 7, login: 'private-user', name: null, email: null }),
        )
        .mockResolvedValueOnce(
          jsonResponse([
            { email: 'old@example.com', primary: false, verified: true },
            { email: 'Main@Example.com', primary: true, verified: true },
          ]),
        )
      vi.stubGlobal('fetch', fetchMock)

      const { identity } = await provider.exchangeCodeForUser({
        code: 'code-1',
        redirectUri: REDIRECT_URI,
      })

      expect(fetchMock.mock.calls[2][0]).toBe(
        'https://api.github.com/user/emails',
      )
      expect(identity.email).toBe('main@example.com')
      expect(identity.name).toBe('private-user')
    })

    it('should leave the email empty when none is verified', async () => {
      vi.stubGlobal(
        'fetch',
        vi
          .fn()
          .mockResolvedValueOnce(jsonResponse({ access_token: 'gho_test' }))
          .mockResolvedValueOnce(jsonResponse({ id: 7, login: 'someone' }))
          .mockResolvedValueOnce(
            jsonResponse([
              { email: 'x@example.com', primary: true, verified: false },
            ]),
          ),
      )

      const { identity } = await provider.exchangeCodeForUser({
        code: 'code-1',
        redirectUri: REDIRECT_URI,
      })

      expect(identity.email).toBe('')
    })

    it('should skip email entries that are not objects with an address', async () => {
      vi.stubGlobal(
        'fetch',
        vi
          .fn()
          .mockResolvedValueOnce(jsonResponse({ access_token: 'gho_test' }))
          .mockResolvedValueOnce(jsonResponse({ id: 7, login: 'someone' }))
          .mockResolvedValueOnce(
            jsonResponse([
              null,
              'primary@example.com',
              { email: 42, primary: true, verified: true },
              { email: 'kept@example.com', primary: true, verified: true },
            ]),
          ),
      )

      const { identity } = await provider.exchangeCodeForUser({
        code: 'code-1',
        redirectUri: REDIRECT_URI,
      })

      expect(identity.email).toBe('kept@example.com')
    })

    it('should surface a token error returned with status 200', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockResolvedValueOnce(
          jsonResponse({
            error: 'bad_verification_code',
            error_description: 'The code passed is incorrect or expired.',
          }),
        ),
      )

      const result = provider.exchangeCodeForUser({
        code: 'expired',
        redirectUri: REDIRECT_URI,
      })

      await expect(result).rejects.toBeInstanceOf(ProviderError)
      await expect(result).rejects.toThrow(
        'The code passed is incorrect or expired.',
      )
    })

    it('should fail on a non-2xx token response', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockResolvedValueOnce(
          new Response('upstream down', {
            status: 503,
            statusText: 'Service Unavailable',
          }),
        ),
      )

      await expect(
        provider.exchangeCodeForUser({ code: 'c', redirectUri: REDIRECT_URI }),
      ).rejects.toThrow(
        'GitHub token exchange failed: 503 Service Unavailable upstream down',
      )
    })

    it('should fail on a malformed body', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockResolvedValueOnce(new Response('<html>', { status: 200 })),
      )

      await expect(
        provider.exchangeCodeForUser({ code: 'c', redirectUri: REDIRECT_URI }),
      ).rejects.toThrow('GitHub token exchange returned a malformed response')
    })

    it('should fail when the profile has no id', async () => {
      vi.stubGlobal(
        'fetch',
        vi
          .fn()
          .mockResolvedValueOnce(jsonResponse({ access_token: 'gho_test' }))
          .mockResolvedValueOnce(jsonResponse({ login: 'ghost' })),
      )

      await expect(
        provider.exchangeCodeForUser({ code: 'c', redirectUri: REDIRECT_URI }),
      ).rejects.toThrow('GitHub user info did not return an id')
    })

    it('should wrap network failures in ProviderError', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn().mockRejectedValueOnce(new TypeError('fetch failed')),
      )

      const result = provider.exchangeCodeForUser({
        code: 'c',
        redirectUri: REDIRECT_URI,
      })

      await expect(result).rejects.toBeInstanceOf(ProviderError)
      await expect(result).rejects.toThrow(
        'GitHub token exchange failed: fetch failed',
      )
    })

    it('should pass an abort through unchanged', async () => {
      const controller = new AbortController()
      controller.abort()
      const abortError = new DOMException('aborted', 'AbortError')
      vi.stubGlobal('fetch', vi.fn().mockRejectedValueOnce(abortError))

      await expect(
        provider.exchangeCodeForUser({
          code: 'c',
          redirectUri: REDIRECT_URI,
          signal: controller.signal,
        }),
      ).rejects.toBe(abortError)
    })
  })
})
