import { Hono } from 'hono'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { generateSigningKeyPair } from '../../tokens/key-material.ts'
import { createTokenEngine } from '../../tokens/token-engine.ts'
import { extractSessionClaims, requireSession } from '../session-claims.ts'

const engine = (() => {
  const keys = generateSigningKeyPair()
  return createTokenEngine({
    publicKey: keys.publicKey,
    privateKey: keys.privateKey,
    issuer: 'https://login.example.com',
    validitySeconds: 3600,
  })
})()

const buildApp = () => {
  const app = new Hono()
  app.use('*', extractSessionClaims(engine, 'fl_session'))
  app.get('/claims', (c) => c.json({ claims: c.get('sessionClaims') ?? null }))
  app.get('/protected', requireSession, (c) => c.text('ok'))
  return app
}

describe('extractSessionClaims', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should attach claims from a bearer token', async () => {
    const token = engine.issue({ id: 'account-1', role: 'standard' })

    const res = await buildApp().request('/claims', {
      headers: { Authorization: `Bearer ${token}` },
    })

    expect(await res.json()).toMatchObject({
      claims: { sub: 'account-1', role: 'standard' },
    })
  })

  it('should prefer the header over the cookie', async () => {
    const fromHeader = engine.issue({ id: 'header-account', role: 'standard' })
    const fromCookie = engine.issue({ id: 'cookie-account', role: 'standard' })

    const res = await buildApp().request('/claims', {
      headers: {
        Authorization: `Bearer ${fromHeader}`,
        Cookie: `fl_session=${fromCookie}`,
      },
    })

    expect(await res.json()).toMatchObject({ claims: { sub: 'header-account' } })
  })

  it('should leave the request anonymous on an invalid token', async () => {
    const res = await buildApp().request('/claims', {
      headers: { Authorization: 'Bearer not-a-token' },
    })

    expect(await res.json()).toEqual({ claims: null })
    expect(console.warn).toHaveBeenCalledTimes(1)
  })

  it('should ignore an Authorization header that is not a bearer token', async () => {
    const res = await buildApp().request('/claims', {
      headers: { Authorization: 'Basic dXNlcjpwYXNz' },
    })

    expect(await res.json()).toEqual({ claims: null })
  })
})

describe('requireSession', () => {
  it('should let a verified caller through', async () => {
    const token = engine.issue({ id: 'account-1', role: 'standard' })

    const res = await buildApp().request('/protected', {
      headers: { Authorization: `Bearer ${token}` },
    })

    expect(res.status).toBe(200)
    expect(await res.text()).toBe('ok')
  })

  it('should answer 401 without a session', async () => {
    const res = await buildApp().request('/protected')

    expect(res.status).toBe(401)
    expect(await res.json()).toEqual({
      error: 'invalid_token',
      error_description: 'Valid session required',
    })
  })
})
