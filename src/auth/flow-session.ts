import type { Context } from 'hono'
import {
  deleteCookie,
  getCookie,
  getSignedCookie,
  setCookie,
  setSignedCookie,
} from 'hono/cookie'
import { nanoid } from 'nanoid'
import { base64UrlDecode, base64UrlEncode } from '../tokens/jwt.ts'

type CookieOptions = NonNullable<Parameters<typeof setCookie>[3]>

export type FlowPhase = 'idle' | 'awaiting_callback' | 'completed' | 'failed'

/**
 * Per-attempt login state. It lives with the caller's browser, never in
 * shared server memory owned by the flow controller.
 */
export interface FlowSession {
  phase: FlowPhase
  csrfToken?: string
  returnTo?: string
}

/**
 * Storage capability for flow sessions, keyed by the request.
 */
export interface FlowSessionStore {
  /** Drops whatever session the request carries and returns a fresh one */
  create: (c: Context) => Promise<FlowSession>
  load: (c: Context) => Promise<FlowSession | null>
  save: (c: Context, session: FlowSession) => Promise<void>
  destroy: (c: Context) => Promise<void>
}

export interface FlowSessionCookieOptions {
  cookieName: string
  /** Send the cookie over HTTPS only */
  secure: boolean
  maxAgeSeconds?: number
  /** Path of the service's base URL when it is mounted below the root */
  basePath?: string
}

/** A login attempt has this long to come back through the callback. */
export const FLOW_SESSION_TTL_SECONDS = 10 * 60

const FLOW_PHASES: readonly FlowPhase[] = [
  'idle',
  'awaiting_callback',
  'completed',
  'failed',
]

interface StoredFlowSession extends FlowSession {
  expiresAt: number
}

/** Scopes the flow cookie to the OAuth endpoints under the base path */
export const flowCookiePath = (basePath = '/'): string =>
  `${basePath.replace(/\/+$/, '')}/oauth`

const cookieOptions = (options: FlowSessionCookieOptions): CookieOptions => ({
  path: flowCookiePath(options.basePath),
  httpOnly: true,
  // Lax so the cookie rides along on the provider's top-level redirect back
  sameSite: 'Lax',
  secure: options.secure,
  maxAge: options.maxAgeSeconds ?? FLOW_SESSION_TTL_SECONDS,
})

const newSession = (): FlowSession => ({ phase: 'idle' })

const toStored = (
  session: FlowSession,
  options: FlowSessionCookieOptions,
): StoredFlowSession => ({
  ...session,
  expiresAt:
    Date.now() + (options.maxAgeSeconds ?? FLOW_SESSION_TTL_SECONDS) * 1000,
})

/**
 * Reads an untrusted stored value back into a session; anything malformed or
 * expired reads as no session.
 */
const fromStored = (value: unknown): FlowSession | null => {
  if (typeof value !== 'object' || value === null) {
    return null
  }
  const phase = 'phase' in value ? value.phase : undefined
  const csrfToken = 'csrfToken' in value ? value.csrfToken : undefined
  const returnTo = 'returnTo' in value ? value.returnTo : undefined
  const expiresAt = 'expiresAt' in value ? value.expiresAt : undefined

  const knownPhase = FLOW_PHASES.find((candidate) => candidate === phase)
  if (!knownPhase || typeof expiresAt !== 'number' || expiresAt <= Date.now()) {
    return null
  }
  if (csrfToken !== undefined && typeof csrfToken !== 'string') {
    return null
  }
  if (returnTo !== undefined && typeof returnTo !== 'string') {
    return null
  }
  return { phase: knownPhase, csrfToken, returnTo }
}

const parseStored = (raw: string): FlowSession | null => {
  try {
    return fromStored(JSON.parse(base64UrlDecode(raw).toString('utf8')))
  } catch {
    return null
  }
}

/**
 * Keeps the whole session in an HMAC-signed cookie. Nothing is held server
 * side, so any node can serve the callback.
 */
export const createCookieFlowSessionStore = (
  options: FlowSessionCookieOptions & { secret: string },
): FlowSessionStore => {
  const { cookieName, secret } = options
  const path = flowCookiePath(options.basePath)

  return {
    create: async (c) => {
      deleteCookie(c, cookieName, { path })
      return newSession()
    },

    load: async (c) => {
      const raw = await getSignedCookie(c, secret, cookieName)
      // false means the signature did not match
      if (!raw) {
        return null
      }
      return parseStored(raw)
    },

    save: async (c, session) => {
      const encoded = base64UrlEncode(
        Buffer.from(JSON.stringify(toStored(session, options)), 'utf8'),
      )
      await setSignedCookie(
        c,
        cookieName,
        encoded,
        secret,
        cookieOptions(options),
      )
    },

    destroy: async (c) => {
      deleteCookie(c, cookieName, { path })
    },
  }
}

/**
 * Holds sessions in process memory behind a random session id cookie. For
 * tests and single-node development.
 */
export const createMemoryFlowSessionStore = (
  options: FlowSessionCookieOptions,
): FlowSessionStore & { size: () => number } => {
  const { cookieName } = options
  const path = flowCookiePath(options.basePath)
  const sessions = new Map<string, StoredFlowSession>()

  const pruneExpired = (): void => {
    const now = Date.now()
    for (const [id, session] of sessions.entries()) {
      if (session.expiresAt <= now) {
        sessions.delete(id)
      }
    }
  }

  const dropCurrent = (c: Context): void => {
    const id = getCookie(c, cookieName)
    if (id) {
      sessions.delete(id)
    }
    deleteCookie(c, cookieName, { path })
  }

  return {
    create: async (c) => {
      dropCurrent(c)
      pruneExpired()
      return newSession()
    },

    load: async (c) => {
      const id = getCookie(c, cookieName)
      const stored = id ? sessions.get(id) : undefined
      return stored ? fromStored(stored) : null
    },

    save: async (c, session) => {
      // A new id on every save; the old one is never reused
      const previous = getCookie(c, cookieName)
      if (previous) {
        sessions.delete(previous)
      }
      const id = nanoid(32)
      sessions.set(id, toStored(session, options))
      setCookie(c, cookieName, id, cookieOptions(options))
    },

    destroy: async (c) => {
      dropCurrent(c)
    },

    size: () => sessions.size,
  }
}
