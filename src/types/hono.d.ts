import type { SessionClaims } from '../tokens/types/session-claims.ts'

declare module 'hono' {
  interface ContextVariableMap {
    sessionClaims?: SessionClaims
  }
}

export {}
