/**
 * Security and audit logging for the login flow.
 * Never logs tokens, authorization codes, CSRF states, or secrets.
 */

import type { ProviderKind } from '../providers/types/provider.ts'
import { log } from './logger.ts'

export interface LoginStartedEvent {
  event: 'login_started'
  provider: ProviderKind
  provider_id: string
  has_return_target: boolean
}

export interface AuthSuccessEvent {
  event: 'auth_success'
  account_id: string
  provider: ProviderKind
  provider_id: string
}

export interface AuthFailureEvent {
  event: 'auth_failure'
  provider_id: string
  reason: string
}

export interface TokenIssuedEvent {
  event: 'token_issued'
  account_id: string
  role: string
  expires_at: number
}

export interface AccountLinkedEvent {
  event: 'account_linked'
  account_id: string
  provider: ProviderKind
}

export interface AccountCreatedEvent {
  event: 'account_created'
  account_id: string
  provider: ProviderKind
}

export type SecurityEvent =
  | LoginStartedEvent
  | AuthSuccessEvent
  | AuthFailureEvent
  | TokenIssuedEvent
  | AccountLinkedEvent
  | AccountCreatedEvent

export const logSecurityEvent = (event: SecurityEvent): void => {
  log({
    message: 'Security event',
    security_event: event,
  })
}
