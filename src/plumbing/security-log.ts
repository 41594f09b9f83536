/**
 * Security and audit logging.
 * Logs authentication, linking and administrative events.
 * Never logs passwords, authorization codes, tokens or secrets.
 */

import type { AuthErrorCode } from '../auth/errors.ts'
import type {
  AuthProviderName,
  Role,
} from '../credentials/types/credential.ts'
import { log } from './logger.ts'

export interface AuthSuccessEvent {
  event: 'auth_success'
  user_id: string
  provider: AuthProviderName
}

export interface AuthFailureEvent {
  event: 'auth_failure'
  /** Absent when the callback state could not be matched to an attempt */
  provider?: AuthProviderName
  reason: AuthErrorCode
}

export interface AccountLinkedEvent {
  event: 'account_linked'
  user_id: string
  provider: AuthProviderName
}

export interface AccountCreatedEvent {
  event: 'account_created'
  user_id: string
  provider: AuthProviderName
}

export interface RoleChangedEvent {
  event: 'role_changed'
  user_id: string
  role: Role
}

export interface SessionEndedEvent {
  event: 'session_ended'
  user_id: string
}

export type SecurityEvent =
  | AuthSuccessEvent
  | AuthFailureEvent
  | AccountLinkedEvent
  | AccountCreatedEvent
  | RoleChangedEvent
  | SessionEndedEvent

export const logSecurityEvent = (event: SecurityEvent): void => {
  log({
    message: 'Security event',
    security_event: event,
  })
}
