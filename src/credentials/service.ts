import { randomUUID } from 'node:crypto'
import { AuthError } from '../auth/errors.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import { checkPasswordPolicy, hashPassword } from './password.ts'
import type { CredentialStore } from './store.ts'
import {
  type CredentialRecord,
  type EmailCredentialRecord,
  normalizeEmail,
  type Role,
} from './types/credential.ts'

export interface RegistrationInput {
  email: string
  password: string
}

const isValidEmail = (email: string): boolean => {
  const emailRegex = /^[^\s@]+@[^\s@]+\.[^\s@]+$/
  return emailRegex.test(email)
}

/**
 * Parse an untrusted JSON body into email/password credentials.
 */
export const parseCredentialsBody = (body: unknown): RegistrationInput => {
  if (typeof body !== 'object' || body === null) {
    throw new AuthError('InvalidInput', 'Email and password are required')
  }
  const email: unknown = Reflect.get(body, 'email')
  const password: unknown = Reflect.get(body, 'password')
  if (typeof email !== 'string' || email.trim() === '') {
    throw new AuthError('InvalidInput', 'Email is required')
  }
  if (typeof password !== 'string' || password === '') {
    throw new AuthError('InvalidInput', 'Password is required')
  }
  return { email, password }
}

/**
 * Create an email/password account with role user.
 */
export const registerWithPassword = async (
  store: CredentialStore,
  input: RegistrationInput,
  now: () => Date = () => new Date(),
): Promise<EmailCredentialRecord> => {
  const email = normalizeEmail(input.email)
  if (!isValidEmail(email)) {
    throw new AuthError('InvalidInput', 'Invalid email address')
  }

  const policyError = checkPasswordPolicy(input.password)
  if (policyError) {
    throw new AuthError('InvalidInput', policyError)
  }

  if (await store.findByEmail(email)) {
    throw new AuthError('EmailTaken', 'User already exists with this email')
  }

  const at = now()
  const record: EmailCredentialRecord = {
    id: randomUUID(),
    email,
    role: 'user',
    authProvider: 'email',
    password: await hashPassword(input.password),
    oauthId: null,
    createdAt: at,
    updatedAt: at,
  }

  // The store's uniqueness check wins over the read above under a race
  if (!(await store.insert(record))) {
    throw new AuthError('EmailTaken', 'User already exists with this email')
  }

  logSecurityEvent({
    event: 'account_created',
    user_id: record.id,
    provider: 'email',
  })
  return record
}

/**
 * Administrative role change. The only way a role ever changes.
 */
export const setRole = async (
  store: CredentialStore,
  email: string,
  role: Role,
): Promise<CredentialRecord> => {
  const updated = await store.update(email, { kind: 'role', role })
  if (!updated) {
    throw new AuthError('NotFound', 'No account with this email')
  }
  logSecurityEvent({ event: 'role_changed', user_id: updated.id, role })
  return updated
}

/**
 * Administrative password reset for an email/password account.
 */
export const resetPassword = async (
  store: CredentialStore,
  email: string,
  newPassword: string,
): Promise<CredentialRecord> => {
  const policyError = checkPasswordPolicy(newPassword)
  if (policyError) {
    throw new AuthError('InvalidInput', policyError)
  }

  const existing = await store.findByEmail(email)
  if (!existing) {
    throw new AuthError('NotFound', 'No account with this email')
  }
  if (existing.authProvider !== 'email') {
    throw new AuthError(
      'ProviderMismatch',
      `Account signs in with ${existing.authProvider} and has no password`,
    )
  }

  const updated = await store.update(email, {
    kind: 'password',
    password: await hashPassword(newPassword),
  })
  if (!updated) {
    throw new AuthError(
      'ProviderMismatch',
      'Account was linked to an OAuth provider during the reset',
    )
  }
  return updated
}
