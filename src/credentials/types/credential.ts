import type { PasswordHash } from '../password.ts'

export const OAUTH_PROVIDERS = ['google', 'linkedin'] as const
export const AUTH_PROVIDERS = ['email', ...OAUTH_PROVIDERS] as const
export const ROLES = ['founder', 'user'] as const

export type OAuthProviderName = (typeof OAUTH_PROVIDERS)[number]
export type AuthProviderName = (typeof AUTH_PROVIDERS)[number]
export type Role = (typeof ROLES)[number]

export const isOAuthProvider = (value: string): value is OAuthProviderName =>
  OAUTH_PROVIDERS.some((provider) => provider === value)

export const isAuthProvider = (value: string): value is AuthProviderName =>
  AUTH_PROVIDERS.some((provider) => provider === value)

export const isRole = (value: string): value is Role =>
  ROLES.some((role) => role === value)

interface CredentialRecordBase {
  id: string // UUID, stable session subject
  email: string // trimmed, lower-cased
  role: Role
  createdAt: Date
  updatedAt: Date
  lastLoginAt?: Date
}

export interface EmailCredentialRecord extends CredentialRecordBase {
  authProvider: 'email'
  password: PasswordHash
  oauthId: null
}

export interface OAuthCredentialRecord extends CredentialRecordBase {
  authProvider: OAuthProviderName
  password: null
  oauthId: string
}

export type CredentialRecord = EmailCredentialRecord | OAuthCredentialRecord

/** Changes the store knows how to apply to an existing record. */
export type CredentialChange =
  | { kind: 'link'; authProvider: OAuthProviderName; oauthId: string }
  | { kind: 'role'; role: Role }
  | { kind: 'password'; password: PasswordHash }
  | { kind: 'login'; at: Date }

/** Record as exposed outside the service: no password material. */
export interface CredentialView {
  id: string
  email: string
  authProvider: AuthProviderName
  role: Role
  createdAt: string
  lastLoginAt?: string
}

export const toCredentialView = (record: CredentialRecord): CredentialView => ({
  id: record.id,
  email: record.email,
  authProvider: record.authProvider,
  role: record.role,
  createdAt: record.createdAt.toISOString(),
  lastLoginAt: record.lastLoginAt?.toISOString(),
})

/** Identifier policy: emails match case-insensitively, ignoring outer whitespace. */
export const normalizeEmail = (email: string): string =>
  email.trim().toLowerCase()

/**
 * Applies a change to a record in memory. Returns null when the change is not
 * allowed for the record's current provider.
 */
export const applyCredentialChange = (
  record: CredentialRecord,
  change: CredentialChange,
  now: Date,
): CredentialRecord | null => {
  switch (change.kind) {
    case 'link': {
      if (record.authProvider !== 'email') {
        return null
      }
      const linked: OAuthCredentialRecord = {
        id: record.id,
        email: record.email,
        role: record.role,
        createdAt: record.createdAt,
        lastLoginAt: record.lastLoginAt,
        updatedAt: now,
        authProvider: change.authProvider,
        oauthId: change.oauthId,
        password: null,
      }
      return linked
    }
    case 'password': {
      if (record.authProvider !== 'email') {
        return null
      }
      return { ...record, password: change.password, updatedAt: now }
    }
    case 'role':
      return { ...record, role: change.role, updatedAt: now }
    case 'login':
      return { ...record, lastLoginAt: change.at, updatedAt: now }
  }
}
