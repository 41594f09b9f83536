import { hashPassword } from '../password.ts'
import type {
  EmailCredentialRecord,
  OAuthCredentialRecord,
  OAuthProviderName,
  Role,
} from '../types/credential.ts'

export const CREATED_AT = new Date('2026-01-01T00:00:00.000Z')

interface RecordOverrides {
  id?: string
  role?: Role
  lastLoginAt?: Date
}

export const makeEmailRecord = async (
  email: string,
  password: string,
  overrides: RecordOverrides = {},
): Promise<EmailCredentialRecord> => ({
  id: overrides.id ?? `id-${email}`,
  email,
  role: overrides.role ?? 'user',
  authProvider: 'email',
  password: await hashPassword(password),
  oauthId: null,
  createdAt: CREATED_AT,
  updatedAt: CREATED_AT,
  lastLoginAt: overrides.lastLoginAt,
})

export const makeOAuthRecord = (
  email: string,
  provider: OAuthProviderName,
  oauthId: string,
  overrides: RecordOverrides = {},
): OAuthCredentialRecord => ({
  id: overrides.id ?? `id-${email}`,
  email,
  role: overrides.role ?? 'user',
  authProvider: provider,
  password: null,
  oauthId,
  createdAt: CREATED_AT,
  updatedAt: CREATED_AT,
  lastLoginAt: overrides.lastLoginAt,
})
