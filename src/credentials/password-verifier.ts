import { AuthError } from '../auth/errors.ts'
import { verifyPassword } from './password.ts'
import type { CredentialStore } from './store.ts'
import type { EmailCredentialRecord } from './types/credential.ts'

/**
 * Check an identifier/password pair against the store. Read-only.
 * The identifier matches case-insensitively; the password does not.
 */
export const verifyPasswordLogin = async (
  store: CredentialStore,
  identifier: string,
  suppliedPassword: string,
): Promise<EmailCredentialRecord> => {
  const record = await store.findByIdentifier(identifier)
  if (!record) {
    throw new AuthError('NotFound', 'No credential record for identifier')
  }

  // OAuth-only accounts never accept a password
  if (record.authProvider !== 'email') {
    throw new AuthError(
      'ProviderMismatch',
      `Account signs in with ${record.authProvider}`,
    )
  }

  const isValid = await verifyPassword(suppliedPassword, record.password)
  if (!isValid) {
    throw new AuthError('InvalidPassword', 'Password does not match')
  }

  return record
}
