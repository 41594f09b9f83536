import { AuthError } from '../auth/errors.ts'
import { log } from '../plumbing/logger.ts'
import { resetPassword, setRole } from './service.ts'
import type { CredentialStore } from './store.ts'
import { isRole, toCredentialView } from './types/credential.ts'

export const USAGE = [
  'Usage: admin <command> [args]',
  '  set-role <email> <founder|user>    - Change an account role',
  '  reset-password <email> <password>  - Set a new password on an email account',
].join('\n')

/**
 * Runs one admin command against the store. Returns the process exit code.
 */
export const runAdminCommand = async (
  store: CredentialStore,
  args: string[],
): Promise<number> => {
  const [command, email, value] = args

  if (!email || !value) {
    console.log(USAGE)
    return 1
  }

  try {
    switch (command) {
      case 'set-role': {
        if (!isRole(value)) {
          console.log(`Unknown role: ${value}`)
          return 1
        }
        const record = await setRole(store, email, value)
        log({ message: 'Role updated', account: toCredentialView(record) })
        return 0
      }
      case 'reset-password': {
        const record = await resetPassword(store, email, value)
        log({ message: 'Password reset', account: toCredentialView(record) })
        return 0
      }
      default:
        console.log(USAGE)
        return 1
    }
  } catch (error) {
    if (error instanceof AuthError) {
      log({ message: 'Admin command failed', code: error.code, error: error.message })
      return 1
    }
    throw error
  }
}
