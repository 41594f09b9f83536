import { randomUUID } from 'node:crypto'
import { AuthError } from '../auth/errors.ts'
import { log } from '../plumbing/logger.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import type { ProfileStore } from '../profiles/store.ts'
import type { VerifiedIdentity } from '../providers/types/provider-user-info.ts'
import { verifyPasswordLogin } from './password-verifier.ts'
import type { CredentialStore } from './store.ts'
import {
  type AuthProviderName,
  type CredentialRecord,
  normalizeEmail,
  type OAuthCredentialRecord,
} from './types/credential.ts'

export interface PasswordAttempt {
  kind: 'password'
  identifier: string
  password: string
}

export interface OAuthAttempt {
  kind: 'oauth'
  identity: VerifiedIdentity
}

export type AuthAttempt = PasswordAttempt | OAuthAttempt

export interface AccountResolverOptions {
  credentials: CredentialStore
  profiles: ProfileStore
  now?: () => Date
  generateId?: () => string
}

export interface AccountResolver {
  resolve(attempt: AuthAttempt): Promise<CredentialRecord>
}

// A lost insert/link race is re-resolved this many times before giving up
const CONVERGENCE_RETRIES = 1

/**
 * Maps an authentication attempt to exactly one credential record, linking an
 * OAuth identity onto an existing email/password record with the same email
 * or creating a new record when nothing matches.
 */
export const createAccountResolver = (
  options: AccountResolverOptions,
): AccountResolver => {
  const {
    credentials,
    profiles,
    now = () => new Date(),
    generateId = randomUUID,
  } = options

  const createOAuthRecord = (
    identity: VerifiedIdentity,
  ): OAuthCredentialRecord => {
    const at = now()
    return {
      id: generateId(),
      email: normalizeEmail(identity.email),
      role: 'user',
      authProvider: identity.provider,
      oauthId: identity.subjectId,
      password: null,
      createdAt: at,
      updatedAt: at,
    }
  }

  const seedProfile = async (
    record: CredentialRecord,
    displayName: string | undefined,
  ): Promise<void> => {
    const name = displayName?.trim()
    await profiles.insert({
      email: record.email,
      name: name && name.length > 0 ? name : undefined,
      updatedAt: record.createdAt,
    })
  }

  const resolveOAuth = async (
    identity: VerifiedIdentity,
    retriesLeft: number,
  ): Promise<CredentialRecord> => {
    // Returning OAuth user
    const known = await credentials.findByProviderSubject(
      identity.provider,
      identity.subjectId,
    )
    if (known) {
      return known
    }

    const existing = await credentials.findByEmail(identity.email)
    if (existing) {
      if (
        existing.authProvider === identity.provider &&
        existing.oauthId === identity.subjectId
      ) {
        // Primary row is ours but the provider lookup missed it
        await credentials.reindex(existing)
        return existing
      }
      if (existing.authProvider !== 'email') {
        throw new AuthError(
          'ProviderConflict',
          existing.authProvider === identity.provider
            ? `Email is linked to a different ${identity.provider} account`
            : `Email is already linked to ${existing.authProvider}`,
        )
      }

      const linked = await credentials.update(existing.email, {
        kind: 'link',
        authProvider: identity.provider,
        oauthId: identity.subjectId,
      })
      if (linked) {
        logSecurityEvent({
          event: 'account_linked',
          user_id: linked.id,
          provider: identity.provider,
        })
        return linked
      }
    } else {
      const created = createOAuthRecord(identity)
      if (await credentials.insert(created)) {
        await seedProfile(created, identity.displayName)
        logSecurityEvent({
          event: 'account_created',
          user_id: created.id,
          provider: identity.provider,
        })
        return created
      }
    }

    // Another request created or relinked this email between our read and write
    if (retriesLeft > 0) {
      log({
        message: 'Credential write lost a race, resolving again',
        provider: identity.provider,
      })
      return resolveOAuth(identity, retriesLeft - 1)
    }
    throw new AuthError(
      'ProviderConflict',
      'Credential record changed concurrently during sign-in',
    )
  }

  const stampLogin = async (
    record: CredentialRecord,
  ): Promise<CredentialRecord> => {
    const updated = await credentials.update(record.email, {
      kind: 'login',
      at: now(),
    })
    return updated ?? record
  }

  return {
    resolve: async (attempt) => {
      const provider: AuthProviderName =
        attempt.kind === 'password' ? 'email' : attempt.identity.provider

      try {
        const record =
          attempt.kind === 'password'
            ? await verifyPasswordLogin(
                credentials,
                attempt.identifier,
                attempt.password,
              )
            : await resolveOAuth(attempt.identity, CONVERGENCE_RETRIES)

        const stamped = await stampLogin(record)
        logSecurityEvent({
          event: 'auth_success',
          user_id: stamped.id,
          provider,
        })
        return stamped
      } catch (error) {
        if (error instanceof AuthError) {
          logSecurityEvent({
            event: 'auth_failure',
            provider,
            reason: error.code,
          })
        }
        throw error
      }
    },
  }
}
