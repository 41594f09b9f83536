import type { CredentialStore } from './store.ts'
import {
  applyCredentialChange,
  type CredentialChange,
  type CredentialRecord,
  normalizeEmail,
  type OAuthProviderName,
} from './types/credential.ts'

const providerKey = (provider: OAuthProviderName, oauthId: string): string =>
  `${provider}:${oauthId}`

/**
 * Process-local credential store. Each operation completes synchronously on
 * the event loop, so insert-if-absent and conditional updates are atomic.
 * Used by tests and by local development when ScyllaDB is disabled.
 */
export const createInMemoryCredentialStore = (
  seed: CredentialRecord[] = [],
  now: () => Date = () => new Date(),
): CredentialStore => {
  const byEmail = new Map<string, CredentialRecord>()
  const byProvider = new Map<string, string>()
  const byId = new Map<string, string>()

  const put = (record: CredentialRecord): void => {
    byEmail.set(record.email, record)
    byId.set(record.id, record.email)
    if (record.authProvider !== 'email') {
      byProvider.set(providerKey(record.authProvider, record.oauthId), record.email)
    }
  }

  for (const record of seed) {
    put({ ...record, email: normalizeEmail(record.email) })
  }

  const findByEmail = async (email: string) =>
    byEmail.get(normalizeEmail(email)) ?? null

  return {
    findById: async (id) => {
      const email = byId.get(id)
      return email ? (byEmail.get(email) ?? null) : null
    },
    findByIdentifier: findByEmail,
    findByEmail,
    findByProviderSubject: async (provider, oauthId) => {
      const email = byProvider.get(providerKey(provider, oauthId))
      return email ? (byEmail.get(email) ?? null) : null
    },
    insert: async (record) => {
      const email = normalizeEmail(record.email)
      if (byEmail.has(email)) {
        return false
      }
      put({ ...record, email })
      return true
    },
    update: async (email: string, change: CredentialChange) => {
      const existing = byEmail.get(normalizeEmail(email))
      if (!existing) {
        return null
      }
      const updated = applyCredentialChange(existing, change, now())
      if (!updated) {
        return null
      }
      put(updated)
      return updated
    },
    reindex: async (record) => {
      put({ ...record, email: normalizeEmail(record.email) })
    },
    count: async () => byEmail.size,
  }
}
