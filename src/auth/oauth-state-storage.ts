import type { Client } from 'cassandra-driver'
import {
  isOAuthProvider,
  type OAuthProviderName,
} from '../credentials/types/credential.ts'

export interface PendingOAuthState {
  state: string
  provider: OAuthProviderName
  returnTo?: string
  expiresAt: Date
}

/**
 * Pending authorization attempts keyed by their state token. consume() must
 * hand a given token to at most one caller, and never after it expires.
 */
export interface OAuthStateStore {
  save(pending: PendingOAuthState): Promise<void>
  consume(state: string): Promise<PendingOAuthState | null>
}

export const createInMemoryOAuthStateStore = (
  now: () => number = Date.now,
): OAuthStateStore => {
  const pending = new Map<string, PendingOAuthState>()

  const pruneExpired = (): void => {
    const cutoff = now()
    for (const [key, value] of pending.entries()) {
      if (value.expiresAt.getTime() <= cutoff) {
        pending.delete(key)
      }
    }
  }

  return {
    save: async (entry) => {
      pruneExpired()
      pending.set(entry.state, entry)
    },
    consume: async (state) => {
      // get + delete with no await between them: one winner per token
      const entry = pending.get(state)
      pending.delete(state)
      pruneExpired()
      if (!entry || entry.expiresAt.getTime() <= now()) {
        return null
      }
      return entry
    },
  }
}

const QUERY_OPTIONS = { prepare: true }

/**
 * ScyllaDB-backed store for deployments with more than one instance. Rows carry
 * a TTL; the conditional delete makes consumption single-winner.
 */
export const createScyllaOAuthStateStore = (
  client: Client,
  keyspace: string,
  now: () => number = Date.now,
): OAuthStateStore => ({
  save: async (entry) => {
    const createdAt = new Date(now())
    const ttlSeconds = Math.max(
      1,
      Math.ceil((entry.expiresAt.getTime() - createdAt.getTime()) / 1000),
    )
    await client.execute(
      `INSERT INTO ${keyspace}.oauth_state
       (state, provider, return_to, expires_at, created_at)
       VALUES (?, ?, ?, ?, ?)
       USING TTL ${ttlSeconds}`,
      [
        entry.state,
        entry.provider,
        entry.returnTo ?? null,
        entry.expiresAt,
        createdAt,
      ],
      QUERY_OPTIONS,
    )
  },

  consume: async (state) => {
    const selectResult = await client.execute(
      `SELECT provider, return_to, expires_at FROM ${keyspace}.oauth_state WHERE state = ?`,
      [state],
      QUERY_OPTIONS,
    )
    if (selectResult.rows.length === 0) {
      return null
    }

    const row = selectResult.rows[0]
    const provider: unknown = row.provider
    const returnTo: unknown = row.return_to
    const expiresAt: unknown = row.expires_at

    if (
      !(expiresAt instanceof Date) ||
      expiresAt.getTime() <= now() ||
      typeof provider !== 'string' ||
      !isOAuthProvider(provider)
    ) {
      await client.execute(
        `DELETE FROM ${keyspace}.oauth_state WHERE state = ?`,
        [state],
        QUERY_OPTIONS,
      )
      return null
    }

    const deleteResult = await client.execute(
      `DELETE FROM ${keyspace}.oauth_state WHERE state = ? IF EXISTS`,
      [state],
      QUERY_OPTIONS,
    )
    if (!deleteResult.wasApplied()) {
      return null
    }

    return {
      state,
      provider,
      returnTo:
        typeof returnTo === 'string' && returnTo.length > 0 ? returnTo : undefined,
      expiresAt,
    }
  },
})
