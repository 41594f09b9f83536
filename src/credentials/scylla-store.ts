import type { Client, types } from 'cassandra-driver'
import { AuthError } from '../auth/errors.ts'
import type { CredentialStore } from './store.ts'
import {
  type CredentialChange,
  type CredentialRecord,
  isAuthProvider,
  isRole,
  normalizeEmail,
  type OAuthProviderName,
} from './types/credential.ts'

const QUERY_OPTIONS = { prepare: true }

const CREDENTIAL_COLUMNS =
  'email, id, password_digest, password_salt, auth_provider, oauth_id, role, created_at, updated_at, last_login_at'

const corrupt = (email: unknown, detail: string): AuthError =>
  new AuthError(
    'CorruptRecord',
    `Credential row ${String(email)} is invalid: ${detail}`,
  )

const readText = (row: types.Row, column: string): string | null => {
  const value: unknown = row[column]
  return typeof value === 'string' && value.length > 0 ? value : null
}

const readDate = (row: types.Row, column: string): Date | undefined => {
  const value: unknown = row[column]
  return value instanceof Date ? value : undefined
}

/**
 * Map a credentials row to a record. Unknown provider or role values and rows
 * that break the password/provider invariant are rejected here instead of
 * travelling further as free text.
 */
export const rowToCredential = (row: types.Row): CredentialRecord => {
  const email = readText(row, 'email')
  if (!email) {
    throw corrupt(row.email, 'missing email')
  }

  const rawProvider = readText(row, 'auth_provider') ?? 'email'
  if (!isAuthProvider(rawProvider)) {
    throw corrupt(email, `unknown auth_provider "${rawProvider}"`)
  }

  const rawRole = readText(row, 'role') ?? 'user'
  if (!isRole(rawRole)) {
    throw corrupt(email, `unknown role "${rawRole}"`)
  }

  const createdAt = readDate(row, 'created_at') ?? new Date(0)
  const base = {
    id: String(row.id),
    email,
    role: rawRole,
    createdAt,
    updatedAt: readDate(row, 'updated_at') ?? createdAt,
    lastLoginAt: readDate(row, 'last_login_at'),
  }

  if (rawProvider === 'email') {
    const hash = readText(row, 'password_digest')
    const salt = readText(row, 'password_salt')
    if (!hash || !salt) {
      throw corrupt(email, 'email account without password')
    }
    return { ...base, authProvider: 'email', password: { hash, salt }, oauthId: null }
  }

  const oauthId = readText(row, 'oauth_id')
  if (!oauthId) {
    throw corrupt(email, `${rawProvider} account without oauth_id`)
  }
  return { ...base, authProvider: rawProvider, password: null, oauthId }
}

/**
 * Credential store on ScyllaDB. The credentials table is partitioned by email,
 * so INSERT ... IF NOT EXISTS enforces one record per email. Provider and id
 * lookups go through small denormalized index tables.
 */
export const createScyllaCredentialStore = (
  client: Client,
  keyspace: string,
  now: () => Date = () => new Date(),
): CredentialStore => {
  const findByEmail = async (email: string): Promise<CredentialRecord | null> => {
    const result = await client.execute(
      `SELECT ${CREDENTIAL_COLUMNS} FROM ${keyspace}.credentials WHERE email = ?`,
      [normalizeEmail(email)],
      QUERY_OPTIONS,
    )
    if (result.rows.length === 0) {
      return null
    }
    return rowToCredential(result.rows[0])
  }

  const indexProvider = async (
    provider: OAuthProviderName,
    oauthId: string,
    email: string,
  ): Promise<void> => {
    await client.execute(
      `INSERT INTO ${keyspace}.credentials_by_provider (auth_provider, oauth_id, email)
       VALUES (?, ?, ?)`,
      [provider, oauthId, email],
      QUERY_OPTIONS,
    )
  }

  const indexId = async (id: string, email: string): Promise<void> => {
    await client.execute(
      `INSERT INTO ${keyspace}.credentials_by_id (id, email) VALUES (?, ?)`,
      [id, email],
      QUERY_OPTIONS,
    )
  }

  const applyConditional = async (
    query: string,
    params: unknown[],
  ): Promise<boolean> => {
    const result = await client.execute(query, params, QUERY_OPTIONS)
    return result.wasApplied()
  }

  const runChange = async (
    email: string,
    change: CredentialChange,
  ): Promise<boolean> => {
    const at = now()
    switch (change.kind) {
      case 'link': {
        const applied = await applyConditional(
          `UPDATE ${keyspace}.credentials
           SET auth_provider = ?, oauth_id = ?, password_digest = null, password_salt = null, updated_at = ?
           WHERE email = ?
           IF auth_provider = 'email'`,
          [change.authProvider, change.oauthId, at, email],
        )
        if (applied) {
          await indexProvider(change.authProvider, change.oauthId, email)
        }
        return applied
      }
      case 'password':
        return applyConditional(
          `UPDATE ${keyspace}.credentials
           SET password_digest = ?, password_salt = ?, updated_at = ?
           WHERE email = ?
           IF auth_provider = 'email'`,
          [change.password.hash, change.password.salt, at, email],
        )
      case 'role':
        return applyConditional(
          `UPDATE ${keyspace}.credentials SET role = ?, updated_at = ?
           WHERE email = ? IF EXISTS`,
          [change.role, at, email],
        )
      case 'login':
        return applyConditional(
          `UPDATE ${keyspace}.credentials SET last_login_at = ?, updated_at = ?
           WHERE email = ? IF EXISTS`,
          [change.at, at, email],
        )
    }
  }

  return {
    findById: async (id) => {
      const result = await client.execute(
        `SELECT email FROM ${keyspace}.credentials_by_id WHERE id = ?`,
        [id],
        QUERY_OPTIONS,
      )
      const email = result.rows.length > 0 ? readText(result.rows[0], 'email') : null
      return email ? findByEmail(email) : null
    },

    findByIdentifier: findByEmail,
    findByEmail,

    findByProviderSubject: async (provider, oauthId) => {
      const result = await client.execute(
        `SELECT email FROM ${keyspace}.credentials_by_provider
         WHERE auth_provider = ? AND oauth_id = ?`,
        [provider, oauthId],
        QUERY_OPTIONS,
      )
      const email = result.rows.length > 0 ? readText(result.rows[0], 'email') : null
      if (!email) {
        return null
      }
      const record = await findByEmail(email)
      // Index rows can outlive a relink; trust only the primary row
      if (
        !record ||
        record.authProvider !== provider ||
        record.oauthId !== oauthId
      ) {
        return null
      }
      return record
    },

    insert: async (record) => {
      const email = normalizeEmail(record.email)
      const applied = await applyConditional(
        `INSERT INTO ${keyspace}.credentials (${CREDENTIAL_COLUMNS})
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         IF NOT EXISTS`,
        [
          email,
          record.id,
          record.password?.hash ?? null,
          record.password?.salt ?? null,
          record.authProvider,
          record.oauthId,
          record.role,
          record.createdAt,
          record.updatedAt,
          record.lastLoginAt ?? null,
        ],
      )
      if (!applied) {
        return false
      }

      await indexId(record.id, email)
      if (record.authProvider !== 'email') {
        await indexProvider(record.authProvider, record.oauthId, email)
      }
      return true
    },

    reindex: async (record) => {
      const email = normalizeEmail(record.email)
      await indexId(record.id, email)
      if (record.authProvider !== 'email') {
        await indexProvider(record.authProvider, record.oauthId, email)
      }
    },

    update: async (email, change) => {
      const normalized = normalizeEmail(email)
      const applied = await runChange(normalized, change)
      return applied ? findByEmail(normalized) : null
    },

    count: async () => {
      const result = await client.execute(
        `SELECT COUNT(*) AS total FROM ${keyspace}.credentials`,
      )
      const total: unknown = result.rows[0]?.total
      // COUNT comes back as a driver Long
      return total === undefined || total === null ? 0 : Number(total.toString())
    },
  }
}
