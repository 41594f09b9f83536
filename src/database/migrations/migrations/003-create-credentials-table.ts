import type { Migration } from '../types.ts'

/**
 * One row per account, keyed by the normalized email so that
 * INSERT ... IF NOT EXISTS enforces uniqueness.
 */
export const migration: Migration = {
  version: '003',
  name: 'create_credentials_table',
  description: 'Create credentials table keyed by email',
  up: async (client, { keyspace }) => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.credentials (
        email TEXT PRIMARY KEY,
        id UUID,
        password_digest TEXT,
        password_salt TEXT,
        auth_provider TEXT,
        oauth_id TEXT,
        role TEXT,
        created_at TIMESTAMP,
        updated_at TIMESTAMP,
        last_login_at TIMESTAMP
      )
    `)
  },
  down: async (client, { keyspace }) => {
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.credentials`)
  },
}
