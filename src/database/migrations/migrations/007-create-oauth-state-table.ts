import type { Migration } from '../types.ts'

/**
 * Pending authorization attempts. Rows are written with a TTL matching
 * expires_at and removed on first use.
 */
export const migration: Migration = {
  version: '007',
  name: 'create_oauth_state_table',
  description: 'Create oauth_state table for single-use OAuth state tokens',
  up: async (client, { keyspace }) => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.oauth_state (
        state TEXT PRIMARY KEY,
        provider TEXT,
        return_to TEXT,
        expires_at TIMESTAMP,
        created_at TIMESTAMP
      )
    `)
  },
  down: async (client, { keyspace }) => {
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.oauth_state`)
  },
}
