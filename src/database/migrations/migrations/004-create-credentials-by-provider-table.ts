import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '004',
  name: 'create_credentials_by_provider_table',
  description: 'Lookup from (auth_provider, oauth_id) to credential email',
  up: async (client, { keyspace }) => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.credentials_by_provider (
        auth_provider TEXT,
        oauth_id TEXT,
        email TEXT,
        PRIMARY KEY ((auth_provider, oauth_id))
      )
    `)
  },
  down: async (client, { keyspace }) => {
    await client.execute(
      `DROP TABLE IF EXISTS ${keyspace}.credentials_by_provider`,
    )
  },
}
