import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '005',
  name: 'create_credentials_by_id_table',
  description: 'Lookup from credential id (session subject) to email',
  up: async (client, { keyspace }) => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.credentials_by_id (
        id UUID PRIMARY KEY,
        email TEXT
      )
    `)
  },
  down: async (client, { keyspace }) => {
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.credentials_by_id`)
  },
}
