import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '006',
  name: 'create_profiles_table',
  description: 'Create profiles table keyed by credential email',
  up: async (client, { keyspace }) => {
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.profiles (
        email TEXT PRIMARY KEY,
        name TEXT,
        age INT,
        gender TEXT,
        updated_at TIMESTAMP
      )
    `)
  },
  down: async (client, { keyspace }) => {
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.profiles`)
  },
}
