import type { Client, types } from 'cassandra-driver'
import { normalizeEmail } from '../credentials/types/credential.ts'
import type { ProfileStore } from './store.ts'
import { isGender, type Profile } from './types/profile.ts'

const QUERY_OPTIONS = { prepare: true }

export const rowToProfile = (row: types.Row): Profile => {
  const name: unknown = row.name
  const age: unknown = row.age
  const gender: unknown = row.gender
  const updatedAt: unknown = row.updated_at

  return {
    email: String(row.email),
    name: typeof name === 'string' && name.length > 0 ? name : undefined,
    age: typeof age === 'number' ? age : undefined,
    gender: typeof gender === 'string' && isGender(gender) ? gender : undefined,
    updatedAt: updatedAt instanceof Date ? updatedAt : new Date(0),
  }
}

export const createScyllaProfileStore = (
  client: Client,
  keyspace: string,
): ProfileStore => {
  const write = async (profile: Profile, ifNotExists: boolean) => {
    const result = await client.execute(
      `INSERT INTO ${keyspace}.profiles (email, name, age, gender, updated_at)
       VALUES (?, ?, ?, ?, ?)${ifNotExists ? ' IF NOT EXISTS' : ''}`,
      [
        normalizeEmail(profile.email),
        profile.name ?? null,
        profile.age ?? null,
        profile.gender ?? null,
        profile.updatedAt,
      ],
      QUERY_OPTIONS,
    )
    return result
  }

  return {
    findByEmail: async (email) => {
      const result = await client.execute(
        `SELECT email, name, age, gender, updated_at FROM ${keyspace}.profiles WHERE email = ?`,
        [normalizeEmail(email)],
        QUERY_OPTIONS,
      )
      return result.rows.length > 0 ? rowToProfile(result.rows[0]) : null
    },
    insert: async (profile) => {
      const result = await write(profile, true)
      return result.wasApplied()
    },
    save: async (profile) => {
      await write(profile, false)
      return { ...profile, email: normalizeEmail(profile.email) }
    },
  }
}
