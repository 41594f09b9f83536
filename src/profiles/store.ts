import { normalizeEmail } from '../credentials/types/credential.ts'
import type { Profile } from './types/profile.ts'

export interface ProfileStore {
  findByEmail(email: string): Promise<Profile | null>
  /** Returns false when a profile for the email already exists. */
  insert(profile: Profile): Promise<boolean>
  save(profile: Profile): Promise<Profile>
}

export const createInMemoryProfileStore = (
  seed: Profile[] = [],
): ProfileStore => {
  const profiles = new Map<string, Profile>(
    seed.map((profile) => [normalizeEmail(profile.email), profile]),
  )

  return {
    findByEmail: async (email) => profiles.get(normalizeEmail(email)) ?? null,
    insert: async (profile) => {
      const key = normalizeEmail(profile.email)
      if (profiles.has(key)) {
        return false
      }
      profiles.set(key, { ...profile, email: key })
      return true
    },
    save: async (profile) => {
      const stored = { ...profile, email: normalizeEmail(profile.email) }
      profiles.set(stored.email, stored)
      return stored
    },
  }
}
