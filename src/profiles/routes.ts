import { Hono } from 'hono'
import { jsonErrorResponse, readJsonBody } from '../auth/auth-utils.ts'
import { requireSession, type SessionOptions } from '../auth/session.ts'
import type { CredentialStore } from '../credentials/store.ts'
import {
  isProfileComplete,
  landingPathFor,
  parseProfileUpdate,
} from './completion.ts'
import type { ProfileStore } from './store.ts'
import type { Gender, Profile } from './types/profile.ts'

export interface ProfileRouteDependencies {
  credentials: CredentialStore
  profiles: ProfileStore
  session: SessionOptions
  now: () => Date
}

interface ProfileView {
  email: string
  name: string | null
  age: number | null
  gender: Gender | null
  profileComplete: boolean
}

const toProfileView = (email: string, profile: Profile | null): ProfileView => ({
  email,
  name: profile?.name ?? null,
  age: profile?.age ?? null,
  gender: profile?.gender ?? null,
  profileComplete: isProfileComplete(profile),
})

export const createProfileRoutes = (deps: ProfileRouteDependencies): Hono => {
  const profile = new Hono()

  profile.use('*', requireSession(deps.session))

  const loadAccount = (sub: string) => deps.credentials.findById(sub)

  /**
   * GET /profile
   */
  profile.get('/', async (c) => {
    try {
      const record = await loadAccount(c.get('session').sub)
      if (!record) {
        return c.json({ error: 'unauthorized', error_description: 'Sign in required' }, 401)
      }
      const stored = await deps.profiles.findByEmail(record.email)
      return c.json(toProfileView(record.email, stored))
    } catch (error) {
      return jsonErrorResponse(c, error, 'Failed to load profile')
    }
  })

  /**
   * PUT /profile
   * Partial update; fields left out keep their current value.
   */
  profile.put('/', async (c) => {
    try {
      const record = await loadAccount(c.get('session').sub)
      if (!record) {
        return c.json({ error: 'unauthorized', error_description: 'Sign in required' }, 401)
      }

      const parsed = parseProfileUpdate(await readJsonBody(c))
      if (!parsed.ok) {
        return c.json({ error: 'Invalid profile', details: parsed.errors }, 400)
      }

      const existing = await deps.profiles.findByEmail(record.email)
      const saved = await deps.profiles.save({
        ...existing,
        ...parsed.value,
        email: record.email,
        updatedAt: deps.now(),
      })

      return c.json({
        ...toProfileView(record.email, saved),
        landingPath: landingPathFor(record, saved),
      })
    } catch (error) {
      return jsonErrorResponse(c, error, 'Failed to update profile')
    }
  })

  return profile
}
