import type { CredentialRecord } from '../credentials/types/credential.ts'
import {
  isGender,
  MAX_AGE,
  MIN_AGE,
  type Profile,
  type ProfileUpdateInput,
} from './types/profile.ts'

export type LandingPath = '/founder' | '/profile/complete' | '/matches'

/**
 * A profile is complete once name, age and gender are all filled in.
 * Derived on every call; never stored.
 */
export const isProfileComplete = (profile: Profile | null): boolean => {
  if (!profile) {
    return false
  }
  const hasName = (profile.name?.trim().length ?? 0) > 0
  const hasAge =
    profile.age !== undefined && Number.isInteger(profile.age) && profile.age > 0
  return hasName && hasAge && profile.gender !== undefined
}

/**
 * Where a signed-in user lands. Founders skip the onboarding gate; everyone
 * else completes their profile before reaching matches.
 */
export const landingPathFor = (
  record: CredentialRecord,
  profile: Profile | null,
): LandingPath => {
  if (record.role === 'founder') {
    return '/founder'
  }
  return isProfileComplete(profile) ? '/matches' : '/profile/complete'
}

/**
 * Validate an untrusted profile update body. Returns the cleaned input or a
 * list of problems.
 */
export const parseProfileUpdate = (
  body: unknown,
):
  | { ok: true; value: ProfileUpdateInput }
  | { ok: false; errors: string[] } => {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return { ok: false, errors: ['Body must be a JSON object'] }
  }

  const errors: string[] = []
  const value: ProfileUpdateInput = {}
  const name: unknown = Reflect.get(body, 'name')
  const age: unknown = Reflect.get(body, 'age')
  const gender: unknown = Reflect.get(body, 'gender')

  if (name !== undefined) {
    if (typeof name !== 'string' || name.trim().length === 0) {
      errors.push('name must be a non-empty string')
    } else {
      value.name = name.trim()
    }
  }

  if (age !== undefined) {
    if (
      typeof age !== 'number' ||
      !Number.isInteger(age) ||
      age < MIN_AGE ||
      age > MAX_AGE
    ) {
      errors.push(`age must be an integer between ${MIN_AGE} and ${MAX_AGE}`)
    } else {
      value.age = age
    }
  }

  if (gender !== undefined) {
    if (typeof gender !== 'string' || !isGender(gender)) {
      errors.push('gender must be one of male, female, other')
    } else {
      value.gender = gender
    }
  }

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value }
}
