export const GENDERS = ['male', 'female', 'other'] as const

export type Gender = (typeof GENDERS)[number]

export const MIN_AGE = 18
export const MAX_AGE = 120

export interface Profile {
  email: string
  name?: string
  age?: number
  gender?: Gender
  updatedAt: Date
}

export interface ProfileUpdateInput {
  name?: string
  age?: number
  gender?: Gender
}

export const isGender = (value: string): value is Gender =>
  GENDERS.some((gender) => gender === value)
