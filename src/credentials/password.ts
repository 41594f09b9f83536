import crypto, { timingSafeEqual } from 'node:crypto'
import { nanoid } from 'nanoid'

const KEY_LENGTH = 64

export const MIN_PASSWORD_LENGTH = 8

export interface PasswordHash {
  hash: string // hex
  salt: string
}

const derive = (password: string, salt: string): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    crypto.scrypt(password, salt, KEY_LENGTH, (err, derivedKey) => {
      if (err) {
        reject(err)
        return
      }
      resolve(derivedKey)
    })
  })

/**
 * Hash a password with scrypt and a fresh nanoid salt.
 */
export const hashPassword = async (password: string): Promise<PasswordHash> => {
  const salt = nanoid()
  const derivedKey = await derive(password, salt)
  return {
    hash: derivedKey.toString('hex'),
    salt,
  }
}

/**
 * Verify a password against a stored hash. Comparison is constant-time and
 * case-sensitive.
 */
export const verifyPassword = async (
  password: string,
  stored: PasswordHash,
): Promise<boolean> => {
  const derivedKey = await derive(password, stored.salt)
  const hashBuffer = Buffer.from(stored.hash, 'hex')

  // timingSafeEqual throws on length mismatch
  if (hashBuffer.length !== derivedKey.length) {
    return false
  }

  return timingSafeEqual(hashBuffer, derivedKey)
}

/**
 * Returns a reason the password is unacceptable, or null.
 */
export const checkPasswordPolicy = (password: string): string | null => {
  if (password.length < MIN_PASSWORD_LENGTH) {
    return `Password must be at least ${MIN_PASSWORD_LENGTH} characters`
  }
  return null
}
