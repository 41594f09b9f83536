import crypto from 'node:crypto'
import type { Context, Next } from 'hono'
import { deleteCookie, getCookie, setCookie } from 'hono/cookie'
import {
  type CredentialRecord,
  isRole,
  type Role,
} from '../credentials/types/credential.ts'
import { isHttps } from '../middleware/is-https.ts'

export const SESSION_COOKIE_NAME = 'mm_session'

export interface SessionPayload {
  sub: string // credential record id
  role: Role
  iat: number
  exp: number
}

export interface SessionOptions {
  secret: string
  maxAgeSeconds: number
  /** Seconds since the epoch. */
  now?: () => number
}

const nowSeconds = (): number => Math.floor(Date.now() / 1000)

const base64UrlEncode = (data: Buffer | string): string =>
  Buffer.from(data).toString('base64url')

const sign = (encodedPayload: string, secret: string): string =>
  crypto.createHmac('sha256', secret).update(encodedPayload).digest('base64url')

const parsePayload = (encoded: string): SessionPayload | null => {
  let data: unknown
  try {
    data = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'))
  } catch {
    return null
  }
  if (typeof data !== 'object' || data === null) {
    return null
  }
  const sub: unknown = Reflect.get(data, 'sub')
  const role: unknown = Reflect.get(data, 'role')
  const iat: unknown = Reflect.get(data, 'iat')
  const exp: unknown = Reflect.get(data, 'exp')
  if (
    typeof sub !== 'string' ||
    sub.length === 0 ||
    typeof role !== 'string' ||
    !isRole(role) ||
    typeof iat !== 'number' ||
    typeof exp !== 'number'
  ) {
    return null
  }
  return { sub, role, iat, exp }
}

export const createSessionToken = (
  record: Pick<CredentialRecord, 'id' | 'role'>,
  options: SessionOptions,
): string => {
  const iat = (options.now ?? nowSeconds)()
  const payload: SessionPayload = {
    sub: record.id,
    role: record.role,
    iat,
    exp: iat + options.maxAgeSeconds,
  }
  const encodedPayload = base64UrlEncode(JSON.stringify(payload))
  return `${encodedPayload}.${sign(encodedPayload, options.secret)}`
}

/**
 * Returns the payload of a well-formed, correctly signed, unexpired token and
 * null for anything else.
 */
export const verifySessionToken = (
  token: string,
  options: SessionOptions,
): SessionPayload | null => {
  const parts = token.split('.')
  if (parts.length !== 2) {
    return null
  }
  const [encodedPayload, signature] = parts

  const expected = Buffer.from(sign(encodedPayload, options.secret))
  const supplied = Buffer.from(signature)
  if (
    expected.length !== supplied.length ||
    !crypto.timingSafeEqual(expected, supplied)
  ) {
    return null
  }

  const payload = parsePayload(encodedPayload)
  if (!payload || payload.exp <= (options.now ?? nowSeconds)()) {
    return null
  }
  return payload
}

export const setSessionCookie = (
  c: Context,
  record: Pick<CredentialRecord, 'id' | 'role'>,
  options: SessionOptions,
): void => {
  setCookie(c, SESSION_COOKIE_NAME, createSessionToken(record, options), {
    path: '/',
    httpOnly: true,
    sameSite: 'Lax',
    secure: isHttps(c),
    maxAge: options.maxAgeSeconds,
  })
}

export const clearSessionCookie = (c: Context): void => {
  deleteCookie(c, SESSION_COOKIE_NAME, { path: '/' })
}

export const readSession = (
  c: Context,
  options: SessionOptions,
): SessionPayload | null => {
  const token = getCookie(c, SESSION_COOKIE_NAME)
  return token ? verifySessionToken(token, options) : null
}

/**
 * Hono middleware that rejects requests without a valid session cookie.
 * Downstream handlers read the payload with c.get('session').
 */
export const requireSession = (options: SessionOptions) => {
  return async (c: Context, next: Next): Promise<Response | undefined> => {
    const session = readSession(c, options)
    if (!session) {
      return c.json(
        { error: 'unauthorized', error_description: 'Sign in required' },
        401,
      )
    }
    c.set('session', session)
    await next()
    return undefined
  }
}
