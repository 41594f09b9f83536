import { getConnInfo } from '@hono/node-server/conninfo'
import type { Context, Next } from 'hono'
import { log } from '../plumbing/logger.ts'
import { parseNumber } from '../plumbing/parse-number.ts'

interface RateLimitRecord {
  count: number
  windowStart: number
}

export interface RateLimitOptions {
  windowMs: number
  maxRequests: number
  /** Keeps separately limited routes from sharing counters. */
  scope: string
  now: () => number
}

const DEFAULT_WINDOW_MS = 60_000
const DEFAULT_MAX_REQUESTS = 20
const DEFAULT_SCOPE = 'login'

const getClientIp = (c: Context): string => {
  const forwarded = c.req.header('x-forwarded-for')
  if (forwarded) {
    const first = forwarded.split(',')[0]?.trim()
    if (first) return first
  }
  try {
    const address = getConnInfo(c).remote.address
    if (address) return address
  } catch {
    // no Node server bindings under app.request()
  }
  return 'unknown'
}

/**
 * Fixed-window, per-IP request limit held in process memory. Window and limit
 * come from RATE_LIMIT_WINDOW_MS and RATE_LIMIT_MAX_REQUESTS unless given.
 */
export const rateLimit = (options: Partial<RateLimitOptions> = {}) => {
  const windowMs =
    options.windowMs ??
    parseNumber(process.env.RATE_LIMIT_WINDOW_MS, DEFAULT_WINDOW_MS)
  const maxRequests =
    options.maxRequests ??
    parseNumber(process.env.RATE_LIMIT_MAX_REQUESTS, DEFAULT_MAX_REQUESTS)
  const scope = options.scope ?? DEFAULT_SCOPE
  const now = options.now ?? Date.now

  const store = new Map<string, RateLimitRecord>()
  let lastPrune = now()

  const pruneExpired = (at: number): void => {
    if (at - lastPrune < windowMs) return
    lastPrune = at
    for (const [key, record] of store.entries()) {
      if (at - record.windowStart >= windowMs) {
        store.delete(key)
      }
    }
  }

  return async (c: Context, next: Next): Promise<Response | undefined> => {
    const at = now()
    pruneExpired(at)

    const identifier = getClientIp(c)
    const key = `${scope}:${identifier}`
    const record = store.get(key)

    if (!record || at - record.windowStart >= windowMs) {
      store.set(key, { count: 1, windowStart: at })
    } else {
      record.count++
      if (record.count > maxRequests) {
        log({ message: 'Rate limit exceeded', scope, ip: identifier })
        const retryAfter = Math.ceil((record.windowStart + windowMs - at) / 1000)
        return c.json(
          {
            error: 'rate_limit_exceeded',
            error_description: 'Too many requests. Please try again later.',
          },
          429,
          { 'Retry-After': String(Math.max(1, retryAfter)) },
        )
      }
    }

    await next()
    return undefined
  }
}
