import type { Context, Next } from 'hono'
import { isHttps } from './is-https.ts'

const SECURITY_HEADERS: Record<string, string> = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  // Responses may carry session cookies or account data
  'Cache-Control': 'no-store',
}

const HSTS_HEADER = 'max-age=31536000; includeSubDomains'

/**
 * Sets standard security headers on every response. HSTS only goes out over
 * HTTPS.
 */
export const securityHeaders = async (
  c: Context,
  next: Next,
): Promise<void> => {
  await next()

  for (const [name, value] of Object.entries(SECURITY_HEADERS)) {
    c.res.headers.set(name, value)
  }
  if (isHttps(c)) {
    c.res.headers.set('Strict-Transport-Security', HSTS_HEADER)
  }
}
