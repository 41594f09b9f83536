import type { Context } from 'hono'

/**
 * True when the request reached us over HTTPS, directly or through a proxy
 * that sets x-forwarded-proto.
 */
export const isHttps = (c: Context): boolean => {
  if (new URL(c.req.url).protocol === 'https:') {
    return true
  }
  const forwarded = c.req.header('x-forwarded-proto')
  return forwarded?.split(',')[0]?.trim().toLowerCase() === 'https'
}
