import type { Context } from 'hono'
import { errorMessage, log } from '../plumbing/logger.ts'
import { AuthError } from './errors.ts'

const RETURN_TO_BASE = 'http://return-to.invalid'

// Browsers drop tabs and newlines inside URLs
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/

/**
 * Only same-site absolute paths are accepted as post-login destinations.
 * The value is resolved the way a browser would; anything that lands on
 * another origin is dropped.
 */
export const sanitizeReturnTo = (
  value: string | undefined,
): string | undefined => {
  const trimmed = value?.trim()
  if (!trimmed || !trimmed.startsWith('/') || CONTROL_CHARACTERS.test(trimmed)) {
    return undefined
  }

  let resolved: URL
  try {
    resolved = new URL(trimmed, RETURN_TO_BASE)
  } catch {
    return undefined
  }
  if (resolved.origin !== RETURN_TO_BASE) {
    return undefined
  }
  return `${resolved.pathname}${resolved.search}${resolved.hash}`
}

/**
 * JSON error response for an API route. Unknown errors are logged and become
 * a 500 with the route's fallback message.
 */
export const jsonErrorResponse = (
  c: Context,
  error: unknown,
  fallbackMessage: string,
): Response => {
  if (error instanceof AuthError) {
    return c.json({ error: error.publicMessage, code: error.code }, error.status)
  }
  log({ message: fallbackMessage, error: errorMessage(error) })
  return c.json({ error: fallbackMessage }, 500)
}

export const readJsonBody = async (c: Context): Promise<unknown> => {
  try {
    return await c.req.json()
  } catch {
    throw new AuthError('InvalidInput', 'Request body must be valid JSON')
  }
}

/** Browser-facing failure: back to the login page with a short error code. */
export const loginErrorRedirect = (c: Context, error: unknown): Response => {
  if (error instanceof AuthError) {
    log({ message: 'OAuth sign-in rejected', code: error.code })
    return c.redirect(`/login?error=${encodeURIComponent(error.redirectParam)}`, 302)
  }
  log({ message: 'OAuth sign-in failed', error: errorMessage(error) })
  return c.redirect('/login?error=server_error', 302)
}
