import { Hono } from 'hono'
import {
  jsonErrorResponse,
  readJsonBody,
} from '../auth/auth-utils.ts'
import {
  clearSessionCookie,
  readSession,
  requireSession,
  type SessionOptions,
  setSessionCookie,
} from '../auth/session.ts'
import type { AccountResolver } from '../credentials/resolver.ts'
import {
  parseCredentialsBody,
  registerWithPassword,
} from '../credentials/service.ts'
import type { CredentialStore } from '../credentials/store.ts'
import { toCredentialView } from '../credentials/types/credential.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import { isProfileComplete, landingPathFor } from '../profiles/completion.ts'
import type { ProfileStore } from '../profiles/store.ts'

export interface UserRouteDependencies {
  credentials: CredentialStore
  profiles: ProfileStore
  resolver: AccountResolver
  session: SessionOptions
  now: () => Date
}

export const createUserRoutes = (deps: UserRouteDependencies): Hono => {
  const users = new Hono()

  /**
   * POST /users/register
   * Create an email/password account
   */
  users.post('/register', async (c) => {
    try {
      const input = parseCredentialsBody(await readJsonBody(c))
      const record = await registerWithPassword(deps.credentials, input, deps.now)
      return c.json(toCredentialView(record), 201)
    } catch (error) {
      return jsonErrorResponse(c, error, 'Registration failed')
    }
  })

  /**
   * POST /users/login
   * Email/password sign-in. Sets the session cookie.
   */
  users.post('/login', async (c) => {
    try {
      const { email, password } = parseCredentialsBody(await readJsonBody(c))
      const record = await deps.resolver.resolve({
        kind: 'password',
        identifier: email,
        password,
      })
      setSessionCookie(c, record, deps.session)

      const profile = await deps.profiles.findByEmail(record.email)
      return c.json({
        ...toCredentialView(record),
        landingPath: landingPathFor(record, profile),
      })
    } catch (error) {
      return jsonErrorResponse(c, error, 'Authentication failed')
    }
  })

  /**
   * POST /users/logout
   */
  users.post('/logout', (c) => {
    const session = readSession(c, deps.session)
    if (session) {
      logSecurityEvent({ event: 'session_ended', user_id: session.sub })
    }
    clearSessionCookie(c)
    return c.body(null, 204)
  })

  /**
   * GET /users/me
   * The signed-in account and where it should land.
   */
  users.get('/me', requireSession(deps.session), async (c) => {
    try {
      const record = await deps.credentials.findById(c.get('session').sub)
      if (!record) {
        clearSessionCookie(c)
        return c.json({ error: 'unauthorized', error_description: 'Sign in required' }, 401)
      }

      const profile = await deps.profiles.findByEmail(record.email)
      return c.json({
        ...toCredentialView(record),
        profileComplete: isProfileComplete(profile),
        landingPath: landingPathFor(record, profile),
      })
    } catch (error) {
      return jsonErrorResponse(c, error, 'Failed to load account')
    }
  })

  return users
}
