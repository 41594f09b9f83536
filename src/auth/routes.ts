import { Hono } from 'hono'
import type { AccountResolver } from '../credentials/resolver.ts'
import { isOAuthProvider } from '../credentials/types/credential.ts'
import { landingPathFor } from '../profiles/completion.ts'
import type { ProfileStore } from '../profiles/store.ts'
import { getEnabledProviders, type ProviderRegistry } from '../providers/registry.ts'
import {
  jsonErrorResponse,
  loginErrorRedirect,
  sanitizeReturnTo,
} from './auth-utils.ts'
import type { OAuthExchange } from './oauth-exchange.ts'
import { type SessionOptions, setSessionCookie } from './session.ts'

export interface AuthRouteDependencies {
  exchange: OAuthExchange
  resolver: AccountResolver
  profiles: ProfileStore
  providers: ProviderRegistry
  session: SessionOptions
}

export const createAuthRoutes = (deps: AuthRouteDependencies): Hono => {
  const auth = new Hono()

  /**
   * GET /auth/providers
   * Login options offered on the sign-in page.
   */
  auth.get('/providers', (c) =>
    c.json({ providers: getEnabledProviders(deps.providers) }),
  )

  /**
   * GET /auth/callback
   * Shared redirect URI for every provider; the pending state says which one
   * the attempt belongs to.
   */
  auth.get('/callback', async (c) => {
    try {
      const { identity, returnTo } = await deps.exchange.complete({
        code: c.req.query('code'),
        state: c.req.query('state'),
        error: c.req.query('error'),
      })
      const record = await deps.resolver.resolve({ kind: 'oauth', identity })
      setSessionCookie(c, record, deps.session)

      const landingPath = landingPathFor(
        record,
        await deps.profiles.findByEmail(record.email),
      )
      // Onboarding comes before any saved destination
      const destination =
        returnTo && landingPath !== '/profile/complete' ? returnTo : landingPath
      return c.redirect(destination, 302)
    } catch (error) {
      return loginErrorRedirect(c, error)
    }
  })

  /**
   * GET /auth/:provider
   * Start an authorization-code login and redirect to the provider.
   */
  auth.get('/:provider', async (c) => {
    const provider = c.req.param('provider')
    if (!isOAuthProvider(provider)) {
      return c.json({ error: 'Unknown sign-in provider' }, 404)
    }

    try {
      const { url } = await deps.exchange.begin(
        provider,
        sanitizeReturnTo(c.req.query('return_to')),
      )
      return c.redirect(url, 302)
    } catch (error) {
      return jsonErrorResponse(c, error, 'Could not start sign-in')
    }
  })

  return auth
}
