import { Hono } from 'hono'
import info from '../package.json' with { type: 'json' }
import type { AuthConfig } from './auth/config.ts'
import { createOAuthExchange } from './auth/oauth-exchange.ts'
import type { OAuthStateStore } from './auth/oauth-state-storage.ts'
import { createAuthRoutes } from './auth/routes.ts'
import type { SessionOptions } from './auth/session.ts'
import { createAccountResolver } from './credentials/resolver.ts'
import type { CredentialStore } from './credentials/store.ts'
import type { DatabaseHealthStatus } from './database/health.ts'
import { rateLimit, type RateLimitOptions } from './middleware/rate-limit.ts'
import { securityHeaders } from './middleware/security-headers.ts'
import { createProfileRoutes } from './profiles/routes.ts'
import type { ProfileStore } from './profiles/store.ts'
import { defaultProviders, type ProviderRegistry } from './providers/registry.ts'
import { createUserRoutes } from './users/routes.ts'

const { name, version } = info

export interface AppDependencies {
  credentials: CredentialStore
  profiles: ProfileStore
  oauthStates: OAuthStateStore
  config: AuthConfig
  checkHealth: () => Promise<DatabaseHealthStatus>
  providers?: ProviderRegistry
  now?: () => Date
  generateState?: () => string
  loginRateLimit?: Partial<RateLimitOptions>
}

export const createApp = (deps: AppDependencies): Hono => {
  const now = deps.now ?? (() => new Date())
  const providers = deps.providers ?? defaultProviders
  const session: SessionOptions = {
    secret: deps.config.sessionSecret,
    maxAgeSeconds: deps.config.sessionMaxAgeSeconds,
    now: () => Math.floor(now().getTime() / 1000),
  }

  const resolver = createAccountResolver({
    credentials: deps.credentials,
    profiles: deps.profiles,
    now,
  })
  const exchange = createOAuthExchange({
    stateStore: deps.oauthStates,
    providers,
    redirectUri: deps.config.redirectUri,
    stateTtlMs: deps.config.stateTtlMs,
    providerTimeoutMs: deps.config.providerTimeoutMs,
    now: () => now().getTime(),
    generateState: deps.generateState,
  })

  const app = new Hono()

  app.use('*', securityHeaders)
  app.use('/users/login', rateLimit(deps.loginRateLimit))

  app.get('/about', (c) => c.json({ name, version }))

  app.get('/health', async (c) => {
    const health = await deps.checkHealth()
    return c.json(health, health.isHealthy ? 200 : 503)
  })

  app.route(
    '/auth',
    createAuthRoutes({
      exchange,
      resolver,
      profiles: deps.profiles,
      providers,
      session,
    }),
  )
  app.route(
    '/users',
    createUserRoutes({
      credentials: deps.credentials,
      profiles: deps.profiles,
      resolver,
      session,
      now,
    }),
  )
  app.route(
    '/profile',
    createProfileRoutes({
      credentials: deps.credentials,
      profiles: deps.profiles,
      session,
      now,
    }),
  )

  return app
}
