import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createApp } from '../../src/app.ts'
import type { AuthConfig } from '../../src/auth/config.ts'
import { createInMemoryOAuthStateStore } from '../../src/auth/oauth-state-storage.ts'
import { createInMemoryCredentialStore } from '../../src/credentials/memory-store.ts'
import type { CredentialStore } from '../../src/credentials/store.ts'
import type { OAuthProviderName } from '../../src/credentials/types/credential.ts'
import { createInMemoryProfileStore } from '../../src/profiles/store.ts'
import type { ProfileStore } from '../../src/profiles/store.ts'
import type { ProviderRegistry } from '../../src/providers/registry.ts'

const NOW = new Date('2026-05-01T12:00:00.000Z')

const config: AuthConfig = {
  publicBaseUrl: 'http://localhost:3000',
  redirectUri: 'http://localhost:3000/auth/callback',
  stateTtlMs: 600_000,
  providerTimeoutMs: 5_000,
  sessionSecret: 'test-secret',
  sessionMaxAgeSeconds: 3_600,
}

const fakeProvider = (name: OAuthProviderName, configured = true) => ({
  name,
  isConfigured: () => configured,
  getAuthorizationUrl: (_redirectUri: string, state: string) =>
    `https://${name}.test/authorize?state=${state}`,
  exchangeCode: vi.fn(async () => `${name}-access`),
  fetchUserInfo: vi.fn(async () => ({
    sub: `${name}-subject`,
    email: 'Oauth.User@Example.com',
    emailVerified: true,
    name: 'OAuth User',
  })),
})

const sessionCookie = (res: Response): string => {
  const header = res.headers.get('set-cookie') ?? ''
  return header.split(';')[0]
}

const json = (body: unknown, cookie?: string): RequestInit => ({
  method: 'POST',
  headers: {
    'Content-Type': 'application/json',
    ...(cookie ? { Cookie: cookie } : {}),
  },
  body: JSON.stringify(body),
})

describe('Matchmaking auth service', () => {
  let credentials: CredentialStore
  let profiles: ProfileStore
  let providers: ProviderRegistry
  let app: ReturnType<typeof createApp>
  let healthy = true

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined)
    credentials = createInMemoryCredentialStore()
    profiles = createInMemoryProfileStore()
    providers = { google: fakeProvider('google'), linkedin: fakeProvider('linkedin', false) }
    healthy = true
    let stateCounter = 0
    app = createApp({
      credentials,
      profiles,
      oauthStates: createInMemoryOAuthStateStore(() => NOW.getTime()),
      config,
      checkHealth: async () =>
        healthy
          ? { isHealthy: true, message: 'Database connection is healthy' }
          : { isHealthy: false, message: 'Database schema is not migrated' },
      providers,
      now: () => NOW,
      generateState: () => `state-${++stateCounter}`,
      loginRateLimit: { maxRequests: 3, windowMs: 60_000, now: () => NOW.getTime() },
    })
  })

  describe('service endpoints', () => {
    it('should describe itself', async () => {
      const res = await app.request('/about')

      expect(await res.json()).toEqual({ name: 'matchmaking-auth', version: '0.1.0' })
      expect(res.headers.get('X-Frame-Options')).toBe('DENY')
    })

    it('should report health with the matching status code', async () => {
      expect((await app.request('/health')).status).toBe(200)

      healthy = false
      const res = await app.request('/health')

      expect(res.status).toBe(503)
      expect(await res.json()).toEqual({
        isHealthy: false,
        message: 'Database schema is not migrated',
      })
    })
  })

  describe('email and password', () => {
    const register = () =>
      app.request('/users/register', json({ email: 'Ada@Example.com', password: 'long-enough-1' }))

    it('should register, sign in and land on profile completion', async () => {
      const registered = await register()
      expect(registered.status).toBe(201)
      expect(await registered.json()).toMatchObject({
        email: 'ada@example.com',
        authProvider: 'email',
        role: 'user',
        createdAt: NOW.toISOString(),
      })

      const login = await app.request(
        '/users/login',
        json({ email: 'ada@example.com', password: 'long-enough-1' }),
      )
      expect(login.status).toBe(200)
      expect(await login.json()).toMatchObject({
        email: 'ada@example.com',
        landingPath: '/profile/complete',
        lastLoginAt: NOW.toISOString(),
      })
      const setCookie = login.headers.get('set-cookie')
      expect(setCookie).toContain('mm_session=')
      expect(setCookie).toContain('HttpOnly')
      expect(setCookie).toContain('SameSite=Lax')
      expect(setCookie).not.toContain('Secure')

      const cookie = sessionCookie(login)
      const me = await app.request('/users/me', { headers: { Cookie: cookie } })
      expect(await me.json()).toMatchObject({
        email: 'ada@example.com',
        profileComplete: false,
        landingPath: '/profile/complete',
      })

      const update = await app.request('/profile', {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json', Cookie: cookie },
        body: JSON.stringify({ name: 'Ada', age: 36, gender: 'female' }),
      })
      expect(update.status).toBe(200)
      expect(await update.json()).toEqual({
        email: 'ada@example.com',
        name: 'Ada',
        age: 36,
        gender: 'female',
        profileComplete: true,
        landingPath: '/matches',
      })

      const profile = await app.request('/profile', { headers: { Cookie: cookie } })
      expect(await profile.json()).toMatchObject({ profileComplete: true })
    })

    it('should refuse a duplicate registration', async () => {
      await register()

      const res = await register()

      expect(res.status).toBe(409)
      expect(await res.json()).toEqual({
        error: 'Email already registered. Please sign in.',
        code: 'EmailTaken',
      })
    })

    it('should show input problems on registration', async () => {
      const res = await app.request(
        '/users/register',
        json({ email: 'not-an-email', password: 'long-enough-1' }),
      )

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({ error: 'Invalid email address', code: 'InvalidInput' })
    })

    it('should answer unknown accounts and wrong passwords alike', async () => {
      await register()

      const wrong = await app.request(
        '/users/login',
        json({ email: 'ada@example.com', password: 'wrong-password' }),
      )
      const unknown = await app.request(
        '/users/login',
        json({ email: 'nobody@example.com', password: 'wrong-password' }),
      )

      expect(wrong.status).toBe(401)
      expect(unknown.status).toBe(401)
      expect(await wrong.json()).toEqual({
        error: 'Invalid email or password',
        code: 'InvalidPassword',
      })
      expect(await unknown.json()).toMatchObject({ error: 'Invalid email or password' })
    })

    it('should rate limit repeated login attempts', async () => {
      const attempt = () =>
        app.request('/users/login', {
          ...json({ email: 'nobody@example.com', password: 'wrong-password' }),
          headers: { 'Content-Type': 'application/json', 'x-forwarded-for': '10.1.1.1' },
        })
      await attempt()
      await attempt()
      await attempt()

      const res = await attempt()

      expect(res.status).toBe(429)
      expect(res.headers.get('Retry-After')).toBe('60')
    })

    it('should require a session for account and profile routes', async () => {
      expect((await app.request('/users/me')).status).toBe(401)
      expect((await app.request('/profile')).status).toBe(401)
      expect(
        (await app.request('/users/me', { headers: { Cookie: 'mm_session=forged.token' } }))
          .status,
      ).toBe(401)
    })

    it('should reject an invalid profile update', async () => {
      await register()
      const login = await app.request(
        '/users/login',
        json({ email: 'ada@example.com', password: 'long-enough-1' }),
      )

      const res = await app.request('/profile', {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json', Cookie: sessionCookie(login) },
        body: JSON.stringify({ age: 12 }),
      })

      expect(res.status).toBe(400)
      expect(await res.json()).toEqual({
        error: 'Invalid profile',
        details: ['age must be an integer between 18 and 120'],
      })
    })

    it('should clear the cookie on logout', async () => {
      const res = await app.request('/users/logout', { method: 'POST' })

      expect(res.status).toBe(204)
      expect(res.headers.get('set-cookie')).toContain('mm_session=;')
    })
  })

  describe('OAuth sign-in', () => {
    it('should list only configured providers', async () => {
      const res = await app.request('/auth/providers')

      expect(await res.json()).toEqual({ providers: ['google'] })
    })

    it('should 404 for unknown or disabled providers', async () => {
      expect((await app.request('/auth/facebook')).status).toBe(404)

      const disabled = await app.request('/auth/linkedin')
      expect(disabled.status).toBe(404)
      expect(await disabled.json()).toEqual({
        error: 'This sign-in method is not available.',
        code: 'ProviderDisabled',
      })
    })

    it('should redirect to the provider and back with a session', async () => {
      const begin = await app.request('/auth/google?return_to=/matches')
      expect(begin.status).toBe(302)
      expect(begin.headers.get('location')).toBe('https://google.test/authorize?state=state-1')

      const callback = await app.request('/auth/callback?code=auth-code&state=state-1')

      expect(callback.status).toBe(302)
      // New account: onboarding wins over the saved destination
      expect(callback.headers.get('location')).toBe('/profile/complete')
      expect(sessionCookie(callback)).toMatch(/^mm_session=.+/)
      expect(await credentials.findByProviderSubject('google', 'google-subject')).toMatchObject({
        email: 'oauth.user@example.com',
        authProvider: 'google',
      })
    })

    it('should honour the saved destination once the profile is complete', async () => {
      await credentials.insert({
        id: 'returning',
        email: 'oauth.user@example.com',
        role: 'user',
        authProvider: 'google',
        password: null,
        oauthId: 'google-subject',
        createdAt: NOW,
        updatedAt: NOW,
      })
      await profiles.save({
        email: 'oauth.user@example.com',
        name: 'OAuth User',
        age: 29,
        gender: 'other',
        updatedAt: NOW,
      })
      await app.request('/auth/google?return_to=/matches/new')

      const callback = await app.request('/auth/callback?code=auth-code&state=state-1')

      expect(callback.headers.get('location')).toBe('/matches/new')
    })

    it('should land a new OAuth user on profile completion', async () => {
      await app.request('/auth/google')

      const callback = await app.request('/auth/callback?code=auth-code&state=state-1')

      expect(callback.headers.get('location')).toBe('/profile/complete')
    })

    it('should drop an off-site return path', async () => {
      await app.request('/auth/google?return_to=//evil.test/phish')

      const callback = await app.request('/auth/callback?code=auth-code&state=state-1')

      expect(callback.headers.get('location')).toBe('/profile/complete')
    })

    it('should send a replayed callback back to the login page', async () => {
      await app.request('/auth/google')
      await app.request('/auth/callback?code=auth-code&state=state-1')

      const replay = await app.request('/auth/callback?code=auth-code&state=state-1')

      expect(replay.status).toBe(302)
      expect(replay.headers.get('location')).toBe('/login?error=invalid_state')
      expect(replay.headers.get('set-cookie')).toBeNull()
    })

    it('should report a conflicting provider on the login page', async () => {
      await credentials.insert({
        id: 'existing',
        email: 'oauth.user@example.com',
        role: 'user',
        authProvider: 'linkedin',
        password: null,
        oauthId: 'linkedin-other',
        createdAt: NOW,
        updatedAt: NOW,
      })
      await app.request('/auth/google')

      const callback = await app.request('/auth/callback?code=auth-code&state=state-1')

      expect(callback.headers.get('location')).toBe('/login?error=provider_conflict')
    })
  })
})
