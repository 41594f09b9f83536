import { Hono } from 'hono'
import { describe, expect, it } from 'vitest'
import { securityHeaders } from '../security-headers.ts'

const buildApp = () => {
  const app = new Hono()
  app.use('*', securityHeaders)
  app.get('/test', (c) => c.json({ ok: true }))
  app.get('/redirect', (c) => c.redirect('/elsewhere'))
  return app
}

describe('securityHeaders', () => {
  it('should set the standard headers and disable caching', async () => {
    const res = await buildApp().request('/test')

    expect(res.status).toBe(200)
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
    expect(res.headers.get('X-Frame-Options')).toBe('DENY')
    expect(res.headers.get('Referrer-Policy')).toBe('strict-origin-when-cross-origin')
    expect(res.headers.get('Cache-Control')).toBe('no-store')
  })

  it('should not send HSTS over plain HTTP', async () => {
    const res = await buildApp().request('http://localhost/test')

    expect(res.headers.get('Strict-Transport-Security')).toBeNull()
  })

  it('should set HSTS when request is over HTTPS', async () => {
    const res = await buildApp().request('https://example.com/test')

    expect(res.headers.get('Strict-Transport-Security')).toBe(
      'max-age=31536000; includeSubDomains',
    )
  })

  it('should set HSTS when x-forwarded-proto is https', async () => {
    const res = await buildApp().request('/test', {
      headers: { 'x-forwarded-proto': 'HTTPS, http' },
    })

    expect(res.headers.get('Strict-Transport-Security')).toBe(
      'max-age=31536000; includeSubDomains',
    )
  })

  it('should decorate redirects too', async () => {
    const res = await buildApp().request('/redirect')

    expect(res.status).toBe(302)
    expect(res.headers.get('Cache-Control')).toBe('no-store')
  })
})
