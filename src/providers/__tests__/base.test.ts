import { afterEach, describe, expect, it, vi } from 'vitest'
import { parseUserInfo, providerRequest } from '../base.ts'

describe('parseUserInfo', () => {
  it('should read string booleans and drop empty claims', () => {
    expect(
      parseUserInfo('linkedin', {
        sub: 'l-1',
        email: '',
        email_verified: 'false',
        name: 'Lee',
      }),
    ).toEqual({
      sub: 'l-1',
      email: undefined,
      emailVerified: false,
      name: 'Lee',
      givenName: undefined,
      familyName: undefined,
    })
  })

  it('should reject a body that is not an object', () => {
    expect(() => parseUserInfo('google', 'nope')).toThrow('google userinfo missing sub')
  })
})

describe('providerRequest', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should map an unparseable body to ProviderError', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValueOnce({
        ok: true,
        json: async () => {
          throw new SyntaxError('Unexpected token <')
        },
      }),
    )

    await expect(
      providerRequest('google', 'https://provider.test/token', {}, 1000),
    ).rejects.toMatchObject({
      code: 'ProviderError',
      message: 'google returned an unreadable body: Unexpected token <',
    })
  })

  it('should pass a timeout signal to fetch', async () => {
    const fetchMock = vi.fn().mockResolvedValueOnce({ ok: true, json: async () => ({ a: 1 }) })
    vi.stubGlobal('fetch', fetchMock)

    const data = await providerRequest('google', 'https://provider.test/x', { method: 'GET' }, 250)

    expect(data).toEqual({ a: 1 })
    expect(fetchMock).toHaveBeenCalledWith('https://provider.test/x', {
      method: 'GET',
      signal: expect.any(AbortSignal),
    })
  })
})
