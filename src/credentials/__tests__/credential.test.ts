import { describe, expect, it } from 'vitest'
import {
  applyCredentialChange,
  isAuthProvider,
  isOAuthProvider,
  isRole,
  normalizeEmail,
  toCredentialView,
} from '../types/credential.ts'
import { CREATED_AT, makeEmailRecord, makeOAuthRecord } from './fixtures.ts'

const AT = new Date('2026-05-05T05:05:05.000Z')

describe('credential record helpers', () => {
  it('should normalize emails by trimming and lower-casing', () => {
    expect(normalizeEmail('  Someone@Example.COM\t')).toBe('someone@example.com')
  })

  it('should recognise providers and roles', () => {
    expect(isOAuthProvider('google')).toBe(true)
    expect(isOAuthProvider('email')).toBe(false)
    expect(isAuthProvider('email')).toBe(true)
    expect(isAuthProvider('facebook')).toBe(false)
    expect(isRole('founder')).toBe(true)
    expect(isRole('admin')).toBe(false)
  })

  it('should leave password material out of the view', async () => {
    const record = await makeEmailRecord('v@example.com', 'Secret-pass', {
      id: 'rec-v',
      lastLoginAt: AT,
    })

    expect(toCredentialView(record)).toEqual({
      id: 'rec-v',
      email: 'v@example.com',
      authProvider: 'email',
      role: 'user',
      createdAt: CREATED_AT.toISOString(),
      lastLoginAt: AT.toISOString(),
    })
  })

  it('should clear the password when linking', async () => {
    const record = await makeEmailRecord('l@example.com', 'Secret-pass', {
      role: 'founder',
    })

    const linked = applyCredentialChange(
      record,
      { kind: 'link', authProvider: 'linkedin', oauthId: 'l-9' },
      AT,
    )

    expect(linked).toMatchObject({
      id: record.id,
      role: 'founder',
      authProvider: 'linkedin',
      oauthId: 'l-9',
      password: null,
      updatedAt: AT,
    })
  })

  it('should refuse a link or password change on an OAuth record', () => {
    const record = makeOAuthRecord('o@example.com', 'google', 'g-1')

    expect(
      applyCredentialChange(
        record,
        { kind: 'link', authProvider: 'linkedin', oauthId: 'l-1' },
        AT,
      ),
    ).toBeNull()
    expect(
      applyCredentialChange(record, { kind: 'password', password: { hash: 'a', salt: 'b' } }, AT),
    ).toBeNull()
  })
})
