import type { OAuthProviderName } from '../../credentials/types/credential.ts'

/**
 * Userinfo fields as returned by an OIDC userinfo endpoint.
 * Google and LinkedIn both follow the standard claim names.
 */
export interface ProviderUserInfo {
  sub: string
  email?: string
  emailVerified?: boolean
  name?: string
  givenName?: string
  familyName?: string
}

/** Identity proven by a completed authorization-code exchange. */
export interface VerifiedIdentity {
  provider: OAuthProviderName
  subjectId: string
  email: string // lower-cased
  displayName?: string
}
