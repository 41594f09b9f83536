export const LINKEDIN_AUTH_URL =
  'https://www.linkedin.com/oauth/v2/authorization'
export const LINKEDIN_TOKEN_URL = 'https://www.linkedin.com/oauth/v2/accessToken'
export const LINKEDIN_USERINFO_URL = 'https://api.linkedin.com/v2/userinfo'

// Sign In with LinkedIn using OpenID Connect
export const LINKEDIN_SCOPES = ['openid', 'profile', 'email'] as const

export const getLinkedInConfig = (): {
  clientId: string
  clientSecret: string
  isConfigured: boolean
} => {
  const clientId = process.env.LINKEDIN_CLIENT_ID?.trim() ?? ''
  const clientSecret = process.env.LINKEDIN_CLIENT_SECRET?.trim() ?? ''
  return {
    clientId,
    clientSecret,
    isConfigured: clientId.length > 0 && clientSecret.length > 0,
  }
}
