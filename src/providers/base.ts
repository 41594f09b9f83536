import { AuthError } from '../auth/errors.ts'
import type { OAuthProviderName } from '../credentials/types/credential.ts'
import { errorMessage } from '../plumbing/logger.ts'
import type { ProviderUserInfo } from './types/provider-user-info.ts'

export type { ProviderUserInfo } from './types/provider-user-info.ts'

export interface ProviderCredentials {
  clientId: string
  clientSecret: string
  isConfigured: boolean
}

/**
 * Server-side half of an OAuth 2.0 authorization-code login against one
 * provider.
 */
export interface OAuthProviderClient {
  readonly name: OAuthProviderName
  isConfigured(): boolean
  getAuthorizationUrl(redirectUri: string, state: string): string
  /** Exchange an authorization code for an access token. */
  exchangeCode(
    code: string,
    redirectUri: string,
    timeoutMs: number,
  ): Promise<string>
  fetchUserInfo(accessToken: string, timeoutMs: number): Promise<ProviderUserInfo>
}

export interface OidcProviderDefinition {
  name: OAuthProviderName
  authUrl: string
  tokenUrl: string
  userInfoUrl: string
  scopes: readonly string[]
  getConfig: () => ProviderCredentials
  /** Extra query parameters for the authorization request. */
  authParams?: Record<string, string>
}

const readString = (data: unknown, key: string): string | undefined => {
  if (typeof data !== 'object' || data === null) {
    return undefined
  }
  const value: unknown = Reflect.get(data, key)
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

/** Some providers send booleans as strings. */
const readBoolean = (data: unknown, key: string): boolean | undefined => {
  if (typeof data !== 'object' || data === null) {
    return undefined
  }
  const value: unknown = Reflect.get(data, key)
  if (typeof value === 'boolean') return value
  if (value === 'true') return true
  if (value === 'false') return false
  return undefined
}

/**
 * Call a provider endpoint with a timeout. Network errors, timeouts, non-2xx
 * responses and unparseable bodies all become ProviderError.
 */
export const providerRequest = async (
  provider: OAuthProviderName,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<unknown> => {
  let response: Response
  try {
    response = await fetch(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    })
  } catch (error) {
    throw new AuthError(
      'ProviderError',
      `${provider} request failed: ${errorMessage(error)}`,
    )
  }

  if (!response.ok) {
    throw new AuthError(
      'ProviderError',
      `${provider} responded ${response.status} ${response.statusText}`,
    )
  }

  try {
    return await response.json()
  } catch (error) {
    throw new AuthError(
      'ProviderError',
      `${provider} returned an unreadable body: ${errorMessage(error)}`,
    )
  }
}

export const parseUserInfo = (
  provider: OAuthProviderName,
  data: unknown,
): ProviderUserInfo => {
  const sub = readString(data, 'sub')
  if (!sub) {
    throw new AuthError('ProviderError', `${provider} userinfo missing sub`)
  }
  return {
    sub,
    email: readString(data, 'email'),
    emailVerified: readBoolean(data, 'email_verified'),
    name: readString(data, 'name'),
    givenName: readString(data, 'given_name'),
    familyName: readString(data, 'family_name'),
  }
}

/**
 * Build a client for a provider that speaks the standard OIDC
 * authorization-code flow with a userinfo endpoint.
 */
export const createOidcProvider = (
  definition: OidcProviderDefinition,
): OAuthProviderClient => {
  const { name, getConfig } = definition

  const requireConfig = (): ProviderCredentials => {
    const config = getConfig()
    if (!config.isConfigured) {
      throw new AuthError(
        'ProviderDisabled',
        `${name} OAuth is not configured: client id and secret required`,
      )
    }
    return config
  }

  return {
    name,

    isConfigured: () => getConfig().isConfigured,

    getAuthorizationUrl: (redirectUri, state) => {
      const { clientId } = requireConfig()
      const params = new URLSearchParams({
        client_id: clientId,
        redirect_uri: redirectUri,
        response_type: 'code',
        scope: definition.scopes.join(' '),
        state,
        ...definition.authParams,
      })
      return `${definition.authUrl}?${params.toString()}`
    },

    exchangeCode: async (code, redirectUri, timeoutMs) => {
      const { clientId, clientSecret } = requireConfig()
      const tokenData = await providerRequest(
        name,
        definition.tokenUrl,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
          },
          body: new URLSearchParams({
            grant_type: 'authorization_code',
            code,
            redirect_uri: redirectUri,
            client_id: clientId,
            client_secret: clientSecret,
          }).toString(),
        },
        timeoutMs,
      )

      const accessToken = readString(tokenData, 'access_token')
      if (!accessToken) {
        throw new AuthError(
          'ProviderError',
          readString(tokenData, 'error_description') ??
            readString(tokenData, 'error') ??
            `${name} token response had no access_token`,
        )
      }
      return accessToken
    },

    fetchUserInfo: async (accessToken, timeoutMs) => {
      const data = await providerRequest(
        name,
        definition.userInfoUrl,
        {
          headers: {
            Authorization: `Bearer ${accessToken}`,
            Accept: 'application/json',
          },
        },
        timeoutMs,
      )
      return parseUserInfo(name, data)
    },
  }
}
