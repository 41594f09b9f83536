import { nanoid } from 'nanoid'
import {
  normalizeEmail,
  type OAuthProviderName,
} from '../credentials/types/credential.ts'
import type { ProviderRegistry } from '../providers/registry.ts'
import type {
  ProviderUserInfo,
  VerifiedIdentity,
} from '../providers/types/provider-user-info.ts'
import { logSecurityEvent } from '../plumbing/security-log.ts'
import { AuthError } from './errors.ts'
import type { OAuthStateStore } from './oauth-state-storage.ts'

export interface OAuthExchangeOptions {
  stateStore: OAuthStateStore
  providers: ProviderRegistry
  redirectUri: string
  stateTtlMs: number
  providerTimeoutMs: number
  now?: () => number
  generateState?: () => string
}

export interface BeginResult {
  url: string
  state: string
}

/** Query parameters the provider sends back to the redirect URI. */
export interface CallbackParams {
  code?: string
  state?: string
  error?: string
  /** Set when the callback route is provider-specific. */
  provider?: OAuthProviderName
}

export interface CompletedExchange {
  identity: VerifiedIdentity
  returnTo?: string
}

export interface OAuthExchange {
  begin(provider: OAuthProviderName, returnTo?: string): Promise<BeginResult>
  complete(params: CallbackParams): Promise<CompletedExchange>
}

const displayNameOf = (info: ProviderUserInfo): string | undefined => {
  if (info.name) {
    return info.name
  }
  const joined = [info.givenName, info.familyName].filter(Boolean).join(' ')
  return joined.length > 0 ? joined : undefined
}

export const createOAuthExchange = (
  options: OAuthExchangeOptions,
): OAuthExchange => {
  const {
    stateStore,
    providers,
    redirectUri,
    stateTtlMs,
    providerTimeoutMs,
    now = Date.now,
    generateState = () => nanoid(32),
  } = options

  const requireEnabled = (provider: OAuthProviderName) => {
    const client = providers[provider]
    if (!client.isConfigured()) {
      throw new AuthError(
        'ProviderDisabled',
        `${provider} login is not configured`,
      )
    }
    return client
  }

  // Sets attempt.provider as soon as the consumed state names it
  const finishCallback = async (
    params: CallbackParams,
    attempt: { provider?: OAuthProviderName },
  ): Promise<CompletedExchange> => {
    if (!params.state) {
      throw new AuthError('StateMismatch', 'Callback carried no state')
    }

    // Single use: the token is gone after this, whatever happens next
    const pending = await stateStore.consume(params.state)
    if (!pending) {
      throw new AuthError(
        'StateMismatch',
        'State is unknown, expired or already used',
      )
    }
    attempt.provider = pending.provider
    if (params.provider && params.provider !== pending.provider) {
      throw new AuthError(
        'StateMismatch',
        `State was issued for ${pending.provider}, not ${params.provider}`,
      )
    }

    const { provider } = pending
    if (params.error) {
      throw new AuthError(
        'ProviderError',
        `${provider} returned error: ${params.error}`,
      )
    }
    if (!params.code) {
      throw new AuthError('InvalidInput', 'Missing authorization code')
    }

    const client = requireEnabled(provider)
    const accessToken = await client.exchangeCode(
      params.code,
      redirectUri,
      providerTimeoutMs,
    )
    const info = await client.fetchUserInfo(accessToken, providerTimeoutMs)

    if (!info.email || info.emailVerified !== true) {
      throw new AuthError(
        'IncompleteProfile',
        `${provider} did not return a verified email`,
      )
    }

    return {
      identity: {
        provider,
        subjectId: info.sub,
        email: normalizeEmail(info.email),
        displayName: displayNameOf(info),
      },
      returnTo: pending.returnTo,
    }
  }

  return {
    begin: async (provider, returnTo) => {
      const client = requireEnabled(provider)
      const state = generateState()

      await stateStore.save({
        state,
        provider,
        returnTo,
        expiresAt: new Date(now() + stateTtlMs),
      })

      return {
        url: client.getAuthorizationUrl(redirectUri, state),
        state,
      }
    },

    complete: async (params) => {
      const attempt: { provider?: OAuthProviderName } = {}
      try {
        return await finishCallback(params, attempt)
      } catch (error) {
        if (error instanceof AuthError) {
          logSecurityEvent({
            event: 'auth_failure',
            provider: attempt.provider,
            reason: error.code,
          })
        }
        throw error
      }
    },
  }
}
