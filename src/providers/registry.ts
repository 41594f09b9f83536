import {
  OAUTH_PROVIDERS,
  type OAuthProviderName,
} from '../credentials/types/credential.ts'
import type { OAuthProviderClient } from './base.ts'
import { googleProvider } from './google.ts'
import { linkedInProvider } from './linkedin.ts'

export type ProviderRegistry = Record<OAuthProviderName, OAuthProviderClient>

export const defaultProviders: ProviderRegistry = {
  google: googleProvider,
  linkedin: linkedInProvider,
}

/**
 * Providers with both a client id and secret configured. Anything else is not
 * offered as a login option at all.
 */
export const getEnabledProviders = (
  providers: ProviderRegistry,
): OAuthProviderName[] =>
  OAUTH_PROVIDERS.filter((name) => providers[name].isConfigured())
