import { log } from '../plumbing/logger.ts'
import { parseNumber } from '../plumbing/parse-number.ts'

export interface AuthConfig {
  publicBaseUrl: string
  /** Registered with every provider; sent byte-for-byte in both legs of the flow. */
  redirectUri: string
  stateTtlMs: number
  providerTimeoutMs: number
  sessionSecret: string
  sessionMaxAgeSeconds: number
}

const DEV_SESSION_SECRET = 'dev-only-session-secret'

let cachedConfig: AuthConfig | null = null

const validateConfig = (config: AuthConfig, isProduction: boolean): void => {
  const errors: string[] = []

  if (!config.publicBaseUrl.match(/^https?:\/\//)) {
    errors.push('PUBLIC_BASE_URL must be a valid URL (http:// or https://)')
  }

  if (!config.redirectUri.match(/^https?:\/\//)) {
    errors.push('OAUTH_REDIRECT_URI must be a valid URL (http:// or https://)')
  }

  if (config.stateTtlMs <= 0) {
    errors.push('OAUTH_STATE_TTL_SECONDS must be positive')
  }

  if (config.providerTimeoutMs <= 0) {
    errors.push('OAUTH_HTTP_TIMEOUT_MS must be positive')
  }

  if (isProduction && config.sessionSecret === DEV_SESSION_SECRET) {
    errors.push('SESSION_SECRET must be set in production')
  }

  if (errors.length > 0) {
    throw new Error(
      `Auth configuration validation failed:\n${errors.join('\n')}`,
    )
  }
}

export const getAuthConfig = (): AuthConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  const port = parseNumber(process.env.PORT, 3000)
  const publicBaseUrl = (
    process.env.PUBLIC_BASE_URL?.trim() || `http://localhost:${port}`
  ).replace(/\/$/, '')

  const config: AuthConfig = {
    publicBaseUrl,
    redirectUri:
      process.env.OAUTH_REDIRECT_URI?.trim() || `${publicBaseUrl}/auth/callback`,
    stateTtlMs: parseNumber(process.env.OAUTH_STATE_TTL_SECONDS, 600) * 1000,
    providerTimeoutMs: parseNumber(process.env.OAUTH_HTTP_TIMEOUT_MS, 8000),
    sessionSecret: process.env.SESSION_SECRET?.trim() || DEV_SESSION_SECRET,
    sessionMaxAgeSeconds: parseNumber(
      process.env.SESSION_MAX_AGE_SECONDS,
      7 * 24 * 60 * 60,
    ),
  }

  validateConfig(config, process.env.NODE_ENV === 'production')
  cachedConfig = config

  log('Auth configuration validated and loaded')

  return config
}

export const clearConfigCache = (): void => {
  cachedConfig = null
}
