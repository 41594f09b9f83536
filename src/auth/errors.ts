export type AuthErrorCode =
  | 'NotFound'
  | 'InvalidPassword'
  | 'ProviderMismatch'
  | 'ProviderConflict'
  | 'StateMismatch'
  | 'ProviderError'
  | 'IncompleteProfile'
  | 'EmailTaken'
  | 'InvalidInput'
  | 'ProviderDisabled'
  | 'CorruptRecord'

interface ErrorPresentation {
  status: 400 | 401 | 404 | 409 | 500 | 502
  /** Shown to the end user; must not reveal whether an account exists */
  publicMessage: string
  /** Query value used when redirecting back to the login page */
  redirectParam: string
}

const GENERIC_LOGIN_FAILURE = 'Invalid email or password'

const PRESENTATION: Record<AuthErrorCode, ErrorPresentation> = {
  NotFound: {
    status: 401,
    publicMessage: GENERIC_LOGIN_FAILURE,
    redirectParam: 'invalid_credentials',
  },
  InvalidPassword: {
    status: 401,
    publicMessage: GENERIC_LOGIN_FAILURE,
    redirectParam: 'invalid_credentials',
  },
  ProviderMismatch: {
    status: 401,
    publicMessage: GENERIC_LOGIN_FAILURE,
    redirectParam: 'invalid_credentials',
  },
  ProviderConflict: {
    status: 409,
    publicMessage:
      'This email is already linked to another sign-in method. Use that method to sign in.',
    redirectParam: 'provider_conflict',
  },
  StateMismatch: {
    status: 400,
    publicMessage: 'Your sign-in attempt expired or was invalid. Please start again.',
    redirectParam: 'invalid_state',
  },
  ProviderError: {
    status: 502,
    publicMessage: 'The sign-in provider returned an error, try again.',
    redirectParam: 'provider_error',
  },
  IncompleteProfile: {
    status: 400,
    publicMessage:
      'The sign-in provider did not share a verified email address.',
    redirectParam: 'email_not_verified',
  },
  EmailTaken: {
    status: 409,
    publicMessage: 'Email already registered. Please sign in.',
    redirectParam: 'email_taken',
  },
  InvalidInput: {
    status: 400,
    publicMessage: 'Invalid request',
    redirectParam: 'invalid_request',
  },
  ProviderDisabled: {
    status: 404,
    publicMessage: 'This sign-in method is not available.',
    redirectParam: 'provider_disabled',
  },
  CorruptRecord: {
    status: 500,
    publicMessage: 'Authentication failed',
    redirectParam: 'server_error',
  },
}

/**
 * Typed failure of an authentication attempt. Every failure is terminal for
 * the attempt that produced it.
 */
export class AuthError extends Error {
  readonly code: AuthErrorCode

  constructor(code: AuthErrorCode, message?: string) {
    super(message ?? code)
    this.name = 'AuthError'
    this.code = code
  }

  get status(): ErrorPresentation['status'] {
    return PRESENTATION[this.code].status
  }

  get publicMessage(): string {
    // InvalidInput carries a message that is safe and useful to show
    return this.code === 'InvalidInput'
      ? this.message
      : PRESENTATION[this.code].publicMessage
  }

  get redirectParam(): string {
    return PRESENTATION[this.code].redirectParam
  }
}

export const isAuthError = (
  error: unknown,
  code?: AuthErrorCode,
): error is AuthError =>
  error instanceof AuthError && (code === undefined || error.code === code)

/**
 * Only transient provider failures are worth retrying, and only by the user
 * after a delay.
 */
export const isRetryable = (code: AuthErrorCode): boolean =>
  code === 'ProviderError'
