export type AuthenticationErrorCode = 'missingCredential' | 'excessiveRefresh'

const MESSAGES: Record<AuthenticationErrorCode, string> = {
  missingCredential: 'No credential is available to authenticate the request',
  excessiveRefresh: 'Credential refreshed too many times within the safety interval',
}

export class AuthenticationError extends Error {
  readonly code: AuthenticationErrorCode

  constructor(code: AuthenticationErrorCode, message: string = MESSAGES[code]) {
    super(message)
    this.name = 'AuthenticationError'
    this.code = code
  }
}

export function isAuthenticationError(error: unknown, code?: AuthenticationErrorCode): error is AuthenticationError {
  if (!(error instanceof AuthenticationError)) {
    return false
  }
  return code === undefined || error.code === code
}
