import type { Credential } from '../core/types'

export const DEFAULT_REFRESH_WINDOW_MS = 5 * 60 * 1000

export interface OAuth2CredentialInit {
  accessToken: string
  refreshToken: string
  /**
   * Expiry of the access token, in epoch milliseconds.
   */
  expiresAt: number
  userId?: string
  /**
   * Refresh this long before `expiresAt`. Defaults to five minutes.
   */
  refreshWindowMs?: number
  now?: () => number
}

/**
 * Token endpoint response as defined by RFC 6749 section 5.1.
 */
export interface OAuth2TokenResponse {
  access_token: string
  refresh_token: string
  expires_in: number
  token_type?: string
  user_id?: string
}

export class OAuth2Credential implements Credential {
  readonly accessToken: string
  readonly refreshToken: string
  readonly expiresAt: number
  readonly userId?: string
  private readonly refreshWindowMs: number
  private readonly now: () => number

  constructor(init: OAuth2CredentialInit) {
    this.accessToken = init.accessToken
    this.refreshToken = init.refreshToken
    this.expiresAt = init.expiresAt
    this.userId = init.userId
    this.refreshWindowMs = init.refreshWindowMs ?? DEFAULT_REFRESH_WINDOW_MS
    this.now = init.now ?? Date.now
  }

  static fromTokenResponse(
    response: OAuth2TokenResponse,
    options: Pick<OAuth2CredentialInit, 'refreshWindowMs' | 'now'> = {},
  ): OAuth2Credential {
    const now = options.now ?? Date.now
    return new OAuth2Credential({
      accessToken: response.access_token,
      refreshToken: response.refresh_token,
      expiresAt: now() + response.expires_in * 1000,
      userId: response.user_id,
      ...options,
    })
  }

  requiresRefresh(): boolean {
    return this.expiresAt - this.now() < this.refreshWindowMs
  }
}
