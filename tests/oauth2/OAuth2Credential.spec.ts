import { describe, expect, it } from 'vitest'
import { OAuth2Credential } from '../../src/oauth2/OAuth2Credential'

describe('oAuth2Credential', () => {
  const now = () => 1_000_000

  it('should not require refresh well before expiry', () => {
    const credential = new OAuth2Credential({
      accessToken: 'access',
      refreshToken: 'refresh',
      expiresAt: 1_000_000 + 10 * 60 * 1000,
      now,
    })

    expect(credential.requiresRefresh()).toBe(false)
  })

  it('should require refresh within five minutes of expiry by default', () => {
    const credential = new OAuth2Credential({
      accessToken: 'access',
      refreshToken: 'refresh',
      expiresAt: 1_000_000 + 4 * 60 * 1000,
      now,
    })

    expect(credential.requiresRefresh()).toBe(true)
  })

  it('should honor a custom refresh window', () => {
    const credential = new OAuth2Credential({
      accessToken: 'access',
      refreshToken: 'refresh',
      expiresAt: 1_000_000 + 4 * 60 * 1000,
      refreshWindowMs: 60 * 1000,
      now,
    })

    expect(credential.requiresRefresh()).toBe(false)
  })

  it('should build from a token endpoint response', () => {
    const credential = OAuth2Credential.fromTokenResponse({
      access_token: 'test-access',
      refresh_token: 'test-refresh',
      expires_in: 3600,
      token_type: 'Bearer',
      user_id: 'user-1',
    }, { now })

    expect(credential.accessToken).toBe('test-access')
    expect(credential.refreshToken).toBe('test-refresh')
    expect(credential.userId).toBe('user-1')
    expect(credential.expiresAt).toBe(1_000_000 + 3_600_000)
    expect(credential.requiresRefresh()).toBe(false)
  })
})
