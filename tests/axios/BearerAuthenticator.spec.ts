import type { InternalAxiosRequestConfig } from 'axios'
import { AxiosError, AxiosHeaders } from 'axios'
import { describe, expect, it, vi } from 'vitest'
import { BearerAuthenticator, statusOf } from '../../src/axios/BearerAuthenticator'
import { OAuth2Credential } from '../../src/oauth2/OAuth2Credential'

function credential(accessToken: string): OAuth2Credential {
  return new OAuth2Credential({ accessToken, refreshToken: 'test-refresh', expiresAt: Date.now() + 3_600_000 })
}

function request(): InternalAxiosRequestConfig {
  return { url: '/me', headers: new AxiosHeaders() }
}

describe('bearerAuthenticator', () => {
  it('should set the bearer header', () => {
    const authenticator = new BearerAuthenticator({ refreshCredential: vi.fn() })

    const adapted = authenticator.attach(request(), credential('test-token'))

    expect(adapted.headers.get('Authorization')).toBe('Bearer test-token')
  })

  it('should use a custom header and prefix', () => {
    const authenticator = new BearerAuthenticator({
      refreshCredential: vi.fn(),
      headerName: 'X-Api-Token',
      tokenPrefix: '',
    })

    const adapted = authenticator.attach(request(), credential('test-token'))

    expect(adapted.headers.get('X-Api-Token')).toBe('test-token')
    expect(adapted.headers.has('Authorization')).toBe(false)
  })

  it('should delegate refresh to the configured function', async () => {
    const refreshed = credential('new-token')
    const refreshCredential = vi.fn().mockResolvedValue(refreshed)
    const authenticator = new BearerAuthenticator({ refreshCredential })
    const current = credential('old-token')

    await expect(authenticator.refresh(current)).resolves.toBe(refreshed)
    expect(refreshCredential).toHaveBeenCalledWith(current)
  })

  it('should tell which credential authenticated a request', () => {
    const authenticator = new BearerAuthenticator({ refreshCredential: vi.fn() })
    const current = credential('current')
    const adapted = authenticator.attach(request(), current)

    expect(authenticator.isAuthenticatedWith(adapted, current)).toBe(true)
    expect(authenticator.isAuthenticatedWith(adapted, credential('other'))).toBe(false)
    expect(authenticator.isAuthenticatedWith(request(), current)).toBe(false)
    expect(authenticator.isAuthenticatedWith(undefined, current)).toBe(false)
  })

  describe('isAuthFailure', () => {
    const authenticator = new BearerAuthenticator({ refreshCredential: vi.fn() })

    it('should detect a 401 axios error', () => {
      const config = request()
      const error = new AxiosError('Unauthorized', AxiosError.ERR_BAD_REQUEST, config, undefined, {
        data: null,
        status: 401,
        statusText: 'Unauthorized',
        headers: {},
        config,
      })

      expect(authenticator.isAuthFailure(config, error.response, error)).toBe(true)
      expect(authenticator.isAuthFailure(config, undefined, error)).toBe(true)
    })

    it('should detect axios-style 401 errors', () => {
      expect(authenticator.isAuthFailure(undefined, undefined, { response: { status: 401 } })).toBe(true)
    })

    it('should detect fetch-style 401 errors', () => {
      expect(authenticator.isAuthFailure(undefined, undefined, { status: 401 })).toBe(true)
    })

    it('should detect Response object 401 errors', () => {
      expect(authenticator.isAuthFailure(undefined, undefined, new Response(null, { status: 401 }))).toBe(true)
    })

    it('should return false for other failures', () => {
      expect(authenticator.isAuthFailure(undefined, undefined, { response: { status: 403 } })).toBe(false)
      expect(authenticator.isAuthFailure(undefined, undefined, { status: 500 })).toBe(false)
      expect(authenticator.isAuthFailure(undefined, undefined, new Error('socket hang up'))).toBe(false)
    })

    it('should match configured status codes', () => {
      const custom = new BearerAuthenticator({ refreshCredential: vi.fn(), refreshStatusCodes: [401, 419] })

      expect(custom.isAuthFailure(undefined, undefined, { status: 419 })).toBe(true)
    })

    it('custom shouldRefresh overrides default detection', () => {
      const shouldRefresh = vi.fn().mockReturnValue(false)
      const custom = new BearerAuthenticator({ refreshCredential: vi.fn(), shouldRefresh })
      const error = { response: { status: 401 } }

      expect(custom.isAuthFailure(undefined, undefined, error)).toBe(false)
      expect(shouldRefresh).toHaveBeenCalledWith(error, undefined)
    })
  })

  describe('statusOf', () => {
    it('should prefer the response status', () => {
      expect(statusOf({ status: 200, response: { status: 401 } })).toBe(401)
    })

    it('should ignore non-numeric statuses', () => {
      expect(statusOf({ status: '401' })).toBeUndefined()
      expect(statusOf(null)).toBeUndefined()
      expect(statusOf('401')).toBeUndefined()
    })
  })
})
