import { describe, expect, it } from 'vitest'
import { loadConfigFromEnv, resolveConfig } from '../../src/core/config'

describe('config', () => {
  it('should fall back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      refreshSafetyIntervalMs: 30_000,
      refreshCountAllowed: 5,
      maxQueueSize: undefined,
      logLevel: 'silent',
    })
  })

  it('should read limits from the environment', () => {
    const env = {
      AUTH_REFRESH_SAFETY_INTERVAL_MS: '60000',
      AUTH_REFRESH_COUNT_ALLOWED: '3',
      AUTH_REFRESH_MAX_QUEUE_SIZE: '50',
      AUTH_REFRESH_LOG_LEVEL: 'debug',
    }

    expect(loadConfigFromEnv(env)).toEqual({
      refreshSafetyIntervalMs: 60_000,
      refreshCountAllowed: 3,
      maxQueueSize: 50,
      logLevel: 'debug',
    })
  })

  it('should let explicit options win over the environment', () => {
    const env = {
      AUTH_REFRESH_COUNT_ALLOWED: '3',
      AUTH_REFRESH_LOG_LEVEL: 'debug',
    }

    expect(resolveConfig({ refreshCountAllowed: 10 }, env)).toEqual({
      refreshSafetyIntervalMs: 30_000,
      refreshCountAllowed: 10,
      maxQueueSize: undefined,
      logLevel: 'debug',
    })
  })

  it('should ignore unrelated environment variables', () => {
    expect(loadConfigFromEnv({ PATH: '/usr/bin', NODE_ENV: 'test' })).toEqual({
      refreshSafetyIntervalMs: undefined,
      refreshCountAllowed: undefined,
      maxQueueSize: undefined,
      logLevel: undefined,
    })
  })

  it('should treat empty environment variables as unset', () => {
    const env = {
      AUTH_REFRESH_SAFETY_INTERVAL_MS: '',
      AUTH_REFRESH_COUNT_ALLOWED: '',
      AUTH_REFRESH_MAX_QUEUE_SIZE: '',
      AUTH_REFRESH_LOG_LEVEL: '',
    }

    expect(resolveConfig({}, env)).toEqual({
      refreshSafetyIntervalMs: 30_000,
      refreshCountAllowed: 5,
      maxQueueSize: undefined,
      logLevel: 'silent',
    })
  })

  it('should reject malformed environment values', () => {
    expect(() => loadConfigFromEnv({ AUTH_REFRESH_COUNT_ALLOWED: 'many' })).toThrow()
    expect(() => loadConfigFromEnv({ AUTH_REFRESH_LOG_LEVEL: 'loud' })).toThrow()
    expect(() => loadConfigFromEnv({ AUTH_REFRESH_MAX_QUEUE_SIZE: '0' })).toThrow()
  })
})
