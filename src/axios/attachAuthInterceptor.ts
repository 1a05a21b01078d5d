import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios'
import type { AuthCoordinator } from '../core/AuthCoordinator'
import type { Credential } from '../core/types'
import { isAxiosError } from 'axios'

declare module 'axios' {
  interface AxiosRequestConfig {
    /**
     * Number of times the request was re-sent after its credential was rejected.
     */
    authRetryCount?: number
  }
}

export interface AuthInterceptorOptions {
  /**
   * How many times a single request may be re-sent after an authentication failure.
   * Defaults to 1.
   */
  maxRetries?: number
}

/**
 * Routes every request of the instance through the coordinator: requests are
 * authenticated by `adapt`, and authentication failures are handed to `retry`.
 * Returns a function that removes both interceptors.
 */
export function attachAuthInterceptor<TCredential extends Credential>(
  instance: AxiosInstance,
  coordinator: AuthCoordinator<TCredential, InternalAxiosRequestConfig, AxiosResponse>,
  options: AuthInterceptorOptions = {},
): () => void {
  const maxRetries = options.maxRetries ?? 1

  const requestInterceptor = instance.interceptors.request.use(config => coordinator.adapt(config))

  const responseInterceptor = instance.interceptors.response.use(undefined, async (error: unknown) => {
    if (!isAxiosError(error) || !error.config) {
      throw error
    }

    const config = error.config
    const attempt = config.authRetryCount ?? 0
    if (attempt >= maxRetries) {
      throw error
    }

    const verdict = await coordinator.retry({ request: config, response: error.response }, error)
    switch (verdict.type) {
      case 'retry':
        config.authRetryCount = attempt + 1
        return instance.request(config)
      case 'doNotRetry':
        throw error
      case 'doNotRetryWithError':
        throw verdict.error
    }
  })

  return () => {
    instance.interceptors.request.eject(requestInterceptor)
    instance.interceptors.response.eject(responseInterceptor)
  }
}
