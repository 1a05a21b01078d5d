import type { AuthCoordinatorOptions } from './AuthCoordinator'
import type { Credential } from './types'
import { AuthCoordinator } from './AuthCoordinator'
import { resolveConfig } from './config'

/**
 * Creates a coordinator whose limits, queue size and log level come from the
 * `AUTH_REFRESH_*` environment variables unless `options.config` sets them.
 *
 * @example
 * ```ts
 * const coordinator = createAuthCoordinator({
 *   credential: new OAuth2Credential({ accessToken, refreshToken, expiresAt }),
 *   authenticator: new BearerAuthenticator({
 *     refreshCredential: async (credential) => {
 *       const { data } = await axios.post('/oauth/token', {
 *         grant_type: 'refresh_token',
 *         refresh_token: credential.refreshToken,
 *       })
 *       return OAuth2Credential.fromTokenResponse(data)
 *     },
 *   }),
 *   onRefreshFailure: () => session.logout(),
 * })
 *
 * attachAuthInterceptor(api, coordinator)
 * ```
 */
export function createAuthCoordinator<
  TCredential extends Credential,
  TRequest,
  TResponse = unknown,
  TContext = unknown,
>(
  options: AuthCoordinatorOptions<TCredential, TRequest, TResponse, TContext>,
  env: NodeJS.ProcessEnv = process.env,
): AuthCoordinator<TCredential, TRequest, TResponse, TContext> {
  return new AuthCoordinator({
    ...options,
    config: resolveConfig(options.config, env),
  })
}
