export { AuthCoordinator } from './AuthCoordinator'
export type { AuthCoordinatorOptions } from './AuthCoordinator'
export {
  coordinatorConfigSchema,
  DEFAULT_REFRESH_COUNT_ALLOWED,
  DEFAULT_REFRESH_SAFETY_INTERVAL_MS,
  loadConfigFromEnv,
  resolveConfig,
} from './config'
export type { CoordinatorConfig, CoordinatorConfigInput, RefreshLimitsInput } from './config'
export { createAuthCoordinator } from './createAuthCoordinator'
export { AuthenticationError, isAuthenticationError } from './errors'
export type { AuthenticationErrorCode } from './errors'
export { createLogger } from './logger'
export type { Authenticator, Credential, FailedRequest, RetryVerdict } from './types'
