import type { RequestQueue } from './RequestQueue'

export interface Credential {
  /**
   * Whether the credential must be refreshed before it can authenticate another request.
   */
  requiresRefresh: () => boolean
}

export interface Authenticator<
  TCredential extends Credential,
  TRequest,
  TResponse = unknown,
  TContext = unknown,
> {
  /**
   * Returns the request authenticated with the credential, e.g. with an `Authorization` header set.
   */
  attach: (request: TRequest, credential: TCredential, context?: TContext) => TRequest

  /**
   * Exchanges the credential for a new one. Settles exactly once.
   */
  refresh: (credential: TCredential) => Promise<TCredential>

  /**
   * Whether the request failed because the authentication server rejected its credential.
   * Return `false` when another layer can answer with the same status (a downstream 401
   * meaning "not allowed" rather than "token invalid").
   */
  isAuthFailure: (request: TRequest | undefined, response: TResponse | undefined, error: unknown) => boolean

  /**
   * Whether the request carried this credential. When it did not, the credential was
   * refreshed while the request was in flight and it can be retried right away.
   */
  isAuthenticatedWith: (request: TRequest | undefined, credential: TCredential) => boolean
}

export type RetryVerdict =
  | { type: 'retry' }
  | { type: 'doNotRetry' }
  | { type: 'doNotRetryWithError', error: unknown }

export interface FailedRequest<TRequest, TResponse = unknown, TContext = unknown> {
  request?: TRequest
  response?: TResponse
  context?: TContext
}

export interface AdaptWaiter<TRequest, TContext> {
  request: TRequest
  context?: TContext
  resolve: (request: TRequest) => void
  reject: (reason: unknown) => void
}

export interface RetryWaiter {
  resolve: (verdict: RetryVerdict) => void
}

export interface MutableState<TCredential extends Credential, TRequest, TContext> {
  credential: TCredential | undefined
  isRefreshing: boolean
  refreshTimestamps: number[]
  refreshSafetyIntervalMs: number
  refreshCountAllowed: number
  pendingAdapts: RequestQueue<AdaptWaiter<TRequest, TContext>>
  pendingRetries: RequestQueue<RetryWaiter>
}
