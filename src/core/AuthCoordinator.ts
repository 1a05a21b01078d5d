import type { Logger } from 'pino'
import type { CoordinatorConfigInput, RefreshLimitsInput } from './config'
import type {
  AdaptWaiter,
  Authenticator,
  Credential,
  FailedRequest,
  MutableState,
  RetryVerdict,
  RetryWaiter,
} from './types'
import { Mutex } from 'async-mutex'
import { coordinatorConfigSchema, refreshLimitsSchema } from './config'
import { AuthenticationError } from './errors'
import { createLogger } from './logger'
import { isRefreshExcessive } from './refreshPolicy'
import { RequestQueue } from './RequestQueue'

export interface AuthCoordinatorOptions<
  TCredential extends Credential,
  TRequest,
  TResponse = unknown,
  TContext = unknown,
> {
  authenticator: Authenticator<TCredential, TRequest, TResponse, TContext>
  credential?: TCredential
  config?: CoordinatorConfigInput
  /**
   * Defaults to a pino logger at `config.logLevel`.
   */
  logger?: Logger
  /**
   * Clock used for the refresh safety window, in epoch milliseconds.
   */
  now?: () => number
  /**
   * Called once per failed refresh, after every queued request has been released.
   * The place to log the user out.
   */
  onRefreshFailure?: (error: unknown) => void
}

interface DrainedWaiters<TRequest, TContext> {
  adapts: AdaptWaiter<TRequest, TContext>[]
  retries: RetryWaiter[]
}

type RefreshStep<TCredential, TRequest, TContext> =
  | { type: 'start', credential: TCredential }
  | { type: 'fail', error: unknown, drained: DrainedWaiters<TRequest, TContext> }

type AdaptDecision<TCredential, TRequest, TContext> =
  | { type: 'adapt', credential: TCredential }
  | { type: 'fail', error: AuthenticationError }
  | { type: 'deferred', result: Promise<TRequest>, refresh?: RefreshStep<TCredential, TRequest, TContext> }

type RetryDecision<TCredential, TRequest, TContext> =
  | { type: 'retry' }
  | { type: 'queued', result: Promise<RetryVerdict>, refresh?: RefreshStep<TCredential, TRequest, TContext> }

const RETRY: RetryVerdict = { type: 'retry' }
const DO_NOT_RETRY: RetryVerdict = { type: 'doNotRetry' }

export class AuthCoordinator<
  TCredential extends Credential,
  TRequest,
  TResponse = unknown,
  TContext = unknown,
> {
  private readonly mutex = new Mutex()
  private readonly state: MutableState<TCredential, TRequest, TContext>
  private readonly authenticator: Authenticator<TCredential, TRequest, TResponse, TContext>
  private readonly logger: Logger
  private readonly now: () => number
  private readonly onRefreshFailure?: (error: unknown) => void

  constructor(options: AuthCoordinatorOptions<TCredential, TRequest, TResponse, TContext>) {
    const config = coordinatorConfigSchema.parse(options.config ?? {})

    this.authenticator = options.authenticator
    this.logger = options.logger ?? createLogger(config.logLevel)
    this.now = options.now ?? Date.now
    this.onRefreshFailure = options.onRefreshFailure
    this.state = {
      credential: options.credential,
      isRefreshing: false,
      refreshTimestamps: [],
      refreshSafetyIntervalMs: config.refreshSafetyIntervalMs,
      refreshCountAllowed: config.refreshCountAllowed,
      pendingAdapts: new RequestQueue(config.maxQueueSize),
      pendingRetries: new RequestQueue(config.maxQueueSize),
    }
  }

  get credential(): TCredential | undefined {
    return this.state.credential
  }

  get refreshSafetyIntervalMs(): number {
    return this.state.refreshSafetyIntervalMs
  }

  get refreshCountAllowed(): number {
    return this.state.refreshCountAllowed
  }

  /**
   * Check if a credential refresh is currently in flight.
   */
  get refreshing(): boolean {
    return this.state.isRefreshing
  }

  get pendingAdaptCount(): number {
    return this.state.pendingAdapts.size()
  }

  get pendingRetryCount(): number {
    return this.state.pendingRetries.size()
  }

  async setCredential(credential: TCredential | undefined): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.state.credential = credential
    })
  }

  async configure(limits: RefreshLimitsInput): Promise<void> {
    const parsed = refreshLimitsSchema.partial().parse(limits)
    await this.mutex.runExclusive(() => {
      this.state.refreshSafetyIntervalMs = parsed.refreshSafetyIntervalMs ?? this.state.refreshSafetyIntervalMs
      this.state.refreshCountAllowed = parsed.refreshCountAllowed ?? this.state.refreshCountAllowed
    })
  }

  /**
   * Authenticates an outgoing request. While a refresh is in flight, or when the current
   * credential needs one, the returned promise settles once that refresh completes.
   */
  async adapt(request: TRequest, context?: TContext): Promise<TRequest> {
    const decision = await this.mutex.runExclusive(() => this.decideAdapt(request, context))

    switch (decision.type) {
      case 'adapt':
        return this.authenticator.attach(request, decision.credential, context)
      case 'fail':
        this.logger.warn({ event: 'adapt.missingCredential' }, 'Request adaptation failed: no credential')
        throw decision.error
      case 'deferred':
        this.logger.debug({ event: 'adapt.deferred', pending: this.state.pendingAdapts.size() }, 'Request deferred until refresh completes')
        if (decision.refresh) {
          this.runRefreshStep(decision.refresh)
        }
        return decision.result
    }
  }

  /**
   * Decides whether a failed request should be sent again.
   */
  async retry(failure: FailedRequest<TRequest, TResponse, TContext>, error: unknown): Promise<RetryVerdict> {
    const credential = await this.mutex.runExclusive(() => this.state.credential)

    if (!credential) {
      return { type: 'doNotRetryWithError', error: new AuthenticationError('missingCredential') }
    }

    if (!this.authenticator.isAuthFailure(failure.request, failure.response, error)) {
      return DO_NOT_RETRY
    }

    if (!this.authenticator.isAuthenticatedWith(failure.request, credential)) {
      this.logger.debug({ event: 'retry.stale' }, 'Request used a previous credential, retrying')
      return RETRY
    }

    const decision = await this.mutex.runExclusive(() => this.decideRetry(credential))
    if (decision.type === 'retry') {
      this.logger.debug({ event: 'retry.stale' }, 'Credential changed while classifying, retrying')
      return RETRY
    }

    this.logger.debug({ event: 'retry.queued', pending: this.state.pendingRetries.size() }, 'Retry queued until refresh completes')
    if (decision.refresh) {
      this.runRefreshStep(decision.refresh)
    }
    return decision.result.catch((queueError: unknown): RetryVerdict => ({ type: 'doNotRetryWithError', error: queueError }))
  }

  // Everything below named decide*, trigger*, complete* runs inside the mutex and must stay synchronous.

  private decideAdapt(request: TRequest, context: TContext | undefined): AdaptDecision<TCredential, TRequest, TContext> {
    const state = this.state

    if (state.isRefreshing) {
      return { type: 'deferred', result: this.enqueueAdapt(request, context) }
    }

    const credential = state.credential
    if (!credential) {
      return { type: 'fail', error: new AuthenticationError('missingCredential') }
    }

    if (credential.requiresRefresh()) {
      const result = this.enqueueAdapt(request, context)
      return { type: 'deferred', result, refresh: this.triggerRefresh(credential) }
    }

    return { type: 'adapt', credential }
  }

  private decideRetry(credential: TCredential): RetryDecision<TCredential, TRequest, TContext> {
    const state = this.state

    if (state.credential !== credential) {
      return { type: 'retry' }
    }

    const result = new Promise<RetryVerdict>((resolve) => {
      state.pendingRetries.add({ resolve })
    })

    if (state.isRefreshing) {
      return { type: 'queued', result }
    }
    return { type: 'queued', result, refresh: this.triggerRefresh(credential) }
  }

  private enqueueAdapt(request: TRequest, context: TContext | undefined): Promise<TRequest> {
    return new Promise<TRequest>((resolve, reject) => {
      this.state.pendingAdapts.add({ request, context, resolve, reject })
    })
  }

  private triggerRefresh(credential: TCredential): RefreshStep<TCredential, TRequest, TContext> {
    const state = this.state
    const now = this.now()

    if (isRefreshExcessive(state, now)) {
      const error = new AuthenticationError('excessiveRefresh')
      return { type: 'fail', error, drained: this.completeRefresh() }
    }

    state.refreshTimestamps.push(now)
    state.isRefreshing = true
    return { type: 'start', credential }
  }

  private completeRefresh(credential?: TCredential): DrainedWaiters<TRequest, TContext> {
    const state = this.state
    if (credential) {
      state.credential = credential
    }

    const drained = {
      adapts: state.pendingAdapts.drain(),
      retries: state.pendingRetries.drain(),
    }
    state.isRefreshing = false
    return drained
  }

  // Outside the mutex from here on.

  private runRefreshStep(step: RefreshStep<TCredential, TRequest, TContext>): void {
    if (step.type === 'fail') {
      this.logger.error({ event: 'refresh.excessive', refreshCountAllowed: this.state.refreshCountAllowed }, 'Refresh rejected by the safety window')
      this.releaseWithFailure(step.drained, step.error)
      return
    }

    this.performRefresh(step.credential).catch((error: unknown) => {
      this.logger.error({ event: 'refresh.releaseFailed', err: error }, 'Releasing refresh waiters failed')
    })
  }

  private async performRefresh(credential: TCredential): Promise<void> {
    this.logger.info({ event: 'refresh.started' }, 'Refreshing credential')

    let refreshed: TCredential
    try {
      refreshed = await this.authenticator.refresh(credential)
    }
    catch (error) {
      const drained = await this.mutex.runExclusive(() => this.completeRefresh())
      this.logger.error({ event: 'refresh.failed', err: error, adapts: drained.adapts.length, retries: drained.retries.length }, 'Credential refresh failed')
      this.releaseWithFailure(drained, error)
      return
    }

    const drained = await this.mutex.runExclusive(() => this.completeRefresh(refreshed))
    this.logger.info({ event: 'refresh.succeeded', adapts: drained.adapts.length, retries: drained.retries.length }, 'Credential refreshed')
    this.releaseWithSuccess(drained)
  }

  private releaseWithSuccess(drained: DrainedWaiters<TRequest, TContext>): void {
    drained.adapts.forEach((waiter) => {
      void this.adapt(waiter.request, waiter.context).then(waiter.resolve, waiter.reject)
    })
    drained.retries.forEach(waiter => waiter.resolve(RETRY))
  }

  private releaseWithFailure(drained: DrainedWaiters<TRequest, TContext>, error: unknown): void {
    drained.adapts.forEach(waiter => waiter.reject(error))
    drained.retries.forEach(waiter => waiter.resolve({ type: 'doNotRetryWithError', error }))

    try {
      this.onRefreshFailure?.(error)
    }
    catch (hookError) {
      this.logger.error({ event: 'refresh.hookFailed', err: hookError }, 'onRefreshFailure hook threw')
    }
  }
}
