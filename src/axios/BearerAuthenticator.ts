import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios'
import type { Authenticator, Credential } from '../core/types'
import type { OAuth2Credential } from '../oauth2/OAuth2Credential'
import { AxiosHeaders } from 'axios'

export interface BearerCredential extends Credential {
  accessToken: string
}

export interface BearerAuthenticatorOptions<TCredential extends BearerCredential> {
  /**
   * Exchanges the credential for a new one, usually with a `refresh_token` grant.
   */
  refreshCredential: (credential: TCredential) => Promise<TCredential>
  /**
   * Custom logic to determine if a failure was caused by a rejected credential.
   * If not provided, the status of the response or error is matched against `refreshStatusCodes`.
   */
  shouldRefresh?: (error: unknown, response?: AxiosResponse) => boolean
  /** HTTP status codes that mean the credential was rejected. Defaults to `[401]`. */
  refreshStatusCodes?: number[]
  /** Defaults to `Authorization`. */
  headerName?: string
  /** Defaults to `Bearer `. */
  tokenPrefix?: string
}

function readStatus(value: unknown): number | undefined {
  if (typeof value !== 'object' || value === null || !('status' in value)) {
    return undefined
  }
  return typeof value.status === 'number' ? value.status : undefined
}

function readResponse(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || !('response' in value)) {
    return undefined
  }
  return value.response
}

/**
 * Finds the HTTP status of a failure. Covers the common shapes:
 * - Axios-style: { response: { status: 401 } }
 * - Fetch-style: { status: 401 }
 * - Response object: response.status === 401
 */
export function statusOf(error: unknown): number | undefined {
  return readStatus(readResponse(error)) ?? readStatus(error)
}

export class BearerAuthenticator<TCredential extends BearerCredential = OAuth2Credential>
implements Authenticator<TCredential, InternalAxiosRequestConfig, AxiosResponse> {
  private readonly refreshStatusCodes: number[]
  private readonly headerName: string
  private readonly tokenPrefix: string

  constructor(private readonly options: BearerAuthenticatorOptions<TCredential>) {
    this.refreshStatusCodes = options.refreshStatusCodes ?? [401]
    this.headerName = options.headerName ?? 'Authorization'
    this.tokenPrefix = options.tokenPrefix ?? 'Bearer '
  }

  attach(request: InternalAxiosRequestConfig, credential: TCredential): InternalAxiosRequestConfig {
    request.headers.set(this.headerName, this.headerValue(credential))
    return request
  }

  refresh(credential: TCredential): Promise<TCredential> {
    return this.options.refreshCredential(credential)
  }

  isAuthFailure(_request: InternalAxiosRequestConfig | undefined, response: AxiosResponse | undefined, error: unknown): boolean {
    if (this.options.shouldRefresh) {
      return this.options.shouldRefresh(error, response)
    }

    const status = response?.status ?? statusOf(error)
    return status !== undefined && this.refreshStatusCodes.includes(status)
  }

  isAuthenticatedWith(request: InternalAxiosRequestConfig | undefined, credential: TCredential): boolean {
    if (!request) {
      return false
    }
    return AxiosHeaders.from(request.headers).get(this.headerName) === this.headerValue(credential)
  }

  private headerValue(credential: TCredential): string {
    return `${this.tokenPrefix}${credential.accessToken}`
  }
}
