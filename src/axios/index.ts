export { attachAuthInterceptor } from './attachAuthInterceptor'
export type { AuthInterceptorOptions } from './attachAuthInterceptor'
export { BearerAuthenticator, statusOf } from './BearerAuthenticator'
export type { BearerAuthenticatorOptions, BearerCredential } from './BearerAuthenticator'
