export { DEFAULT_REFRESH_WINDOW_MS, OAuth2Credential } from './OAuth2Credential'
export type { OAuth2CredentialInit, OAuth2TokenResponse } from './OAuth2Credential'
