/**
 * @session-sync/core
 *
 * Session encryption, metadata validation and OAuth primitives for session-sync
 */

// Types
export type {
  CookieMap,
  EncryptedBlob,
  GistConfig,
  GitHubOAuthConfig,
  SecretStore,
  SessionData,
  SessionMetadata,
} from "./types.js";

// Errors
export {
  CsrfError,
  GistStorageError,
  isGistStorageError,
  OAuthError,
  SessionValidationError,
} from "./errors.js";
export type {
  GistStorageErrorDetail,
  GistStorageErrorKind,
  OAuthErrorKind,
  SessionValidationReason,
} from "./errors.js";

// Crypto operations
export {
  AES_KEY_LENGTH,
  AES_NONCE_LENGTH,
  AES_TAG_LENGTH,
  computeContentHash,
  computeFullHash,
  constantTimeEqual,
  deriveSessionKey,
  fromBase64,
  generateAlphanumeric,
  generateMasterKey,
  generateRandomBytes,
  hashToken,
  isAlphanumeric,
  open,
  seal,
  toBase64,
} from "./crypto.js";

// Session operations
export {
  createSessionData,
  createSessionMetadata,
  DEVICE_ID_LENGTH,
  generateSessionId,
  getDeviceId,
  isCookieMap,
  isSessionMetadataValid,
  needsRefresh,
  parseSessionData,
  serializeSessionData,
  SESSION_ID_LENGTH,
  SESSION_MAX_AGE_DAYS,
  SESSION_REFRESH_WINDOW_DAYS,
  SESSION_TTL_DAYS,
  SESSION_VERSION,
  timeUntilExpiration,
  updateSessionData,
  updateSessionMetadata,
  validateSessionData,
  validateSessionMetadata,
} from "./session.js";

export {
  getOrCreateMasterKey,
  MASTER_KEY_ENTRY,
  SessionEncryption,
} from "./session-encryption.js";

// OAuth state
export {
  buildAuthorizationUrl,
  createOAuthState,
  OAUTH_STATE_LENGTH,
  validateStateFormat,
  verifyCallbackState,
} from "./oauth.js";
export type { OAuthState } from "./oauth.js";

// Retry
export {
  calculateBackoffDelay,
  DEFAULT_RETRY_CONFIG,
  gistRetryPolicy,
  withRetry,
} from "./retry.js";
export type {
  RetryAttempt,
  RetryConfig,
  RetryOptions,
  RetryPolicy,
} from "./retry.js";
