/**
 * OAuth CSRF state and authorization URL helpers
 */

import { constantTimeEqual, generateAlphanumeric, isAlphanumeric } from "./crypto.js";
import { CsrfError, OAuthError } from "./errors.js";
import type { GitHubOAuthConfig } from "./types.js";

export const OAUTH_STATE_LENGTH = 32;
const STATE_MIN_LENGTH = 16;
const STATE_MAX_LENGTH = 128;

/** Single-use CSRF token for one authorization attempt */
export type OAuthState = Readonly<{ value: string }>;

/**
 * Generate a fresh state token
 */
export const createOAuthState = (): OAuthState => {
  return Object.freeze({ value: generateAlphanumeric(OAUTH_STATE_LENGTH) });
};

/**
 * Reject states that are the wrong length or contain non-alphanumerics
 */
export const validateStateFormat = (state: string) => {
  if (state.length < STATE_MIN_LENGTH || state.length > STATE_MAX_LENGTH) {
    throw new CsrfError("Invalid OAuth state parameter length");
  }

  if (!isAlphanumeric(state)) {
    throw new CsrfError("OAuth state parameter contains invalid characters");
  }
};

/**
 * Validate both values, then compare them in constant time
 */
export const verifyCallbackState = (expected: string, received: string): boolean => {
  validateStateFormat(expected);
  validateStateFormat(received);
  return constantTimeEqual(expected, received);
};

/**
 * Build the GitHub authorization URL for one attempt
 */
export const buildAuthorizationUrl = (
  config: GitHubOAuthConfig,
  state: string,
  redirectUri: string = config.callbackUrl
): string => {
  validateStateFormat(state);

  const params: [string, string][] = [
    ["client_id", config.clientId],
    ["scope", config.scopes.join(",")],
    ["state", state],
    ["redirect_uri", redirectUri],
  ];
  const query = params
    .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
    .join("&");

  const url = `${config.authorizeUrl}?${query}`;
  try {
    new URL(url);
  } catch (error) {
    throw new OAuthError("Failed to construct valid OAuth URL", "invalid_callback", {
      cause: error,
    });
  }
  return url;
};
