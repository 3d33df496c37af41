/**
 * Configuration management
 */

import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { GistStorageError, type GitHubOAuthConfig } from "@session-sync/core";

const CONFIG_DIR_NAME = "session-sync";

export const DEFAULT_CALLBACK_URL = "http://localhost:8080/auth/github/callback";
export const GITHUB_AUTHORIZE_URL = "https://github.com/login/oauth/authorize";
export const GITHUB_TOKEN_URL = "https://github.com/login/oauth/access_token";
export const GIST_SCOPE = "gist";

/** Remote object identity */
export const GIST_FILENAME = "cs-cli-session-data.enc";
export const GIST_DESCRIPTION =
  "session-sync encrypted session data - managed automatically, DO NOT EDIT";

/** Secret store service and entries */
export const SECRET_SERVICE = "session-sync";
export const GITHUB_TOKEN_ENTRY = "github-oauth-token";

/** Ports tried, in order, for the OAuth callback listener */
export const CALLBACK_PORTS = Array.from({ length: 10 }, (_, i) => 8080 + i);

/**
 * Get the per-user config directory
 */
export const getConfigDir = (env: NodeJS.ProcessEnv = process.env): string => {
  const override = env["SESSION_SYNC_CONFIG_DIR"];
  if (override) {
    return override;
  }
  const base = env["XDG_CONFIG_HOME"] || join(homedir(), ".config");
  return join(base, CONFIG_DIR_NAME);
};

const OAuthEnvSchema = z.object({
  GITHUB_CLIENT_ID: z
    .string({ required_error: "GITHUB_CLIENT_ID environment variable not set" })
    .min(8, "Client ID must be 8-64 characters")
    .max(64, "Client ID must be 8-64 characters"),
  GITHUB_CLIENT_SECRET: z
    .string({ required_error: "GITHUB_CLIENT_SECRET environment variable not set" })
    .min(16, "Client secret must be 16-128 characters")
    .max(128, "Client secret must be 16-128 characters"),
  GITHUB_CALLBACK_URL: z
    .string()
    .min(1, "Callback URL cannot be empty")
    .refine(
      (url) => url.startsWith("http://localhost:") || url.startsWith("https://"),
      "Callback URL must be localhost or HTTPS"
    )
    .refine((url) => {
      try {
        new URL(url);
        return true;
      } catch {
        return false;
      }
    }, "Invalid callback URL format")
    .default(DEFAULT_CALLBACK_URL),
});

/**
 * Load and validate the GitHub OAuth application settings.
 * Throws ConfigError naming the first offending variable.
 */
export const loadOAuthConfig = (
  env: NodeJS.ProcessEnv = process.env
): GitHubOAuthConfig => {
  const result = OAuthEnvSchema.safeParse({
    GITHUB_CLIENT_ID: env["GITHUB_CLIENT_ID"],
    GITHUB_CLIENT_SECRET: env["GITHUB_CLIENT_SECRET"],
    GITHUB_CALLBACK_URL: env["GITHUB_CALLBACK_URL"],
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    throw GistStorageError.configError(
      String(issue?.path[0] ?? "environment"),
      issue?.message ?? "Invalid OAuth configuration"
    );
  }

  return Object.freeze({
    clientId: result.data.GITHUB_CLIENT_ID,
    clientSecret: result.data.GITHUB_CLIENT_SECRET,
    callbackUrl: result.data.GITHUB_CALLBACK_URL,
    scopes: Object.freeze([GIST_SCOPE]),
    authorizeUrl: GITHUB_AUTHORIZE_URL,
    tokenUrl: GITHUB_TOKEN_URL,
  });
};
