/**
 * GitHub authentication
 *
 * The access token lives in the OS secret store. A stored token is
 * checked against the API before use; the browser flow runs only when
 * the caller allows it.
 */

import {
  GistStorageError,
  isGistStorageError,
  withRetry,
  type GitHubOAuthConfig,
  type RetryOptions,
  type SecretStore,
} from "@session-sync/core";
import { GITHUB_TOKEN_ENTRY } from "./config.js";
import type { GistTransport } from "./gist-transport.js";
import { silentLogger, type Logger } from "./logger.js";

export type AuthenticatedSession = {
  token: string;
  username: string;
  transport: GistTransport;
};

export type AuthenticateOptions = {
  /** Allow the browser flow when no usable token is stored */
  interactive: boolean;
};

export type GitHubAuthenticator = {
  authenticate: (options: AuthenticateOptions) => Promise<AuthenticatedSession>;
  hasStoredToken: () => Promise<boolean>;
  /** Forget the cached session and the stored token */
  clear: () => Promise<void>;
};

export type GitHubAuthenticatorDeps = {
  secretStore: SecretStore;
  /** Read lazily; only the browser flow needs it */
  getOAuthConfig: () => GitHubOAuthConfig;
  createTransport: (token: string) => GistTransport;
  runFlow: (config: GitHubOAuthConfig) => Promise<string>;
  retry?: Omit<RetryOptions, "operationName">;
  logger?: Logger;
};

export const createGitHubAuthenticator = (
  deps: GitHubAuthenticatorDeps
): GitHubAuthenticator => {
  const logger = deps.logger ?? silentLogger;
  let cached: AuthenticatedSession | null = null;

  const readStoredToken = async (): Promise<string | null> => {
    try {
      const token = await deps.secretStore.get(GITHUB_TOKEN_ENTRY);
      return token && token.trim() !== "" ? token.trim() : null;
    } catch (error) {
      throw GistStorageError.authenticationRequired(
        `Could not read the GitHub token from ${deps.secretStore.name}`,
        error
      );
    }
  };

  const identify = async (token: string): Promise<AuthenticatedSession> => {
    const transport = deps.createTransport(token);
    const username = await withRetry(() => transport.getAuthenticatedUser(), {
      ...deps.retry,
      operationName: "get_user",
    });
    return { token, username, transport };
  };

  const fromStoredToken = async (): Promise<AuthenticatedSession | null> => {
    const token = await readStoredToken();
    if (!token) {
      return null;
    }

    try {
      return await identify(token);
    } catch (error) {
      if (!isGistStorageError(error, "AuthenticationRequired")) {
        throw error;
      }
      logger.warn("Stored GitHub token was rejected; discarding it");
      await deps.secretStore.delete(GITHUB_TOKEN_ENTRY);
      return null;
    }
  };

  const fromBrowserFlow = async (): Promise<AuthenticatedSession> => {
    const token = await deps.runFlow(deps.getOAuthConfig());
    const session = await identify(token);

    try {
      await deps.secretStore.set(GITHUB_TOKEN_ENTRY, token);
    } catch (error) {
      logger.warn(
        `Could not save the GitHub token to ${deps.secretStore.name}; you will be asked to log in again next time (${
          error instanceof Error ? error.message : String(error)
        })`
      );
    }
    logger.debug(`Authenticated as ${session.username}`);
    return session;
  };

  return {
    authenticate: async ({ interactive }) => {
      if (cached) {
        return cached;
      }

      const stored = await fromStoredToken();
      if (stored) {
        cached = stored;
        return stored;
      }

      if (!interactive) {
        throw GistStorageError.authenticationRequired(
          "No valid GitHub token stored - run `session-sync login`"
        );
      }

      cached = await fromBrowserFlow();
      return cached;
    },

    hasStoredToken: async () => (await readStoredToken()) !== null,

    clear: async () => {
      cached = null;
      await deps.secretStore.delete(GITHUB_TOKEN_ENTRY);
    },
  };
};
