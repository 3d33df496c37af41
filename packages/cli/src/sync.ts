/**
 * Session sync
 *
 * Stores the cookie map as one encrypted file in a secret gist and
 * reads it back on other devices. The local pointer says which gist.
 */

import {
  createSessionData,
  fromBase64,
  GistStorageError,
  hashToken,
  isGistStorageError,
  needsRefresh,
  toBase64,
  withRetry,
  type CookieMap,
  type GistConfig,
  type GistStorageErrorKind,
  type RetryOptions,
  type SessionData,
  type SessionEncryption,
} from "@session-sync/core";
import { GIST_DESCRIPTION, GIST_FILENAME } from "./config.js";
import {
  backupGistConfig,
  createGistConfig,
  loadGistConfig,
  removeGistConfig,
  saveGistConfig,
  touchGistConfig,
} from "./gist-config.js";
import type { GitHubAuthenticator } from "./github-auth.js";
import { silentLogger, type Logger } from "./logger.js";

/** Failures that mean the recorded gist can no longer be trusted */
const DISCARD_POINTER_ON: GistStorageErrorKind[] = [
  "GistNotFound",
  "InvalidSessionData",
  "EncryptionFailed",
  "SerializationFailed",
  "SessionValidationFailed",
];

export type SessionSyncDeps = {
  authenticator: GitHubAuthenticator;
  /** Loaded on first use; touches the OS secret store */
  getEncryption: () => Promise<SessionEncryption>;
  configDir: string;
  retry?: Omit<RetryOptions, "operationName">;
  logger?: Logger;
  now?: () => Date;
};

export type SessionSync = {
  /** True when a stored session can be fetched, opened and validated */
  hasCookies: () => Promise<boolean>;
  storeCookies: (cookies: CookieMap) => Promise<GistConfig>;
  /** Reads and validates; discards the pointer when the remote copy is unusable */
  getSession: () => Promise<SessionData>;
  /** Reads with the stored token only and never touches the pointer */
  peekSession: () => Promise<SessionData>;
  getCookies: () => Promise<CookieMap>;
  /** Returns false when there was no pointer, so nothing to delete */
  deleteCookies: () => Promise<boolean>;
  deleteAllAuthentication: () => Promise<void>;
};

export const createSessionSync = (deps: SessionSyncDeps): SessionSync => {
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? (() => new Date());
  let encryption: SessionEncryption | null = null;

  const getEncryption = async () => {
    encryption ??= await deps.getEncryption();
    return encryption;
  };

  const retried = <T>(operationName: string, operation: () => Promise<T>) =>
    withRetry(operation, {
      ...deps.retry,
      operationName,
      onRetry:
        deps.retry?.onRetry ??
        ((attempt) =>
          logger.debug(
            `Retrying ${attempt.operationName} (${attempt.attempt}/${attempt.maxRetries}) in ${attempt.delayMs}ms`
          )),
    });

  const requirePointer = async (): Promise<GistConfig> => {
    const pointer = await loadGistConfig(deps.configDir);
    if (!pointer) {
      throw GistStorageError.configError(
        "gist_config",
        "No gist config found - store cookies first"
      );
    }
    return pointer;
  };

  const fetchSession = async (
    pointer: GistConfig,
    mode: { interactive: boolean; discardOnFailure: boolean }
  ): Promise<SessionData> => {
    const { transport } = await deps.authenticator.authenticate({
      interactive: mode.interactive,
    });
    const cipher = await getEncryption();

    try {
      const content = await retried("get_gist", () =>
        transport.readGist(pointer.gistId, GIST_FILENAME)
      );
      const blob = fromBase64(content.trim());
      if (!blob) {
        throw GistStorageError.invalidSessionData("Gist content is not valid base64");
      }
      return cipher.decryptSession(blob, now());
    } catch (error) {
      if (mode.discardOnFailure && isGistStorageError(error, ...DISCARD_POINTER_ON)) {
        logger.warn(`Discarding local gist config: ${error.message}`);
        await backupGistConfig(deps.configDir);
        await removeGistConfig(deps.configDir);
      }
      throw error;
    }
  };

  const getSession = async (): Promise<SessionData> => {
    const session = await fetchSession(await requirePointer(), {
      interactive: true,
      discardOnFailure: true,
    });
    if (needsRefresh(session.metadata, now())) {
      logger.info(
        `Stored session expires ${session.metadata.expiresAt}; push again to extend it`
      );
    }
    return session;
  };

  const deleteCookies = async (): Promise<boolean> => {
    const pointer = await loadGistConfig(deps.configDir);
    if (!pointer) {
      logger.debug("No gist config; nothing to delete");
      return false;
    }

    await backupGistConfig(deps.configDir);
    const { transport } = await deps.authenticator.authenticate({ interactive: true });

    try {
      await retried("delete_gist", () => transport.deleteGist(pointer.gistId));
    } catch (error) {
      if (!isGistStorageError(error, "GistNotFound")) {
        throw error;
      }
      logger.debug(`Gist ${pointer.gistId} was already gone`);
    }

    await removeGistConfig(deps.configDir);
    return true;
  };

  return {
    hasCookies: async () => {
      try {
        const pointer = await loadGistConfig(deps.configDir);
        if (!pointer) {
          return false;
        }
        await fetchSession(pointer, { interactive: false, discardOnFailure: false });
        return true;
      } catch (error) {
        logger.debug(
          `No usable stored session: ${error instanceof Error ? error.message : String(error)}`
        );
        return false;
      }
    },

    storeCookies: async (cookies) => {
      const { token, username, transport } = await deps.authenticator.authenticate({
        interactive: true,
      });
      const cipher = await getEncryption();
      const content = toBase64(cipher.encryptSession(createSessionData(cookies, now())));
      const tokenHash = hashToken(token);

      let pointer = await loadGistConfig(deps.configDir);
      if (pointer && pointer.githubUsername !== username) {
        logger.warn(
          `Gist config belongs to ${pointer.githubUsername}, not ${username}; starting a new gist`
        );
        await backupGistConfig(deps.configDir);
        pointer = null;
      }

      if (pointer) {
        const current = pointer;
        try {
          await retried("update_gist", () =>
            transport.updateGist(current.gistId, GIST_FILENAME, content)
          );
          const updated = { ...touchGistConfig(current, now()), tokenHash };
          await saveGistConfig(updated, deps.configDir);
          return updated;
        } catch (error) {
          if (!isGistStorageError(error, "GistNotFound")) {
            throw error;
          }
          logger.warn(`Gist ${current.gistId} no longer exists; creating a new one`);
        }
      }

      const gistId = await retried("create_gist", () =>
        transport.createGist({
          filename: GIST_FILENAME,
          description: GIST_DESCRIPTION,
          content,
        })
      );
      const created = createGistConfig(gistId, username, tokenHash, now());
      await saveGistConfig(created, deps.configDir);
      logger.debug(`Created gist ${gistId}`);
      return created;
    },

    getSession,

    peekSession: async () =>
      fetchSession(await requirePointer(), { interactive: false, discardOnFailure: false }),

    getCookies: async () => (await getSession()).cookies,

    deleteCookies,

    deleteAllAuthentication: async () => {
      await deleteCookies();
      await deps.authenticator.clear();
    },
  };
};
