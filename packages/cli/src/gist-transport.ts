/**
 * GitHub Gist transport
 *
 * Thin wrapper over Octokit that speaks in GistStorageErrors so the
 * retry policy and the orchestrator never see raw HTTP failures.
 */

import { Octokit } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";
import { GistStorageError } from "@session-sync/core";
import { silentLogger, type Logger } from "./logger.js";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_RATE_LIMIT_WAIT_SECONDS = 60;
const USER_AGENT = "session-sync";

export type CreateGistInput = {
  filename: string;
  description: string;
  content: string;
};

/** Remote operations the orchestrator needs */
export type GistTransport = {
  /** Login of the token's owner */
  getAuthenticatedUser: () => Promise<string>;
  /** Create a secret gist and return its id */
  createGist: (input: CreateGistInput) => Promise<string>;
  updateGist: (gistId: string, filename: string, content: string) => Promise<void>;
  readGist: (gistId: string, filename: string) => Promise<string>;
  deleteGist: (gistId: string) => Promise<void>;
};

export type OctokitTransportOptions = {
  timeoutMs?: number;
  baseUrl?: string;
  fetch?: typeof fetch;
  logger?: Logger;
};

type ResponseHeaders = Record<string, string | number | undefined>;

const headerNumber = (headers: ResponseHeaders, name: string): number | null => {
  const value = headers[name];
  if (value === undefined) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/**
 * Seconds to wait before a rate-limited request may be repeated, or
 * null when a 403/429 is not a rate limit
 */
export const rateLimitWaitSeconds = (
  headers: ResponseHeaders,
  now: Date = new Date()
): number | null => {
  const retryAfter = headerNumber(headers, "retry-after");
  if (retryAfter !== null) {
    return Math.max(1, Math.ceil(retryAfter));
  }

  if (headerNumber(headers, "x-ratelimit-remaining") !== 0) {
    return null;
  }

  const reset = headerNumber(headers, "x-ratelimit-reset");
  if (reset === null) {
    return DEFAULT_RATE_LIMIT_WAIT_SECONDS;
  }
  return Math.max(1, Math.ceil(reset - now.getTime() / 1000));
};

/**
 * Translate an Octokit failure into the storage error taxonomy
 */
export const mapGistError = (
  error: unknown,
  operation: string,
  context: { gistId?: string; timeoutMs: number; timedOut: boolean }
): GistStorageError => {
  if (error instanceof GistStorageError) {
    return error;
  }
  if (context.timedOut) {
    return GistStorageError.networkTimeout(context.timeoutMs, operation, error);
  }
  if (!(error instanceof RequestError)) {
    const message = error instanceof Error ? error.message : String(error);
    return GistStorageError.apiRequestFailed(operation, 0, message, error);
  }

  switch (error.status) {
    case 401:
      return GistStorageError.authenticationRequired("GitHub rejected the access token", error);
    case 404:
      if (context.gistId) {
        return GistStorageError.gistNotFound(context.gistId, error);
      }
      break;
    case 403:
    case 429: {
      const wait = rateLimitWaitSeconds(error.response?.headers ?? {});
      if (wait !== null) {
        return GistStorageError.rateLimitExceeded(wait, error);
      }
      break;
    }
  }
  return GistStorageError.apiRequestFailed(operation, error.status, error.message, error);
};

/**
 * Gist transport over the GitHub REST API
 */
export const createOctokitGistTransport = (
  token: string,
  options: OctokitTransportOptions = {}
): GistTransport => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = options.logger ?? silentLogger;
  const octokit = new Octokit({
    auth: token,
    userAgent: USER_AGENT,
    // failures are reported once mapped, so Octokit's own error line stays at debug
    log: {
      debug: (message: string) => logger.debug(message),
      info: (message: string) => logger.debug(message),
      warn: (message: string) => logger.warn(message),
      error: (message: string) => logger.debug(message),
    },
    ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
    ...(options.fetch ? { request: { fetch: options.fetch } } : {}),
  });

  /** Run one request under its own deadline, mapping failures */
  const call = async <T>(
    operation: string,
    run: (signal: AbortSignal) => Promise<T>,
    gistId?: string
  ): Promise<T> => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await run(controller.signal);
    } catch (error) {
      throw mapGistError(error, operation, {
        gistId,
        timeoutMs,
        timedOut: controller.signal.aborted,
      });
    } finally {
      clearTimeout(timer);
    }
  };

  return {
    getAuthenticatedUser: () =>
      call("get_user", async (signal) => {
        const { data } = await octokit.rest.users.getAuthenticated({ request: { signal } });
        return data.login;
      }),

    createGist: (input) =>
      call("create_gist", async (signal) => {
        const { data, status } = await octokit.rest.gists.create({
          description: input.description,
          public: false,
          files: { [input.filename]: { content: input.content } },
          request: { signal },
        });
        if (!data.id) {
          throw GistStorageError.apiRequestFailed("create_gist", status, "Response has no gist id");
        }
        return data.id;
      }),

    updateGist: (gistId, filename, content) =>
      call(
        "update_gist",
        async (signal) => {
          await octokit.rest.gists.update({
            gist_id: gistId,
            files: { [filename]: { content } },
            request: { signal },
          });
        },
        gistId
      ),

    readGist: (gistId, filename) =>
      call(
        "get_gist",
        async (signal) => {
          const { data } = await octokit.rest.gists.get({ gist_id: gistId, request: { signal } });
          const file = data.files?.[filename];
          if (!file) {
            throw GistStorageError.invalidSessionData(`Gist has no ${filename} file`);
          }
          if (file.truncated) {
            if (!file.raw_url) {
              throw GistStorageError.invalidSessionData(`${filename} is truncated and has no raw URL`);
            }
            // large files come back truncated; the raw URL serves the whole content
            const raw = await octokit.request(`GET ${file.raw_url}`, { request: { signal } });
            const content: unknown = raw.data;
            if (typeof content !== "string") {
              throw GistStorageError.invalidSessionData(`${filename} raw content is not text`);
            }
            return content;
          }
          if (typeof file.content !== "string") {
            throw GistStorageError.invalidSessionData(`${filename} has no content`);
          }
          return file.content;
        },
        gistId
      ),

    deleteGist: (gistId) =>
      call(
        "delete_gist",
        async (signal) => {
          await octokit.rest.gists.delete({ gist_id: gistId, request: { signal } });
        },
        gistId
      ),
  };
};
