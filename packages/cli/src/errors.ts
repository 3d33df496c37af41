/**
 * User-facing error messages
 */

import { GistStorageError, OAuthError } from "@session-sync/core";

/**
 * One line for the terminal, with a hint where the fix is known
 */
export const describeError = (error: unknown): string => {
  if (error instanceof OAuthError && error.kind === "csrf") {
    return `${error.message}. Authorization aborted; nothing was saved.`;
  }

  if (error instanceof GistStorageError) {
    const { detail } = error;
    switch (detail.kind) {
      case "ConfigError":
        return detail.field === "gist_config"
          ? `${error.message}. Run 'session-sync push <file>' first.`
          : error.message;
      case "GistNotFound":
      case "InvalidSessionData":
      case "SessionValidationFailed":
        return `${error.message}. Push the session again to replace it.`;
      default:
        return error.message;
    }
  }

  return error instanceof Error ? error.message : String(error);
};
