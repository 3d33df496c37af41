/**
 * Unit tests for the error taxonomy
 */

import { describe, it, expect } from "vitest";
import {
  CsrfError,
  GistStorageError,
  isGistStorageError,
  OAuthError,
  SessionValidationError,
} from "../src/errors.js";

describe("GistStorageError", () => {
  it.each([
    { error: GistStorageError.networkTimeout(30000, "get_gist"), retryable: true },
    { error: GistStorageError.rateLimitExceeded(60), retryable: true },
    { error: GistStorageError.apiRequestFailed("get_gist", 502), retryable: true },
    { error: GistStorageError.apiRequestFailed("get_gist", 500), retryable: true },
    { error: GistStorageError.apiRequestFailed("get_gist", 404), retryable: false },
    { error: GistStorageError.apiRequestFailed("get_gist", 422), retryable: false },
    { error: GistStorageError.encryptionFailed("bad tag"), retryable: false },
    { error: GistStorageError.sessionValidationFailed("expired"), retryable: false },
    { error: GistStorageError.serializationFailed("bad json"), retryable: false },
    { error: GistStorageError.configError("GITHUB_CLIENT_ID", "missing"), retryable: false },
    { error: GistStorageError.authenticationRequired("no token"), retryable: false },
    { error: GistStorageError.gistNotFound("abc123"), retryable: false },
    { error: GistStorageError.invalidSessionData("not base64"), retryable: false },
    { error: new GistStorageError({ kind: "ClientNotInitialized" }), retryable: false },
  ])("$error.kind is retryable: $retryable", ({ error, retryable }) => {
    expect(error.isRetryable()).toBe(retryable);
  });

  it("suggests the advertised wait for rate limits", () => {
    expect(GistStorageError.rateLimitExceeded(42).retryDelay()).toBe(42000);
  });

  it("suggests a short fixed wait for server errors", () => {
    expect(GistStorageError.apiRequestFailed("update_gist", 503).retryDelay()).toBe(5000);
  });

  it("suggests no wait for anything else", () => {
    expect(GistStorageError.apiRequestFailed("update_gist", 400).retryDelay()).toBeNull();
    expect(GistStorageError.networkTimeout(1000, "get_gist").retryDelay()).toBeNull();
    expect(GistStorageError.encryptionFailed("x").retryDelay()).toBeNull();
  });

  it("names the operation for transport errors only", () => {
    expect(GistStorageError.apiRequestFailed("create_gist", 500).operationContext()).toBe(
      "create_gist"
    );
    expect(GistStorageError.networkTimeout(1000, "get_user").operationContext()).toBe("get_user");
    expect(GistStorageError.gistNotFound("abc").operationContext()).toBeNull();
  });

  it("formats readable messages", () => {
    expect(GistStorageError.apiRequestFailed("get_gist", 500, "Server Error").message).toBe(
      "GitHub API request failed: get_gist - HTTP 500 (Server Error)"
    );
    expect(GistStorageError.configError("GITHUB_CLIENT_ID", "too short").message).toBe(
      "Configuration error in GITHUB_CLIENT_ID: too short"
    );
    expect(GistStorageError.networkTimeout(30000, "get_gist").message).toBe(
      "Network timeout after 30000ms during get_gist"
    );
    expect(GistStorageError.gistNotFound("abc123").message).toBe("Gist not found: abc123");
  });

  it("keeps the cause", () => {
    const cause = new Error("socket hang up");

    expect(GistStorageError.apiRequestFailed("get_gist", 500, null, cause).cause).toBe(cause);
  });
});

describe("isGistStorageError", () => {
  it("narrows by kind", () => {
    const error: unknown = GistStorageError.gistNotFound("abc");

    expect(isGistStorageError(error)).toBe(true);
    expect(isGistStorageError(error, "GistNotFound", "InvalidSessionData")).toBe(true);
    expect(isGistStorageError(error, "EncryptionFailed")).toBe(false);
    expect(isGistStorageError(new Error("plain"))).toBe(false);
  });
});

describe("SessionValidationError", () => {
  it("exposes the reason kind", () => {
    const error = new SessionValidationError({ kind: "ContentHashMismatch" });

    expect(error.kind).toBe("ContentHashMismatch");
    expect(error.message).toBe("Content hash mismatch - possible tampering");
    expect(error.name).toBe("SessionValidationError");
  });
});

describe("OAuthError", () => {
  it("carries its kind", () => {
    expect(new OAuthError("denied by user", "denied").kind).toBe("denied");
  });

  it("treats CSRF failures as a distinct subclass", () => {
    const error = new CsrfError("OAuth state mismatch");

    expect(error).toBeInstanceOf(OAuthError);
    expect(error.kind).toBe("csrf");
  });
});
