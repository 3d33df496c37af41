/**
 * Core types for session-sync
 */

/** Cookie name (optionally namespaced by platform) to raw cookie value */
export type CookieMap = Record<string, string>;

/** Sealed payload: nonce (12 bytes) ‖ ciphertext ‖ authentication tag (16 bytes) */
export type EncryptedBlob = Uint8Array;

/** Metadata wrapped around every synced cookie map */
export type SessionMetadata = {
  /** Format version of the session payload */
  version: number;
  /** ISO timestamp the session object was created */
  createdAt: string;
  /** ISO timestamp of the last update */
  updatedAt: string;
  /** ISO timestamp after which the session is rejected (sliding) */
  expiresAt: string;
  /** Cookie-map keys present in the payload */
  platforms: string[];
  /** 32 alphanumeric characters, generated once per session object */
  sessionId: string;
  /** SHA-256 hex of the canonical cookie serialization */
  contentHash: string;
  /** 16 character identifier of the device that wrote the session */
  deviceId: string;
};

/** Decrypted payload stored in the gist */
export type SessionData = {
  metadata: SessionMetadata;
  cookies: CookieMap;
};

/** GitHub OAuth application settings, loaded once per process */
export type GitHubOAuthConfig = Readonly<{
  clientId: string;
  clientSecret: string;
  callbackUrl: string;
  scopes: readonly string[];
  authorizeUrl: string;
  tokenUrl: string;
}>;

/** Local pointer to the remote gist holding the encrypted session */
export type GistConfig = {
  /** Remote gist identifier */
  gistId: string;
  /** GitHub login that owns the gist */
  githubUsername: string;
  /** SHA-256 hex of the access token used for the last sync */
  tokenHash: string;
  /** ISO timestamp of the last successful sync */
  lastSync: string;
  /** ISO timestamp the pointer was first written */
  createdAt: string;
  /** Pointer format version */
  version: number;
};

/** Key/value secret storage provided by the operating system */
export type SecretStore = {
  /** Human readable backend name */
  readonly name: string;
  /** Read a secret, `null` when the entry does not exist */
  get: (key: string) => Promise<string | null>;
  /** Create or replace a secret */
  set: (key: string, value: string) => Promise<void>;
  /** Delete a secret; no error when the entry does not exist */
  delete: (key: string) => Promise<void>;
};
