/**
 * Session metadata and validation
 *
 * Every cookie map travels inside a SessionData envelope whose metadata
 * carries expiry, identity and an integrity hash of the cookies.
 */

import { z } from "zod";
import { hostname } from "node:os";
import {
  computeContentHash,
  computeFullHash,
  generateAlphanumeric,
  isAlphanumeric,
} from "./crypto.js";
import { GistStorageError, SessionValidationError } from "./errors.js";
import type { CookieMap, SessionData, SessionMetadata } from "./types.js";

export const SESSION_VERSION = 1;
export const SESSION_TTL_DAYS = 30;
export const SESSION_MAX_AGE_DAYS = 90;
export const SESSION_REFRESH_WINDOW_DAYS = 7;
export const SESSION_ID_LENGTH = 32;
export const DEVICE_ID_LENGTH = 16;

const DAY_MS = 24 * 60 * 60 * 1000;

const addDays = (date: Date, days: number): Date => {
  return new Date(date.getTime() + days * DAY_MS);
};

/**
 * Stable per-host identifier: hashed host name, random when unavailable
 */
export const getDeviceId = (host: string = hostname()): string => {
  if (!host) {
    return generateAlphanumeric(DEVICE_ID_LENGTH);
  }
  return computeFullHash(host).slice(0, DEVICE_ID_LENGTH);
};

/**
 * Generate a session identifier
 */
export const generateSessionId = (): string => {
  return generateAlphanumeric(SESSION_ID_LENGTH);
};

/**
 * Create metadata for a new session. The content hash stays empty until
 * the caller supplies cookie content.
 */
export const createSessionMetadata = (
  platforms: string[],
  now: Date = new Date()
): SessionMetadata => {
  return {
    version: SESSION_VERSION,
    createdAt: now.toISOString(),
    updatedAt: now.toISOString(),
    expiresAt: addDays(now, SESSION_TTL_DAYS).toISOString(),
    platforms,
    sessionId: generateSessionId(),
    contentHash: "",
    deviceId: getDeviceId(),
  };
};

/**
 * Refresh metadata after new content; pushes expiry forward (sliding)
 */
export const updateSessionMetadata = (
  metadata: SessionMetadata,
  platforms: string[],
  contentHash: string,
  now: Date = new Date()
): SessionMetadata => {
  return {
    ...metadata,
    updatedAt: now.toISOString(),
    expiresAt: addDays(now, SESSION_TTL_DAYS).toISOString(),
    platforms,
    contentHash,
  };
};

/**
 * Check expiry, age ceiling, identifiers and version
 */
export const validateSessionMetadata = (
  metadata: SessionMetadata,
  now: Date = new Date()
) => {
  const expiresAt = Date.parse(metadata.expiresAt);
  if (Number.isNaN(expiresAt) || now.getTime() > expiresAt) {
    throw new SessionValidationError({
      kind: "Expired",
      expiredAt: metadata.expiresAt,
      currentTime: now.toISOString(),
    });
  }

  const createdAt = Date.parse(metadata.createdAt);
  if (
    Number.isNaN(createdAt) ||
    now.getTime() - createdAt > SESSION_MAX_AGE_DAYS * DAY_MS
  ) {
    throw new SessionValidationError({
      kind: "TooOld",
      createdAt: metadata.createdAt,
      maxAgeDays: SESSION_MAX_AGE_DAYS,
    });
  }

  if (
    metadata.sessionId.length !== SESSION_ID_LENGTH ||
    !isAlphanumeric(metadata.sessionId)
  ) {
    throw new SessionValidationError({
      kind: "InvalidSessionId",
      sessionId: metadata.sessionId,
    });
  }

  if (
    metadata.deviceId.length !== DEVICE_ID_LENGTH ||
    !isAlphanumeric(metadata.deviceId)
  ) {
    throw new SessionValidationError({
      kind: "InvalidDeviceId",
      deviceId: metadata.deviceId,
    });
  }

  if (metadata.version > SESSION_VERSION) {
    throw new SessionValidationError({
      kind: "UnsupportedVersion",
      version: metadata.version,
      supportedVersion: SESSION_VERSION,
    });
  }
};

/**
 * Boolean form of validateSessionMetadata
 */
export const isSessionMetadataValid = (
  metadata: SessionMetadata,
  now: Date = new Date()
): boolean => {
  try {
    validateSessionMetadata(metadata, now);
    return true;
  } catch {
    return false;
  }
};

/**
 * True when less than the refresh window remains before expiry
 */
export const needsRefresh = (
  metadata: SessionMetadata,
  now: Date = new Date()
): boolean => {
  const threshold = now.getTime() + SESSION_REFRESH_WINDOW_DAYS * DAY_MS;
  return threshold > Date.parse(metadata.expiresAt);
};

/**
 * Milliseconds until expiry, 0 once expired
 */
export const timeUntilExpiration = (
  metadata: SessionMetadata,
  now: Date = new Date()
): number => {
  return Math.max(0, Date.parse(metadata.expiresAt) - now.getTime());
};

/**
 * Wrap a cookie map in fresh metadata
 */
export const createSessionData = (
  cookies: CookieMap,
  now: Date = new Date()
): SessionData => {
  const metadata = createSessionMetadata(Object.keys(cookies), now);
  metadata.contentHash = computeContentHash(cookies);
  return { metadata, cookies: { ...cookies } };
};

/**
 * Replace the cookies of an existing session, keeping its identity
 */
export const updateSessionData = (
  session: SessionData,
  cookies: CookieMap,
  now: Date = new Date()
): SessionData => {
  return {
    metadata: updateSessionMetadata(
      session.metadata,
      Object.keys(cookies),
      computeContentHash(cookies),
      now
    ),
    cookies: { ...cookies },
  };
};

/**
 * Metadata checks plus the content hash recomputed from the live cookies
 */
export const validateSessionData = (
  session: SessionData,
  now: Date = new Date()
) => {
  validateSessionMetadata(session.metadata, now);

  if (session.metadata.contentHash !== computeContentHash(session.cookies)) {
    throw new SessionValidationError({ kind: "ContentHashMismatch" });
  }
};

/**
 * Own-property check for a cookie object. zod's record parser skips an own
 * `__proto__` key, so cookie maps are checked in place rather than copied.
 */
export const isCookieMap = (value: unknown): value is CookieMap =>
  typeof value === "object" &&
  value !== null &&
  !Array.isArray(value) &&
  Object.values(value).every((entry) => typeof entry === "string");

const SessionMetadataSchema = z.object({
  version: z.number().int().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string(),
  expiresAt: z.string(),
  platforms: z.array(z.string()),
  sessionId: z.string(),
  contentHash: z.string(),
  deviceId: z.string(),
});

const SessionDataSchema = z.object({
  metadata: SessionMetadataSchema,
  cookies: z.custom<CookieMap>(isCookieMap, "Expected an object of string values"),
});

/**
 * Serialize a session to UTF-8 JSON bytes
 */
export const serializeSessionData = (session: SessionData): Uint8Array => {
  return new TextEncoder().encode(JSON.stringify(session));
};

/**
 * Parse decrypted bytes into a SessionData shape (not yet validated)
 */
export const parseSessionData = (bytes: Uint8Array): SessionData => {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(bytes));
  } catch (error) {
    throw GistStorageError.serializationFailed("Session payload is not JSON", error);
  }

  const result = SessionDataSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join(".") ?? "";
    throw GistStorageError.serializationFailed(
      `Session payload field ${path || "(root)"}: ${issue?.message ?? "invalid"}`,
      result.error
    );
  }
  return result.data;
};
