/**
 * Session encryption primitives
 *
 * Key hierarchy:
 * 1. Master secret (random 256-bit, kept in the OS secret store)
 * 2. Cipher key (HKDF-SHA256 of the master secret, salt and context fixed)
 * 3. Session payloads (AES-256-GCM with the cipher key)
 */

import { hkdf } from "@noble/hashes/hkdf";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import {
  randomBytes,
  createCipheriv,
  createDecipheriv,
  createSecretKey,
  timingSafeEqual,
  type KeyObject,
} from "node:crypto";
import { GistStorageError } from "./errors.js";
import type { CookieMap, EncryptedBlob } from "./types.js";

/** AES-256-GCM configuration */
export const AES_KEY_LENGTH = 32; // 256 bits
export const AES_NONCE_LENGTH = 12; // 96 bits (recommended for GCM)
export const AES_TAG_LENGTH = 16; // 128 bits
const AES_ALGORITHM = "aes-256-gcm";

/** HKDF parameters; bump the info string to rotate the cipher key */
const HKDF_SALT = "session-sync-encryption-v1";
const HKDF_INFO = "github-gist-session-storage";

const ALPHANUMERIC =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";
// Largest multiple of 62 below 256; bytes above it are rejected to avoid modulo bias
const ALPHANUMERIC_LIMIT = 248;

/**
 * Generate cryptographically secure random bytes
 */
export const generateRandomBytes = (length: number): Uint8Array => {
  return new Uint8Array(randomBytes(length));
};

/**
 * Generate a random master secret
 */
export const generateMasterKey = (): Uint8Array => {
  return generateRandomBytes(AES_KEY_LENGTH);
};

/**
 * Random ASCII alphanumeric string drawn from the OS CSPRNG
 */
export const generateAlphanumeric = (length: number): string => {
  let result = "";
  while (result.length < length) {
    for (const byte of randomBytes(length * 2)) {
      if (byte >= ALPHANUMERIC_LIMIT) continue;
      result += ALPHANUMERIC.charAt(byte % ALPHANUMERIC.length);
      if (result.length === length) break;
    }
  }
  return result;
};

/**
 * True when every character is an ASCII letter or digit
 */
export const isAlphanumeric = (value: string): boolean => {
  return /^[A-Za-z0-9]*$/.test(value);
};

/**
 * Derive the AES key from the master secret.
 *
 * The derived bytes and the master bytes are zeroed once the key object
 * holds its own copy.
 */
export const deriveSessionKey = (masterKey: Uint8Array): KeyObject => {
  if (masterKey.length !== AES_KEY_LENGTH) {
    throw GistStorageError.encryptionFailed("Master key must be 32 bytes");
  }

  const derived = hkdf(sha256, masterKey, HKDF_SALT, HKDF_INFO, AES_KEY_LENGTH);
  try {
    return createSecretKey(derived);
  } finally {
    derived.fill(0);
    masterKey.fill(0);
  }
};

/**
 * Encrypt with AES-256-GCM, returning nonce ‖ ciphertext ‖ tag.
 * A fresh nonce is drawn on every call.
 */
export const seal = (plaintext: Uint8Array, key: KeyObject): EncryptedBlob => {
  const nonce = generateRandomBytes(AES_NONCE_LENGTH);

  const cipher = createCipheriv(AES_ALGORITHM, key, nonce, {
    authTagLength: AES_TAG_LENGTH,
  });

  const encrypted = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const tag = cipher.getAuthTag();

  const blob = new Uint8Array(nonce.length + encrypted.length + tag.length);
  blob.set(nonce, 0);
  blob.set(encrypted, nonce.length);
  blob.set(tag, nonce.length + encrypted.length);
  return blob;
};

/**
 * Decrypt a blob produced by `seal`. Any authentication failure surfaces
 * as one opaque error.
 */
export const open = (blob: EncryptedBlob, key: KeyObject): Uint8Array => {
  if (blob.length < AES_NONCE_LENGTH + AES_TAG_LENGTH) {
    throw GistStorageError.encryptionFailed("Invalid ciphertext length");
  }

  const nonce = blob.subarray(0, AES_NONCE_LENGTH);
  const ciphertext = blob.subarray(AES_NONCE_LENGTH, blob.length - AES_TAG_LENGTH);
  const tag = blob.subarray(blob.length - AES_TAG_LENGTH);

  try {
    const decipher = createDecipheriv(AES_ALGORITHM, key, nonce, {
      authTagLength: AES_TAG_LENGTH,
    });
    decipher.setAuthTag(tag);

    const decrypted = Buffer.concat([
      decipher.update(ciphertext),
      decipher.final(),
    ]);
    return new Uint8Array(decrypted);
  } catch (error) {
    throw GistStorageError.encryptionFailed(
      "Decryption failed or data tampered",
      error
    );
  }
};

/**
 * Compare two strings in time independent of the first mismatch
 */
export const constantTimeEqual = (a: string, b: string): boolean => {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");

  if (left.length !== right.length) {
    // Still do a full comparison so the length check is the only early exit
    timingSafeEqual(left, left);
    return false;
  }

  return timingSafeEqual(left, right);
};

/**
 * SHA-256 hex digest
 */
export const computeFullHash = (content: string): string => {
  return bytesToHex(sha256(content));
};

/**
 * One-way hash of an access token, stored to detect re-authentication
 */
export const hashToken = (token: string): string => {
  return computeFullHash(token);
};

/**
 * Hash of the canonical cookie serialization (keys sorted)
 */
export const computeContentHash = (cookies: CookieMap): string => {
  const content = Object.keys(cookies)
    .sort()
    .map((key) => `${key}=${cookies[key] ?? ""}`)
    .join("");
  return computeFullHash(content);
};

/**
 * Convert Uint8Array to base64 string
 */
export const toBase64 = (bytes: Uint8Array): string => {
  return Buffer.from(bytes).toString("base64");
};

/**
 * Convert a strict base64 string to Uint8Array, `null` when malformed
 */
export const fromBase64 = (base64: string): Uint8Array | null => {
  const normalized = base64.replace(/\s+/g, "");
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(normalized) || normalized.length % 4 !== 0) {
    return null;
  }
  return new Uint8Array(Buffer.from(normalized, "base64"));
};
