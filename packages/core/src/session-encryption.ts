/**
 * Session encryption keyed from a master secret in the OS secret store
 */

import type { KeyObject } from "node:crypto";
import {
  AES_KEY_LENGTH,
  deriveSessionKey,
  fromBase64,
  generateMasterKey,
  open,
  seal,
  toBase64,
} from "./crypto.js";
import { GistStorageError, SessionValidationError } from "./errors.js";
import {
  parseSessionData,
  serializeSessionData,
  validateSessionData,
} from "./session.js";
import type { EncryptedBlob, SecretStore, SessionData } from "./types.js";

/** Secret store entry holding the base64 master secret */
export const MASTER_KEY_ENTRY = "session-encryption-master-key";

/**
 * Fetch the master secret, generating and storing one on first use
 */
export const getOrCreateMasterKey = async (
  store: SecretStore
): Promise<Uint8Array> => {
  let stored: string | null;
  try {
    stored = await store.get(MASTER_KEY_ENTRY);
  } catch (error) {
    throw GistStorageError.encryptionFailed(
      `Failed to read master key from ${store.name}`,
      error
    );
  }

  if (stored !== null) {
    const key = fromBase64(stored.trim());
    if (!key || key.length !== AES_KEY_LENGTH) {
      throw GistStorageError.encryptionFailed(
        `Master key in ${store.name} is malformed`
      );
    }
    return key;
  }

  const key = generateMasterKey();
  try {
    await store.set(MASTER_KEY_ENTRY, toBase64(key));
  } catch (error) {
    throw GistStorageError.encryptionFailed(
      `Failed to store master key in ${store.name}`,
      error
    );
  }
  return key;
};

/**
 * Authenticated encryption of session payloads
 */
export class SessionEncryption {
  private constructor(private readonly key: KeyObject) {}

  /** Load (or provision) the master secret and derive the cipher key */
  static async create(store: SecretStore): Promise<SessionEncryption> {
    return SessionEncryption.fromMasterKey(await getOrCreateMasterKey(store));
  }

  /** Derive from raw master bytes; the buffer is wiped */
  static fromMasterKey(masterKey: Uint8Array): SessionEncryption {
    return new SessionEncryption(deriveSessionKey(masterKey));
  }

  seal(plaintext: Uint8Array): EncryptedBlob {
    return seal(plaintext, this.key);
  }

  open(blob: EncryptedBlob): Uint8Array {
    return open(blob, this.key);
  }

  encryptSession(session: SessionData): EncryptedBlob {
    return this.seal(serializeSessionData(session));
  }

  /**
   * Open, parse and validate. Validation failures are reported as
   * SessionValidationFailed with the specific reason as `cause`.
   */
  decryptSession(blob: EncryptedBlob, now: Date = new Date()): SessionData {
    const session = parseSessionData(this.open(blob));

    try {
      validateSessionData(session, now);
    } catch (error) {
      if (error instanceof SessionValidationError) {
        throw GistStorageError.sessionValidationFailed(error.message, error);
      }
      throw error;
    }
    return session;
  }
}
