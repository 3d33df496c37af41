/**
 * Key command - move the master secret between devices
 *
 * Every device that reads the session needs the same master secret.
 */

import * as p from "@clack/prompts";
import {
  AES_KEY_LENGTH,
  fromBase64,
  GistStorageError,
  getOrCreateMasterKey,
  MASTER_KEY_ENTRY,
  toBase64,
} from "@session-sync/core";
import type { SyncContext } from "../context.js";

/**
 * Print the master secret (creating it on first use)
 */
export const runKeyExport = async (ctx: SyncContext) => {
  const key = await getOrCreateMasterKey(ctx.secretStore);
  p.log.warn("Anyone with this key can decrypt your stored sessions.");
  process.stdout.write(`${toBase64(key)}\n`);
  key.fill(0);
};

/**
 * Store a master secret exported from another device
 */
export const runKeyImport = async (ctx: SyncContext, encoded: string) => {
  const key = fromBase64(encoded.trim());
  if (!key || key.length !== AES_KEY_LENGTH) {
    throw GistStorageError.encryptionFailed(
      `Master key must be ${AES_KEY_LENGTH} bytes of base64`
    );
  }
  key.fill(0);

  if ((await ctx.secretStore.get(MASTER_KEY_ENTRY)) !== null) {
    const replace = await p.confirm({
      message: "Replace the existing master key? Sessions sealed with it become unreadable here.",
      initialValue: false,
    });

    if (p.isCancel(replace) || !replace) {
      p.cancel("Import cancelled.");
      return;
    }
  }

  await ctx.secretStore.set(MASTER_KEY_ENTRY, encoded.trim());
  p.log.success(`Master key saved to ${ctx.secretStore.name}`);
};
