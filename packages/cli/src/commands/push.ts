/**
 * Push command - encrypt a cookie map and upload it
 */

import { readFile } from "node:fs/promises";
import * as p from "@clack/prompts";
import { z } from "zod";
import { GistStorageError, isCookieMap, type CookieMap } from "@session-sync/core";
import type { SyncContext } from "../context.js";

export type PushOptions = Partial<{
  /** JSON file with the cookie map; stdin when absent */
  file: string;
}>;

const CookieMapSchema = z.record(z.string(), z.string());

/**
 * Parse a JSON object of string values into a cookie map
 */
export const parseCookieMap = (text: string): CookieMap => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw GistStorageError.serializationFailed("Cookie input is not valid JSON", error);
  }

  const result = CookieMapSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
    throw GistStorageError.serializationFailed(
      `Cookie input must be an object of string values${where}`
    );
  }
  // the record check skips an own __proto__ key
  if (!isCookieMap(parsed)) {
    throw GistStorageError.serializationFailed(
      'Cookie input must be an object of string values at "__proto__"'
    );
  }
  return parsed;
};

const readStdin = async (): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
};

/**
 * Run the push command
 */
export const runPush = async (ctx: SyncContext, options: PushOptions = {}) => {
  if (!options.file && process.stdin.isTTY) {
    p.log.error("Usage: session-sync push <cookies.json>  (or pipe JSON on stdin)");
    return;
  }

  const text = options.file ? await readFile(options.file, "utf-8") : await readStdin();
  const cookies = parseCookieMap(text);
  const count = Object.keys(cookies).length;

  // Authenticate first so the browser flow is not hidden behind a spinner
  const { username } = await ctx.authenticator.authenticate({ interactive: true });

  const spinner = p.spinner();
  spinner.start(`Uploading ${count} cookie${count === 1 ? "" : "s"}...`);
  const pointer = await ctx.sync.storeCookies(cookies);
  spinner.stop("Session stored");

  p.log.success(`Stored in gist ${pointer.gistId} (${username})`);
};
