/**
 * Pull command - download and decrypt the stored cookie map
 */

import { writeFile } from "node:fs/promises";
import * as p from "@clack/prompts";
import type { SyncContext } from "../context.js";

export type PullOptions = Partial<{
  /** Write the cookie map here instead of stdout */
  file: string;
}>;

/**
 * Run the pull command
 */
export const runPull = async (ctx: SyncContext, options: PullOptions = {}) => {
  const spinner = p.spinner();
  spinner.start("Downloading session...");
  const cookies = await ctx.sync.getCookies();
  const count = Object.keys(cookies).length;
  spinner.stop(`Downloaded ${count} cookie${count === 1 ? "" : "s"}`);

  const json = JSON.stringify(cookies, null, 2);

  if (options.file) {
    await writeFile(options.file, `${json}\n`, { encoding: "utf-8", mode: 0o600 });
    p.log.success(`Wrote ${options.file}`);
    return;
  }

  process.stdout.write(`${json}\n`);
};
