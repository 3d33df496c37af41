/**
 * Reset command - delete the remote session and all local authentication
 */

import * as p from "@clack/prompts";
import type { SyncContext } from "../context.js";

export const runReset = async (ctx: SyncContext) => {
  const confirm = await p.confirm({
    message: "Delete the session gist, the local gist config and the stored GitHub token?",
    initialValue: false,
  });

  if (p.isCancel(confirm) || !confirm) {
    p.cancel("Reset cancelled.");
    return;
  }

  const spinner = p.spinner();
  spinner.start("Resetting...");
  await ctx.sync.deleteAllAuthentication();
  spinner.stop("Reset complete");

  p.log.info("A backup of the gist config was kept. 'session-sync restore' brings it back.");
};
