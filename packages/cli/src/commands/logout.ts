/**
 * Logout command - forget the stored GitHub token
 */

import * as p from "@clack/prompts";
import type { SyncContext } from "../context.js";

/**
 * Run the logout command
 */
export const runLogout = async (ctx: SyncContext) => {
  if (!(await ctx.authenticator.hasStoredToken())) {
    p.log.info("Not logged in.");
    return;
  }

  const confirm = await p.confirm({
    message: "Are you sure you want to logout?",
  });

  if (p.isCancel(confirm) || !confirm) {
    p.cancel("Logout cancelled.");
    return;
  }

  const spinner = p.spinner();
  spinner.start("Logging out...");
  await ctx.authenticator.clear();
  spinner.stop("Logged out");

  p.log.success("Successfully logged out.");
  p.log.info("Your encrypted session remains in its gist. Login again to access it.");
};
