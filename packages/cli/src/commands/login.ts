/**
 * Login command - authorize with GitHub
 */

import * as p from "@clack/prompts";
import type { SyncContext } from "../context.js";

/**
 * Run the login command
 */
export const runLogin = async (ctx: SyncContext) => {
  p.intro("Log in to GitHub");

  if (await ctx.authenticator.hasStoredToken()) {
    const again = await p.confirm({
      message: `A GitHub token is already stored in ${ctx.secretStore.name}. Log in again?`,
      initialValue: false,
    });

    if (p.isCancel(again)) {
      p.cancel("Login cancelled.");
      return;
    }

    if (!again) {
      const spinner = p.spinner();
      spinner.start("Checking stored token...");
      const session = await ctx.authenticator.authenticate({ interactive: false });
      spinner.stop(`Logged in as ${session.username}`);
      p.outro("Nothing to do.");
      return;
    }

    await ctx.authenticator.clear();
  }

  p.log.step("Opening GitHub in your browser. Approve access to continue.");
  const session = await ctx.authenticator.authenticate({ interactive: true });

  p.log.success(`Logged in as ${session.username}`);
  p.outro("Token saved. Run 'session-sync push' to store a session.");
};
