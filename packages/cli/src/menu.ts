/**
 * Interactive menu for the CLI
 */

import * as p from "@clack/prompts";
import type { SyncContext } from "./context.js";
import { runStatus } from "./commands/status.js";
import { runPush } from "./commands/push.js";
import { runPull } from "./commands/pull.js";
import { runLogin } from "./commands/login.js";
import { runLogout } from "./commands/logout.js";
import { runReset } from "./commands/reset.js";
import { runRestore } from "./commands/restore.js";
import { describeError } from "./errors.js";

type MenuAction =
  | "status"
  | "push"
  | "pull"
  | "login"
  | "logout"
  | "reset"
  | "restore"
  | "exit";

const MENU_ACTIONS: readonly MenuAction[] = [
  "status",
  "push",
  "pull",
  "login",
  "logout",
  "reset",
  "restore",
  "exit",
];

const isMenuAction = (value: unknown): value is MenuAction =>
  MENU_ACTIONS.some((action) => action === value);

/**
 * Show the main interactive menu
 */
export const runInteractiveMenu = async (ctx: SyncContext) => {
  p.intro("session-sync");

  let shouldContinue = true;

  while (shouldContinue) {
    const loggedIn = await ctx.authenticator.hasStoredToken();

    const options: { value: MenuAction; label: string; hint?: string }[] = [
      { value: "status", label: "Status", hint: "check the stored session" },
      { value: "push", label: "Push", hint: "upload a cookie file" },
      { value: "pull", label: "Pull", hint: "download the stored cookies" },
    ];

    options.push(
      loggedIn
        ? { value: "logout", label: "Logout", hint: "forget the GitHub token" }
        : { value: "login", label: "Login", hint: "authorize with GitHub" },
      { value: "restore", label: "Restore", hint: "recover the gist config backup" },
      { value: "reset", label: "Reset", hint: "delete everything" },
      { value: "exit", label: "Exit", hint: "quit" }
    );

    const action = await p.select({
      message: "What would you like to do?",
      options,
    });

    if (p.isCancel(action) || !isMenuAction(action)) {
      p.outro("Goodbye!");
      return;
    }

    try {
      switch (action) {
        case "status":
          await runStatus(ctx);
          break;

        case "push": {
          const file = await p.text({
            message: "Path to the cookie JSON file:",
            validate: (value) => (value ? undefined : "A file is required"),
          });
          if (!p.isCancel(file)) {
            await runPush(ctx, { file });
          }
          break;
        }

        case "pull":
          await runPull(ctx);
          break;

        case "login":
          await runLogin(ctx);
          break;

        case "logout":
          await runLogout(ctx);
          break;

        case "restore":
          await runRestore(ctx);
          break;

        case "reset":
          await runReset(ctx);
          break;

        case "exit":
          shouldContinue = false;
          break;
      }
    } catch (error) {
      p.log.error(describeError(error));
    }
  }

  p.outro("Goodbye!");
};
