#!/usr/bin/env node

/**
 * session-sync CLI
 *
 * Keep CLI session cookies in an encrypted secret gist and restore them on other devices.
 */

import * as p from "@clack/prompts";
import { createSyncContext } from "./context.js";
import { describeError } from "./errors.js";
import { logger } from "./logger.js";
import { runInteractiveMenu } from "./menu.js";
import { runKeyExport, runKeyImport } from "./commands/key.js";
import { runLogin } from "./commands/login.js";
import { runLogout } from "./commands/logout.js";
import { runPull } from "./commands/pull.js";
import { runPush } from "./commands/push.js";
import { runReset } from "./commands/reset.js";
import { runRestore } from "./commands/restore.js";
import { runStatus } from "./commands/status.js";

const VERSION = "0.1.0";

const showHelp = (): void => {
  console.log(`
session-sync v${VERSION}
Sync encrypted session cookies across devices through a secret GitHub gist

Usage:
  session-sync [command] [options]

Commands:
  (no command)        Interactive menu
  login               Authorize with GitHub
  logout              Forget the stored GitHub token
  status              Show the stored session
  push [file]         Encrypt and upload a cookie JSON file (or stdin)
  pull [file]         Download and decrypt the cookies (to stdout or file)
  reset               Delete the gist, the local gist config and the token
  restore             Restore the gist config from its backup
  key export          Print the master key for another device
  key import <key>    Store a master key exported from another device
  help                Show this help message

Environment:
  GITHUB_CLIENT_ID        OAuth app client id (required for login)
  GITHUB_CLIENT_SECRET    OAuth app client secret (required for login)
  GITHUB_CALLBACK_URL     Callback URL (default http://localhost:8080/auth/github/callback)
  SESSION_SYNC_CONFIG_DIR Config directory override
  SESSION_SYNC_LOG_LEVEL  debug | info | warn | error

Options:
  --version, -v       Show version
  --help, -h          Show help
`);
};

const main = async (): Promise<void> => {
  const args = process.argv.slice(2);
  const command = args[0];

  // Handle flags
  if (command === "--version" || command === "-v") {
    console.log(VERSION);
    return;
  }

  if (command === "--help" || command === "-h" || command === "help") {
    showHelp();
    return;
  }

  const ctx = createSyncContext();

  // Route to command
  switch (command) {
    case undefined:
      await runInteractiveMenu(ctx);
      break;

    case "login":
      await runLogin(ctx);
      break;

    case "logout":
      await runLogout(ctx);
      break;

    case "status":
      await runStatus(ctx);
      break;

    case "push":
      await runPush(ctx, { file: args[1] });
      break;

    case "pull":
      await runPull(ctx, { file: args[1] });
      break;

    case "reset":
      await runReset(ctx);
      break;

    case "restore":
      await runRestore(ctx);
      break;

    case "key": {
      const action = args[1];
      const value = args[2];
      if (action === "export") {
        await runKeyExport(ctx);
      } else if (action === "import" && value) {
        await runKeyImport(ctx, value);
      } else {
        p.log.error("Usage: session-sync key export | session-sync key import <key>");
        process.exitCode = 1;
      }
      break;
    }

    default:
      p.log.error(`Unknown command: ${command}`);
      showHelp();
      process.exit(1);
  }
};

main().catch((error: unknown) => {
  p.log.error(describeError(error));
  if (error instanceof Error && error.cause !== undefined) {
    logger.debug(`Caused by: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`);
  }
  process.exit(1);
});
