/**
 * Status command - show what is stored where
 */

import * as p from "@clack/prompts";
import { timeUntilExpiration, type SessionData } from "@session-sync/core";
import type { SyncContext } from "../context.js";
import { getGistConfigPath, isGistConfigRecent, loadGistConfig } from "../gist-config.js";

/**
 * Format relative time
 */
export const formatRelativeTime = (isoString: string, now: Date = new Date()): string => {
  const date = new Date(isoString);
  const diffMs = now.getTime() - date.getTime();
  const diffMins = Math.floor(diffMs / 60000);
  const diffHours = Math.floor(diffMins / 60);
  const diffDays = Math.floor(diffHours / 24);

  if (diffMins < 1) return "just now";
  if (diffMins < 60) return `${diffMins} min${diffMins === 1 ? "" : "s"} ago`;
  if (diffHours < 24) return `${diffHours} hour${diffHours === 1 ? "" : "s"} ago`;
  if (diffDays < 30) return `${diffDays} day${diffDays === 1 ? "" : "s"} ago`;
  return date.toLocaleDateString();
};

/**
 * Format a remaining duration, coarsest unit only
 */
export const formatRemaining = (ms: number): string => {
  const hours = Math.floor(ms / 3_600_000);
  const days = Math.floor(hours / 24);

  if (ms <= 0) return "expired";
  if (days > 0) return `${days} day${days === 1 ? "" : "s"} left`;
  if (hours > 0) return `${hours} hour${hours === 1 ? "" : "s"} left`;
  return "less than an hour left";
};

/**
 * Run the status command
 */
export const runStatus = async (ctx: SyncContext) => {
  const pointer = await loadGistConfig(ctx.configDir);
  const tokenStored = await ctx.authenticator.hasStoredToken();

  let session: SessionData | null = null;
  let problem: string | null = null;

  if (pointer && tokenStored) {
    const spinner = p.spinner();
    spinner.start("Checking stored session...");
    try {
      session = await ctx.sync.peekSession();
      spinner.stop("Session checked");
    } catch (error) {
      problem = error instanceof Error ? error.message : String(error);
      spinner.stop("Session unavailable");
    }
  }

  console.log("");
  console.log("Sync Status");
  console.log(`├── Config: ${getGistConfigPath(ctx.configDir)}`);
  console.log(`├── GitHub token: ${tokenStored ? `stored in ${ctx.secretStore.name}` : "not stored"}`);

  if (pointer) {
    const recent = isGistConfigRecent(pointer) ? "" : " (stale)";
    console.log(`├── Gist: ${pointer.gistId} (${pointer.githubUsername})`);
    console.log(`├── Last sync: ${formatRelativeTime(pointer.lastSync)}${recent}`);
  } else {
    console.log("├── Gist: (none)");
  }
  console.log("│");

  if (session) {
    const cookieCount = Object.keys(session.cookies).length;
    console.log(`├── ✓ ${cookieCount} cookie${cookieCount === 1 ? "" : "s"} stored`);
    console.log(`├── Platforms: ${session.metadata.platforms.join(", ") || "(none)"}`);
    console.log(`└── Expires: ${formatRemaining(timeUntilExpiration(session.metadata))}`);
  } else if (problem) {
    console.log(`└── ✗ ${problem}`);
  } else {
    console.log("└── ○ no session stored");
  }

  console.log("");

  if (!tokenStored) {
    p.log.info("Run 'session-sync login' to connect to GitHub.");
  } else if (!session) {
    p.log.info("Run 'session-sync push <file>' to store a session.");
  }
};
