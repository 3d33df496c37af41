/**
 * Restore command - bring back the gist config from its backup
 */

import * as p from "@clack/prompts";
import type { SyncContext } from "../context.js";
import { restoreGistConfigFromBackup } from "../gist-config.js";

export const runRestore = async (ctx: SyncContext) => {
  const config = await restoreGistConfigFromBackup(ctx.configDir);
  p.log.success(`Restored gist config for ${config.gistId} (${config.githubUsername})`);
};
