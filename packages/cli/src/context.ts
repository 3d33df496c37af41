/**
 * Default wiring of the sync components for this host
 */

import { SessionEncryption, type SecretStore } from "@session-sync/core";
import { getConfigDir, loadOAuthConfig } from "./config.js";
import { createOctokitGistTransport } from "./gist-transport.js";
import { createGitHubAuthenticator, type GitHubAuthenticator } from "./github-auth.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { runOAuthFlow } from "./oauth-flow.js";
import { createPlatformSecretStore } from "./secret-store.js";
import { createSessionSync, type SessionSync } from "./sync.js";

export type SyncContext = {
  configDir: string;
  secretStore: SecretStore;
  authenticator: GitHubAuthenticator;
  sync: SessionSync;
  logger: Logger;
};

export type SyncContextOverrides = Partial<Pick<SyncContext, "configDir" | "secretStore" | "logger">>;

export const createSyncContext = (overrides: SyncContextOverrides = {}): SyncContext => {
  const configDir = overrides.configDir ?? getConfigDir();
  const secretStore = overrides.secretStore ?? createPlatformSecretStore();
  const logger = overrides.logger ?? defaultLogger;

  const authenticator = createGitHubAuthenticator({
    secretStore,
    getOAuthConfig: () => loadOAuthConfig(),
    createTransport: (token) => createOctokitGistTransport(token, { logger }),
    runFlow: (config) =>
      runOAuthFlow(config, {
        logger,
        onStateChange: (state) => logger.debug(`OAuth: ${state.kind}`),
      }),
    logger,
  });

  const sync = createSessionSync({
    authenticator,
    getEncryption: () => SessionEncryption.create(secretStore),
    configDir,
    logger,
  });

  return { configDir, secretStore, authenticator, sync, logger };
};
