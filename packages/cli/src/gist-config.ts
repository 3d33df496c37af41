/**
 * Local sync pointer
 *
 * Records which secret gist holds this user's encrypted session. The
 * file is the only local state besides the secret store entries.
 */

import {
  chmod,
  copyFile,
  mkdir,
  readFile,
  rename,
  stat,
  unlink,
  writeFile,
} from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { GistStorageError, type GistConfig } from "@session-sync/core";
import { getConfigDir } from "./config.js";

const GIST_CONFIG_FILE = "github-gist-config.json";
const BACKUP_SUFFIX = ".backup";

export const GIST_CONFIG_VERSION = 1;

/** A pointer counts as recent when synced within this many days */
const RECENT_SYNC_DAYS = 30;

const isoTimestamp = (field: string) =>
  z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), `${field} must be an ISO timestamp`);

const GistConfigSchema = z.object({
  gistId: z.string().trim().min(1, "Gist ID cannot be empty"),
  githubUsername: z.string().trim().min(1, "GitHub username cannot be empty"),
  tokenHash: z
    .string()
    .regex(/^[0-9a-f]{64}$/, "Token hash must be 64 lowercase hex characters"),
  lastSync: isoTimestamp("lastSync"),
  createdAt: isoTimestamp("createdAt"),
  version: z.number().int().nonnegative(),
});

/**
 * Get the pointer file path
 */
export const getGistConfigPath = (configDir: string = getConfigDir()): string =>
  join(configDir, GIST_CONFIG_FILE);

/**
 * Get the backup path beside the pointer file
 */
export const getGistConfigBackupPath = (configDir: string = getConfigDir()): string =>
  `${getGistConfigPath(configDir)}${BACKUP_SUFFIX}`;

export const createGistConfig = (
  gistId: string,
  githubUsername: string,
  tokenHash: string,
  now: Date = new Date()
): GistConfig => ({
  gistId,
  githubUsername,
  tokenHash,
  lastSync: now.toISOString(),
  createdAt: now.toISOString(),
  version: GIST_CONFIG_VERSION,
});

/** Copy with `lastSync` moved to now */
export const touchGistConfig = (
  config: GistConfig,
  now: Date = new Date()
): GistConfig => ({ ...config, lastSync: now.toISOString() });

/**
 * Validate an untrusted value as a pointer record.
 * Throws ConfigError naming the first bad field.
 */
export const validateGistConfig = (value: unknown): GistConfig => {
  const result = GistConfigSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw GistStorageError.configError(
      issue && issue.path.length > 0 ? issue.path.join(".") : "gist_config",
      issue?.message ?? "Invalid gist config"
    );
  }
  return result.data;
};

export const isGistConfigRecent = (
  config: GistConfig,
  now: Date = new Date()
): boolean => {
  const elapsed = now.getTime() - Date.parse(config.lastSync);
  return elapsed <= RECENT_SYNC_DAYS * 24 * 60 * 60 * 1000;
};

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Load the pointer. Returns null when the file is absent or blank.
 */
export const loadGistConfig = async (
  configDir: string = getConfigDir()
): Promise<GistConfig | null> => {
  let content: string;
  try {
    content = await readFile(getGistConfigPath(configDir), "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw GistStorageError.configError("gist_config", "Failed to read gist config", error);
  }

  if (content.trim() === "") {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw GistStorageError.serializationFailed("Gist config is not valid JSON", error);
  }
  return validateGistConfig(parsed);
};

/**
 * Save the pointer (validated, whole-file replace, owner-only)
 */
export const saveGistConfig = async (
  config: GistConfig,
  configDir: string = getConfigDir()
): Promise<void> => {
  const valid = validateGistConfig(config);
  const path = getGistConfigPath(configDir);
  const tempPath = `${path}.${process.pid}.tmp`;

  await mkdir(dirname(path), { recursive: true, mode: 0o700 });
  await writeFile(tempPath, JSON.stringify(valid, null, 2), {
    encoding: "utf-8",
    mode: 0o600,
  });
  await rename(tempPath, path);

  // rename keeps the temp file's mode, but an umask may have loosened it
  await chmod(path, 0o600);
};

/**
 * Copy the pointer to its backup path. Returns false when there is nothing to back up.
 */
export const backupGistConfig = async (
  configDir: string = getConfigDir()
): Promise<boolean> => {
  try {
    await copyFile(getGistConfigPath(configDir), getGistConfigBackupPath(configDir));
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
  await chmod(getGistConfigBackupPath(configDir), 0o600);
  return true;
};

/**
 * Restore the pointer from its backup. The backup is validated first.
 */
export const restoreGistConfigFromBackup = async (
  configDir: string = getConfigDir()
): Promise<GistConfig> => {
  let content: string;
  try {
    content = await readFile(getGistConfigBackupPath(configDir), "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      throw GistStorageError.configError("gist_config_backup", "No backup found");
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw GistStorageError.serializationFailed("Gist config backup is not valid JSON", error);
  }

  const config = validateGistConfig(parsed);
  await saveGistConfig(config, configDir);
  return config;
};

/**
 * Delete the pointer; a missing file is fine
 */
export const removeGistConfig = async (
  configDir: string = getConfigDir()
): Promise<void> => {
  try {
    await unlink(getGistConfigPath(configDir));
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
};

export const gistConfigExists = async (
  configDir: string = getConfigDir()
): Promise<boolean> => {
  try {
    const info = await stat(getGistConfigPath(configDir));
    return info.isFile();
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
};
