/**
 * Throwaway config directories
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

export const createTempDir = (prefix = "session-sync-test-") =>
  mkdtemp(join(tmpdir(), prefix));

export const removeTempDir = (dir: string) => rm(dir, { recursive: true, force: true });
