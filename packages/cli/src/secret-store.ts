/**
 * OS secret store backends
 *
 * Each backend shells out to the platform's own tool so no native
 * module is needed: `security` on macOS, `secret-tool` (libsecret) on
 * Linux and the WinRT PasswordVault through PowerShell on Windows.
 * Secret values never appear in argv except for `security`, which has
 * no stdin mode for passwords.
 */

import { spawn } from "node:child_process";
import type { SecretStore } from "@session-sync/core";
import { SECRET_SERVICE } from "./config.js";

export class SecretStoreError extends Error {
  override name = "SecretStoreError";

  constructor(
    public readonly backend: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`${backend}: ${message}`, options);
  }
}

export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  input?: string;
  env?: NodeJS.ProcessEnv;
};

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Run a command to completion, capturing its output
 */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: options.env ?? process.env,
      stdio: ["pipe", "pipe", "pipe"],
      windowsHide: true,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", reject);
    child.on("close", (code) => {
      resolve({
        code: code ?? 1,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      });
    });

    child.stdin.end(options.input ?? "");
  });

const invoke = async (
  backend: string,
  run: CommandRunner,
  command: string,
  args: readonly string[],
  options?: CommandOptions
): Promise<CommandResult> => {
  try {
    return await run(command, args, options);
  } catch (error) {
    throw new SecretStoreError(backend, `failed to run ${command}`, { cause: error });
  }
};

const failure = (backend: string, action: string, result: CommandResult) =>
  new SecretStoreError(
    backend,
    `${action} failed (exit ${result.code})${result.stderr.trim() ? `: ${result.stderr.trim()}` : ""}`
  );

/** `security` exit status for a missing item */
const MACOS_ITEM_NOT_FOUND = 44;

/**
 * macOS login keychain, generic password items
 */
export const createMacOSKeychainStore = (
  service: string = SECRET_SERVICE,
  run: CommandRunner = runCommand
): SecretStore => {
  const name = "macOS Keychain";

  return {
    name,
    get: async (key) => {
      const result = await invoke(name, run, "security", [
        "find-generic-password",
        "-s",
        service,
        "-a",
        key,
        "-w",
      ]);
      if (result.code === MACOS_ITEM_NOT_FOUND) return null;
      if (result.code !== 0) throw failure(name, "lookup", result);
      return result.stdout.replace(/\n$/, "");
    },
    set: async (key, value) => {
      const result = await invoke(name, run, "security", [
        "add-generic-password",
        "-U",
        "-s",
        service,
        "-a",
        key,
        "-w",
        value,
      ]);
      if (result.code !== 0) throw failure(name, "store", result);
    },
    delete: async (key) => {
      const result = await invoke(name, run, "security", [
        "delete-generic-password",
        "-s",
        service,
        "-a",
        key,
      ]);
      if (result.code !== 0 && result.code !== MACOS_ITEM_NOT_FOUND) {
        throw failure(name, "delete", result);
      }
    },
  };
};

/**
 * freedesktop Secret Service via libsecret's secret-tool
 */
export const createSecretServiceStore = (
  service: string = SECRET_SERVICE,
  run: CommandRunner = runCommand
): SecretStore => {
  const name = "Secret Service";
  const attributes = (key: string) => ["service", service, "account", key];

  return {
    name,
    get: async (key) => {
      const result = await invoke(name, run, "secret-tool", ["lookup", ...attributes(key)]);
      // secret-tool exits 1 with no output when nothing matches
      if (result.code !== 0) {
        if (result.stdout === "" && result.stderr.trim() === "") return null;
        throw failure(name, "lookup", result);
      }
      return result.stdout.replace(/\n$/, "");
    },
    set: async (key, value) => {
      const result = await invoke(
        name,
        run,
        "secret-tool",
        ["store", `--label=${service} ${key}`, ...attributes(key)],
        { input: value }
      );
      if (result.code !== 0) throw failure(name, "store", result);
    },
    delete: async (key) => {
      const result = await invoke(name, run, "secret-tool", ["clear", ...attributes(key)]);
      if (result.code !== 0 && result.stderr.trim() !== "") {
        throw failure(name, "delete", result);
      }
    },
  };
};

const VAULT_PRELUDE = [
  "$ErrorActionPreference = 'Stop'",
  "[void][Windows.Security.Credentials.PasswordVault,Windows.Security.Credentials,ContentType=WindowsRuntime]",
  "$vault = New-Object Windows.Security.Credentials.PasswordVault",
].join("; ");

const VAULT_SCRIPTS = {
  get: `${VAULT_PRELUDE}; try { $c = $vault.Retrieve($env:SESSION_SYNC_RESOURCE, $env:SESSION_SYNC_KEY) } catch { exit 44 }; $c.RetrievePassword(); [Console]::Out.Write($c.Password)`,
  set: `${VAULT_PRELUDE}; try { $vault.Remove($vault.Retrieve($env:SESSION_SYNC_RESOURCE, $env:SESSION_SYNC_KEY)) } catch { }; $vault.Add((New-Object Windows.Security.Credentials.PasswordCredential($env:SESSION_SYNC_RESOURCE, $env:SESSION_SYNC_KEY, $env:SESSION_SYNC_VALUE)))`,
  delete: `${VAULT_PRELUDE}; try { $vault.Remove($vault.Retrieve($env:SESSION_SYNC_RESOURCE, $env:SESSION_SYNC_KEY)) } catch { }`,
};

const VAULT_ITEM_NOT_FOUND = 44;

/**
 * Windows Credential Locker (PasswordVault) through PowerShell.
 * Values travel in environment variables of the child process only.
 */
export const createWindowsVaultStore = (
  service: string = SECRET_SERVICE,
  run: CommandRunner = runCommand
): SecretStore => {
  const name = "Windows Credential Locker";

  const powershell = (script: string, key: string, value?: string) =>
    invoke(
      name,
      run,
      "powershell.exe",
      ["-NoProfile", "-NonInteractive", "-Command", script],
      {
        env: {
          ...process.env,
          SESSION_SYNC_RESOURCE: service,
          SESSION_SYNC_KEY: key,
          ...(value === undefined ? {} : { SESSION_SYNC_VALUE: value }),
        },
      }
    );

  return {
    name,
    get: async (key) => {
      const result = await powershell(VAULT_SCRIPTS.get, key);
      if (result.code === VAULT_ITEM_NOT_FOUND) return null;
      if (result.code !== 0) throw failure(name, "lookup", result);
      return result.stdout;
    },
    set: async (key, value) => {
      const result = await powershell(VAULT_SCRIPTS.set, key, value);
      if (result.code !== 0) throw failure(name, "store", result);
    },
    delete: async (key) => {
      const result = await powershell(VAULT_SCRIPTS.delete, key);
      if (result.code !== 0) throw failure(name, "delete", result);
    },
  };
};

/**
 * Process-local store, for tests and for hosts without a secret service
 */
export const createMemorySecretStore = (
  initial: Record<string, string> = {}
): SecretStore & { entries: () => Record<string, string> } => {
  const values = new Map(Object.entries(initial));

  return {
    name: "memory",
    get: async (key) => values.get(key) ?? null,
    set: async (key, value) => {
      values.set(key, value);
    },
    delete: async (key) => {
      values.delete(key);
    },
    entries: () => Object.fromEntries(values),
  };
};

/**
 * Pick the backend for the current OS
 */
export const createPlatformSecretStore = (
  platform: NodeJS.Platform = process.platform,
  run: CommandRunner = runCommand
): SecretStore => {
  switch (platform) {
    case "darwin":
      return createMacOSKeychainStore(SECRET_SERVICE, run);
    case "win32":
      return createWindowsVaultStore(SECRET_SERVICE, run);
    default:
      return createSecretServiceStore(SECRET_SERVICE, run);
  }
};
