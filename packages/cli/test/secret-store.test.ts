/**
 * Unit tests for the secret store backends, with the OS tools faked
 */

import { describe, it, expect, vi } from "vitest";
import {
  createMacOSKeychainStore,
  createMemorySecretStore,
  createPlatformSecretStore,
  createSecretServiceStore,
  createWindowsVaultStore,
  SecretStoreError,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from "../src/secret-store.js";

const result = (code: number, stdout = "", stderr = ""): CommandResult => ({
  code,
  stdout,
  stderr,
});

const fakeRunner = (...results: CommandResult[]) => {
  const queue = [...results];
  return vi.fn<CommandRunner>(async (_command: string, _args: readonly string[], _options?: CommandOptions) => {
    const next = queue.shift();
    if (!next) throw new Error("unexpected command");
    return next;
  });
};

describe("macOS keychain store", () => {
  it("reads a generic password", async () => {
    const run = fakeRunner(result(0, "c2VjcmV0\n"));
    const store = createMacOSKeychainStore("session-sync", run);

    expect(await store.get("github-oauth-token")).toBe("c2VjcmV0");
    expect(run).toHaveBeenCalledWith("security", [
      "find-generic-password",
      "-s",
      "session-sync",
      "-a",
      "github-oauth-token",
      "-w",
    ]);
  });

  it("returns null for a missing item", async () => {
    const store = createMacOSKeychainStore("session-sync", fakeRunner(result(44)));

    expect(await store.get("missing")).toBeNull();
  });

  it("updates in place when storing", async () => {
    const run = fakeRunner(result(0));
    await createMacOSKeychainStore("session-sync", run).set("entry", "test-secret");

    expect(run.mock.calls[0]?.[1]).toEqual([
      "add-generic-password",
      "-U",
      "-s",
      "session-sync",
      "-a",
      "entry",
      "-w",
      "test-secret",
    ]);
  });

  it("ignores deleting a missing item", async () => {
    const store = createMacOSKeychainStore("session-sync", fakeRunner(result(44)));

    await expect(store.delete("missing")).resolves.toBeUndefined();
  });

  it("reports other failures with the tool's message", async () => {
    const store = createMacOSKeychainStore(
      "session-sync",
      fakeRunner(result(51, "", "User interaction is not allowed."))
    );

    await expect(store.get("entry")).rejects.toThrow(
      "macOS Keychain: lookup failed (exit 51): User interaction is not allowed."
    );
  });
});

describe("Secret Service store", () => {
  it("passes the secret on stdin, not argv", async () => {
    const run = fakeRunner(result(0));
    await createSecretServiceStore("session-sync", run).set("entry", "test-secret");

    const [command, args, options] = run.mock.calls[0] ?? [];
    expect(command).toBe("secret-tool");
    expect(args).toEqual([
      "store",
      "--label=session-sync entry",
      "service",
      "session-sync",
      "account",
      "entry",
    ]);
    expect(options).toEqual({ input: "test-secret" });
  });

  it("returns null when nothing matches", async () => {
    const store = createSecretServiceStore("session-sync", fakeRunner(result(1)));

    expect(await store.get("entry")).toBeNull();
  });

  it("returns the stored value", async () => {
    const store = createSecretServiceStore("session-sync", fakeRunner(result(0, "test-secret")));

    expect(await store.get("entry")).toBe("test-secret");
  });

  it("wraps a missing tool in a SecretStoreError", async () => {
    const run = vi.fn<CommandRunner>(async () => {
      throw new Error("spawn secret-tool ENOENT");
    });
    const store = createSecretServiceStore("session-sync", run);

    await expect(store.get("entry")).rejects.toBeInstanceOf(SecretStoreError);
  });
});

describe("Windows vault store", () => {
  it("passes names and values through the environment", async () => {
    const run = fakeRunner(result(0));
    await createWindowsVaultStore("session-sync", run).set("entry", "test-secret");

    const [command, args, options] = run.mock.calls[0] ?? [];
    expect(command).toBe("powershell.exe");
    expect(args?.slice(0, 3)).toEqual(["-NoProfile", "-NonInteractive", "-Command"]);
    expect(args?.join(" ")).not.toContain("test-secret");
    expect(options?.env).toMatchObject({
      SESSION_SYNC_RESOURCE: "session-sync",
      SESSION_SYNC_KEY: "entry",
      SESSION_SYNC_VALUE: "test-secret",
    });
  });

  it("returns null for a missing credential", async () => {
    const store = createWindowsVaultStore("session-sync", fakeRunner(result(44)));

    expect(await store.get("entry")).toBeNull();
  });
});

describe("memory store", () => {
  it("stores, reads and deletes", async () => {
    const store = createMemorySecretStore({ existing: "value" });

    await store.set("entry", "test-secret");
    expect(await store.get("entry")).toBe("test-secret");
    expect(await store.get("existing")).toBe("value");

    await store.delete("entry");
    expect(await store.get("entry")).toBeNull();
    expect(store.entries()).toEqual({ existing: "value" });
  });
});

describe("createPlatformSecretStore", () => {
  it.each([
    { platform: "darwin" as const, name: "macOS Keychain" },
    { platform: "linux" as const, name: "Secret Service" },
    { platform: "win32" as const, name: "Windows Credential Locker" },
  ])("picks $name on $platform", ({ platform, name }) => {
    expect(createPlatformSecretStore(platform, fakeRunner()).name).toBe(name);
  });
});
