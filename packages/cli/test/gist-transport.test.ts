/**
 * Tests for the Octokit-backed gist transport, with GitHub faked at the fetch layer
 */

import { describe, it, expect, vi } from "vitest";
import { GistStorageError } from "@session-sync/core";
import { createOctokitGistTransport, rateLimitWaitSeconds } from "../src/gist-transport.js";

type Route = (url: string, init: RequestInit) => Response | Promise<Response>;

const json = (body: unknown, status = 200, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8", ...headers },
  });

const github = (route: Route) =>
  vi.fn<typeof fetch>(async (input, init) => route(String(input), init ?? {}));

const transportWith = (fetchImpl: typeof fetch, timeoutMs?: number) =>
  createOctokitGistTransport("test-token", { fetch: fetchImpl, timeoutMs });

const failureOf = async (run: () => Promise<unknown>) => {
  try {
    await run();
  } catch (error) {
    if (error instanceof GistStorageError) return error.detail;
    throw error;
  }
  throw new Error("expected a GistStorageError");
};

describe("createOctokitGistTransport", () => {
  it("returns the authenticated login", async () => {
    const fetchImpl = github(() => json({ login: "octo-user", id: 1 }));

    expect(await transportWith(fetchImpl).getAuthenticatedUser()).toBe("octo-user");

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(String(url)).toBe("https://api.github.com/user");
    expect(init?.headers).toMatchObject({ authorization: "token test-token" });
  });

  it("creates a secret gist with one file", async () => {
    const fetchImpl = github(() => json({ id: "abc123" }, 201));

    const id = await transportWith(fetchImpl).createGist({
      filename: "cs-cli-session-data.enc",
      description: "managed",
      content: "c2VhbGVk",
    });

    expect(id).toBe("abc123");
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(String(url)).toBe("https://api.github.com/gists");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      description: "managed",
      public: false,
      files: { "cs-cli-session-data.enc": { content: "c2VhbGVk" } },
    });
  });

  it("updates the file of an existing gist", async () => {
    const fetchImpl = github(() => json({ id: "abc123" }));

    await transportWith(fetchImpl).updateGist("abc123", "cs-cli-session-data.enc", "bmV3");

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(String(url)).toBe("https://api.github.com/gists/abc123");
    expect(init?.method).toBe("PATCH");
    expect(JSON.parse(String(init?.body))).toEqual({
      files: { "cs-cli-session-data.enc": { content: "bmV3" } },
    });
  });

  it("reads the content of the named file", async () => {
    const fetchImpl = github(() =>
      json({
        id: "abc123",
        files: {
          "cs-cli-session-data.enc": {
            filename: "cs-cli-session-data.enc",
            content: "c2VhbGVk",
            truncated: false,
          },
        },
      })
    );

    expect(await transportWith(fetchImpl).readGist("abc123", "cs-cli-session-data.enc")).toBe(
      "c2VhbGVk"
    );
  });

  it("reads a truncated file from its raw URL", async () => {
    const rawUrl = "https://gist.githubusercontent.com/octo-user/abc123/raw/f00d/cs-cli-session-data.enc";
    const large = "A".repeat(1_500_000);
    const fetchImpl = github((url) =>
      url === rawUrl
        ? new Response(large, {
            status: 200,
            headers: { "content-type": "text/plain; charset=utf-8" },
          })
        : json({
            id: "abc123",
            files: {
              "cs-cli-session-data.enc": {
                filename: "cs-cli-session-data.enc",
                content: large.slice(0, 1000),
                truncated: true,
                raw_url: rawUrl,
              },
            },
          })
    );

    const content = await transportWith(fetchImpl).readGist("abc123", "cs-cli-session-data.enc");

    expect(content.length).toBe(1_500_000);
    expect(content).toBe(large);
    expect(String(fetchImpl.mock.calls[1]?.[0])).toBe(rawUrl);
    expect(fetchImpl.mock.calls[1]?.[1]?.headers).toMatchObject({
      authorization: "token test-token",
    });
  });

  it("maps a missing raw file to GistNotFound", async () => {
    const rawUrl = "https://gist.githubusercontent.com/octo-user/abc123/raw/f00d/f.enc";
    const fetchImpl = github((url) =>
      url === rawUrl
        ? new Response("Not Found", { status: 404, headers: { "content-type": "text/plain" } })
        : json({ id: "abc123", files: { "f.enc": { content: "", truncated: true, raw_url: rawUrl } } })
    );

    expect(await failureOf(() => transportWith(fetchImpl).readGist("abc123", "f.enc"))).toEqual({
      kind: "GistNotFound",
      gistId: "abc123",
    });
  });

  it("reports a gist without the file as invalid session data", async () => {
    const fetchImpl = github(() => json({ id: "abc123", files: { "other.txt": { content: "x" } } }));

    expect(
      await failureOf(() => transportWith(fetchImpl).readGist("abc123", "cs-cli-session-data.enc"))
    ).toEqual({
      kind: "InvalidSessionData",
      reason: "Gist has no cs-cli-session-data.enc file",
    });
  });

  it("maps 404 to GistNotFound", async () => {
    const fetchImpl = github(() => json({ message: "Not Found" }, 404));

    expect(await failureOf(() => transportWith(fetchImpl).readGist("gone", "f"))).toEqual({
      kind: "GistNotFound",
      gistId: "gone",
    });
  });

  it("maps 401 to AuthenticationRequired", async () => {
    const fetchImpl = github(() => json({ message: "Bad credentials" }, 401));

    expect((await failureOf(() => transportWith(fetchImpl).getAuthenticatedUser())).kind).toBe(
      "AuthenticationRequired"
    );
  });

  it("maps an exhausted rate limit to RateLimitExceeded", async () => {
    const fetchImpl = github(() =>
      json({ message: "API rate limit exceeded" }, 403, {
        "x-ratelimit-remaining": "0",
        "retry-after": "30",
      })
    );

    expect(await failureOf(() => transportWith(fetchImpl).readGist("abc123", "f"))).toEqual({
      kind: "RateLimitExceeded",
      retryAfterSeconds: 30,
    });
  });

  it("keeps other 403s as failed requests", async () => {
    const fetchImpl = github(() => json({ message: "Forbidden" }, 403));

    expect(await failureOf(() => transportWith(fetchImpl).readGist("abc123", "f"))).toMatchObject({
      kind: "ApiRequestFailed",
      operation: "get_gist",
      status: 403,
    });
  });

  it("maps server errors to retryable failures", async () => {
    const fetchImpl = github(() => json({ message: "Server Error" }, 502));

    try {
      await transportWith(fetchImpl).deleteGist("abc123");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GistStorageError);
      expect(error instanceof GistStorageError && error.isRetryable()).toBe(true);
      expect(error).toMatchObject({ detail: { operation: "delete_gist", status: 502 } });
    }
  });

  it("deletes a gist", async () => {
    const fetchImpl = github(() => new Response(null, { status: 204 }));

    await transportWith(fetchImpl).deleteGist("abc123");

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(String(url)).toBe("https://api.github.com/gists/abc123");
    expect(init?.method).toBe("DELETE");
  });

  it("gives up on a request that outlives its timeout", async () => {
    const fetchImpl = github(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(init.signal?.reason));
        })
    );

    expect(await failureOf(() => transportWith(fetchImpl, 20).readGist("abc123", "f"))).toEqual({
      kind: "NetworkTimeout",
      timeoutMs: 20,
      operation: "get_gist",
    });
  });
});

describe("rateLimitWaitSeconds", () => {
  const now = new Date("2026-03-01T12:00:00.000Z");
  const epoch = now.getTime() / 1000;

  it("prefers Retry-After", () => {
    expect(rateLimitWaitSeconds({ "retry-after": "12", "x-ratelimit-remaining": "0" }, now)).toBe(12);
  });

  it("waits until the reset time when the quota is spent", () => {
    expect(
      rateLimitWaitSeconds(
        { "x-ratelimit-remaining": "0", "x-ratelimit-reset": String(epoch + 90) },
        now
      )
    ).toBe(90);
  });

  it("is not a rate limit while quota remains", () => {
    expect(rateLimitWaitSeconds({ "x-ratelimit-remaining": "42" }, now)).toBeNull();
    expect(rateLimitWaitSeconds({}, now)).toBeNull();
  });
});
