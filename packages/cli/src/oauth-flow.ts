/**
 * GitHub OAuth authorization flow
 *
 * Opens the consent page in the user's browser, waits for GitHub to
 * redirect back to a short-lived loopback listener, then exchanges the
 * code for an access token.
 */

import { spawn } from "node:child_process";
import { Server } from "node:http";
import { Hono } from "hono";
import { createAdaptorServer } from "@hono/node-server";
import { z } from "zod";
import {
  buildAuthorizationUrl,
  createOAuthState,
  CsrfError,
  OAuthError,
  verifyCallbackState,
  type GitHubOAuthConfig,
} from "@session-sync/core";
import { CALLBACK_PORTS } from "./config.js";
import { silentLogger, type Logger } from "./logger.js";

const LISTEN_HOST = "127.0.0.1";
const DEFAULT_TIMEOUT_MS = 300_000;
const TOKEN_EXCHANGE_TIMEOUT_MS = 30_000;

export type OAuthFlowState =
  | { kind: "Idle" }
  | { kind: "ListenerBound"; port: number }
  | { kind: "BrowserOpened" }
  | { kind: "AwaitingCallback" }
  | { kind: "CodeReceived" }
  | { kind: "TokenExchanged" }
  | { kind: "Done" }
  | { kind: "Aborted"; reason: string };

export type OAuthFlowOptions = {
  ports?: readonly number[];
  timeoutMs?: number;
  /** Defaults to the OS browser; a rejection is logged, not fatal */
  launchBrowser?: (url: string) => Promise<void>;
  fetch?: typeof fetch;
  onStateChange?: (state: OAuthFlowState) => void;
  logger?: Logger;
};

export type CallbackOutcome =
  | { ok: true; code: string }
  | { ok: false; error: OAuthError };

const SUCCESS_PAGE = `<!doctype html>
<html>
  <head><meta charset="utf-8"><title>session-sync</title></head>
  <body style="font-family: sans-serif; text-align: center; padding-top: 4em">
    <h1>Authorization complete</h1>
    <p>You can close this window and return to the terminal.</p>
  </body>
</html>`;

const FAILURE_PAGE = `<!doctype html>
<html>
  <head><meta charset="utf-8"><title>session-sync</title></head>
  <body style="font-family: sans-serif; text-align: center; padding-top: 4em">
    <h1>Authorization failed</h1>
    <p>Return to the terminal for details.</p>
  </body>
</html>`;

/**
 * Redirect URI for a bound port. Only localhost callbacks are rebound.
 */
export const resolveRedirectUri = (callbackUrl: string, port: number): string => {
  const url = new URL(callbackUrl);
  if (url.hostname === "localhost") {
    url.port = String(port);
  }
  return url.toString();
};

/**
 * Turn the callback query into a code or an error.
 * The state is checked before anything else in the query is trusted.
 */
export const interpretCallback = (
  query: Record<string, string | undefined>,
  expectedState: string
): CallbackOutcome => {
  const received = query["state"];
  try {
    if (!received) {
      throw new CsrfError("Missing OAuth state parameter - possible CSRF attack");
    }
    if (!verifyCallbackState(expectedState, received)) {
      throw new CsrfError("OAuth state mismatch - possible CSRF attack");
    }
  } catch (error) {
    if (error instanceof OAuthError) {
      return { ok: false, error };
    }
    throw error;
  }

  const githubError = query["error"];
  if (githubError) {
    const description = query["error_description"];
    return {
      ok: false,
      error: new OAuthError(
        `GitHub authorization failed: ${githubError}${description ? ` - ${description}` : ""}`,
        "denied"
      ),
    };
  }

  const code = query["code"];
  if (!code) {
    return {
      ok: false,
      error: new OAuthError("No authorization code in callback", "invalid_callback"),
    };
  }
  return { ok: true, code };
};

/** Holds the single callback the listener accepts */
type CallbackInbox = {
  readonly expectedState: string;
  deliver: (outcome: CallbackOutcome) => boolean;
  wait: () => Promise<CallbackOutcome>;
  isSettled: () => boolean;
};

const createCallbackInbox = (expectedState: string): CallbackInbox => {
  let received: CallbackOutcome | null = null;
  let notify: ((outcome: CallbackOutcome) => void) | null = null;

  return {
    expectedState,
    deliver: (outcome) => {
      if (received) return false;
      received = outcome;
      notify?.(outcome);
      return true;
    },
    wait: () =>
      new Promise((resolve) => {
        if (received) resolve(received);
        else notify = resolve;
      }),
    isSettled: () => received !== null,
  };
};

const createCallbackApp = (callbackPath: string, inbox: CallbackInbox) => {
  const app = new Hono();

  app.get(callbackPath, (c) => {
    if (inbox.isSettled()) {
      return c.text("Authorization already handled", 410, { Connection: "close" });
    }
    const outcome = interpretCallback(c.req.query(), inbox.expectedState);
    inbox.deliver(outcome);
    return c.html(outcome.ok ? SUCCESS_PAGE : FAILURE_PAGE, outcome.ok ? 200 : 400, {
      Connection: "close",
    });
  });

  app.notFound((c) => c.text("Not found", 404, { Connection: "close" }));

  return app;
};

const listen = (server: Server, port: number): Promise<void> =>
  new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off("listening", onListening);
      reject(error);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, LISTEN_HOST);
  });

/** Stops accepting; the in-flight response still completes */
const closeServer = (server: Server): Promise<void> =>
  new Promise((resolve) => {
    server.close(() => resolve());
    server.closeIdleConnections();
  });

/**
 * Bind the callback app on the first free port
 */
const bindListener = async (
  app: Hono,
  ports: readonly number[],
  logger: Logger
): Promise<{ server: Server; port: number }> => {
  for (const port of ports) {
    const server = createAdaptorServer({ fetch: app.fetch });
    if (!(server instanceof Server)) {
      throw new OAuthError("Unexpected callback server type", "no_port");
    }
    try {
      await listen(server, port);
      // port 0 asks the OS for any free port
      const address = server.address();
      return { server, port: address && typeof address === "object" ? address.port : port };
    } catch (error) {
      logger.debug(`Port ${port} unavailable: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  throw new OAuthError(
    `No available port for the OAuth callback (tried ${ports.join(", ")})`,
    "no_port"
  );
};

/**
 * Launch the default browser, detached from this process
 */
export const openBrowser = (url: string): Promise<void> =>
  new Promise((resolve, reject) => {
    const [command, args]: [string, string[]] =
      process.platform === "darwin"
        ? ["open", [url]]
        : process.platform === "win32"
          ? ["cmd", ["/c", "start", "", url]]
          : ["xdg-open", [url]];

    const child = spawn(command, args, { detached: true, stdio: "ignore", windowsHide: true });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });

const TokenResponseSchema = z.object({
  access_token: z.string().min(1).optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

/**
 * Exchange an authorization code for an access token (one attempt)
 */
export const exchangeCodeForToken = async (
  config: GitHubOAuthConfig,
  code: string,
  redirectUri: string,
  fetchImpl: typeof fetch = fetch
): Promise<string> => {
  let response: Response;
  try {
    response = await fetchImpl(config.tokenUrl, {
      method: "POST",
      headers: {
        Accept: "application/json",
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: new URLSearchParams({
        client_id: config.clientId,
        client_secret: config.clientSecret,
        code,
        redirect_uri: redirectUri,
      }).toString(),
      signal: AbortSignal.timeout(TOKEN_EXCHANGE_TIMEOUT_MS),
    });
  } catch (error) {
    throw new OAuthError("Token exchange request failed", "token_exchange", { cause: error });
  }

  if (!response.ok) {
    throw new OAuthError(`Token exchange failed: HTTP ${response.status}`, "token_exchange");
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new OAuthError("Token exchange returned invalid JSON", "token_exchange", {
      cause: error,
    });
  }

  const parsed = TokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new OAuthError("Token exchange returned an unexpected body", "token_exchange");
  }
  if (parsed.data.error) {
    throw new OAuthError(
      `Token exchange failed: ${parsed.data.error}${
        parsed.data.error_description ? ` - ${parsed.data.error_description}` : ""
      }`,
      "token_exchange"
    );
  }
  if (!parsed.data.access_token) {
    throw new OAuthError("No access token in token response", "token_exchange");
  }
  return parsed.data.access_token;
};

/**
 * Run one authorization attempt and return the access token
 */
export const runOAuthFlow = async (
  config: GitHubOAuthConfig,
  options: OAuthFlowOptions = {}
): Promise<string> => {
  const logger = options.logger ?? silentLogger;
  const notify = options.onStateChange ?? (() => undefined);
  const state = createOAuthState();
  const inbox = createCallbackInbox(state.value);
  const callbackPath = new URL(config.callbackUrl).pathname;

  notify({ kind: "Idle" });

  let server: Server | null = null;
  let timer: NodeJS.Timeout | null = null;

  try {
    const bound = await bindListener(
      createCallbackApp(callbackPath, inbox),
      options.ports ?? CALLBACK_PORTS,
      logger
    );
    server = bound.server;
    notify({ kind: "ListenerBound", port: bound.port });

    const redirectUri = resolveRedirectUri(config.callbackUrl, bound.port);
    const authorizationUrl = buildAuthorizationUrl(config, state.value, redirectUri);

    try {
      await (options.launchBrowser ?? openBrowser)(authorizationUrl);
      notify({ kind: "BrowserOpened" });
    } catch (error) {
      logger.warn(
        `Could not open a browser (${error instanceof Error ? error.message : String(error)}). Open this URL to continue:\n${authorizationUrl}`
      );
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    timer = setTimeout(() => {
      inbox.deliver({
        ok: false,
        error: new OAuthError(
          `Timed out after ${Math.round(timeoutMs / 1000)}s waiting for authorization`,
          "timeout"
        ),
      });
    }, timeoutMs);

    notify({ kind: "AwaitingCallback" });
    const outcome = await inbox.wait();
    if (!outcome.ok) {
      throw outcome.error;
    }
    notify({ kind: "CodeReceived" });

    await closeServer(server);
    server = null;

    const token = await exchangeCodeForToken(
      config,
      outcome.code,
      redirectUri,
      options.fetch ?? fetch
    );
    notify({ kind: "TokenExchanged" });
    notify({ kind: "Done" });
    return token;
  } catch (error) {
    notify({
      kind: "Aborted",
      reason: error instanceof Error ? error.message : String(error),
    });
    throw error;
  } finally {
    if (timer) clearTimeout(timer);
    if (server) await closeServer(server);
  }
};
