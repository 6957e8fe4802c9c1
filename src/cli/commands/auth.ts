import { define } from "gunshi";
import { apiErrorToSdkError, createCliContext, requireToken, withErrorHandler } from "../context.ts";
import { ok } from "../../hateoas/index.ts";
import { maskToken, readTokenFromEnv } from "../../lib/auth/token.ts";
import { warn } from "../../lib/log.ts";
import { SdkError } from "../../sdk/errors.ts";
import { describeApiError } from "../../progress/messages.ts";
import { promptSecret } from "../../tui/prompt.ts";

// ── login ────────────────────────────────────────────────────────────

export const login = define({
  name: "login",
  description: "Verify a Personal Access Token and store it in the system keychain",
  args: {
    token: {
      type: "string" as const,
      description: "Token to store (prompted for when omitted)",
      short: "t",
    },
  },
  run: (ctx) => withErrorHandler("login", async () => {
    const cli = await createCliContext();

    let raw = ctx.values.token;
    if (raw === undefined) {
      if (!process.stdin.isTTY) {
        throw new SdkError(
          "No token given and stdin is not a terminal.",
          "INVALID_INPUT",
          "Pass the token with --token <token>.",
        );
      }
      raw = await promptSecret("Asana API Key: ");
    }

    const saved = await cli.controller.saveToken(raw);
    if (saved.status === "empty") {
      throw new SdkError("The token is empty.", "INVALID_INPUT", "Paste a Personal Access Token from the developer console.");
    }
    if (saved.status === "rejected") throw apiErrorToSdkError(saved.error);

    if (!saved.persisted.ok) {
      warn(`token not stored: ${saved.persisted.error.message}`);
    }

    ok("login", {
      stored: saved.persisted.ok,
      verified: saved.account !== undefined,
      account: saved.account ?? null,
      token: cli.controller.tokenInfo()?.masked ?? null,
    }, saved.persisted.ok
      ? [{ command: "asana-progress projects", description: "Show project progress" }]
      : [{ command: "export ASANA_ACCESS_TOKEN=<token>", description: "Use the token through the environment instead" }]);
  }),
});

// ── logout ───────────────────────────────────────────────────────────

export const logout = define({
  name: "logout",
  description: "Remove the stored token from the system keychain",
  args: {},
  run: () => withErrorHandler("logout", async () => {
    const cli = await createCliContext();
    const cleared = await cli.controller.clearToken();
    if (!cleared.ok) {
      throw new SdkError(
        `Could not remove the token: ${cleared.error.message}`,
        "STORE_UNAVAILABLE",
        cleared.error.kind === "denied"
          ? "Allow access to the keychain entry and retry."
          : "Check that a system keychain is available.",
      );
    }

    const fromEnv = readTokenFromEnv(cli.env);
    ok("logout", {
      cleared: true,
      env_token: fromEnv?.envKey ?? null,
    }, [{ command: "asana-progress login", description: "Store a new token" }]);
  }),
});

// ── status ───────────────────────────────────────────────────────────

export const status = define({
  name: "status",
  description: "Show where the token comes from and whether Asana accepts it",
  args: {},
  run: () => withErrorHandler("status", async () => {
    const cli = await createCliContext();
    const resolved = await requireToken(cli);
    const verified = await cli.source.verifyToken(resolved.token);

    ok("status", {
      source: resolved.source,
      env_key: resolved.envKey ?? null,
      token: maskToken(resolved.token),
      connected: verified.ok,
      account: verified.ok ? verified.value : null,
      error: verified.ok ? null : describeApiError(verified.error),
      config: {
        workspace: cli.config.workspace ?? null,
        concurrency: cli.config.concurrency,
        include_archived: cli.config.includeArchived,
        base_url: cli.config.baseUrl,
      },
    }, verified.ok
      ? [{ command: "asana-progress projects", description: "Show project progress" }]
      : [{ command: "asana-progress login", description: "Store a valid token" }]);
  }),
});
