/**
 * Command-layer wiring.
 *
 * Each command builds its own context from configuration, the OS credential
 * store and the Asana source; nothing is kept at module level.
 */

import { createCredentialStore, createKeyringBackend, type CredentialStore } from "../lib/auth/credential-store.ts";
import { resolveToken, type ResolvedToken } from "../lib/auth/token.ts";
import { loadConfig, type AppConfig, type LoadConfigOptions } from "../lib/config.ts";
import { SdkError, type SdkErrorCode } from "../sdk/errors.ts";
import { fatal, HELP_ACTION, type NextAction } from "../hateoas/output.ts";
import { createProgressController, type ProgressController } from "../progress/controller.ts";
import { describeApiError } from "../progress/messages.ts";
import type { ApiError } from "../progress/model.ts";
import { createAsanaSource, type ProjectSource } from "../progress/source.ts";

export type CliContext = {
  readonly config: AppConfig;
  readonly env: NodeJS.ProcessEnv;
  readonly store: CredentialStore;
  readonly source: ProjectSource;
  readonly controller: ProgressController;
};

export async function createCliContext(opts: LoadConfigOptions = {}): Promise<CliContext> {
  const env = opts.env ?? process.env;
  const config = await loadConfig({ ...opts, env });
  const store = createCredentialStore(createKeyringBackend());
  const source = createAsanaSource({ baseUrl: config.baseUrl, includeArchived: config.includeArchived });
  const controller = createProgressController({
    source,
    store,
    env,
    concurrency: config.concurrency,
  });
  return { config, env, store, source, controller };
}

export function missingTokenError(): SdkError {
  return new SdkError(
    "No Asana API token found.",
    "AUTH_MISSING",
    "Run 'asana-progress login' or set ASANA_ACCESS_TOKEN.",
  );
}

/** The session token; AUTH_MISSING when neither env nor keychain has one. */
export async function requireToken(ctx: CliContext): Promise<ResolvedToken> {
  const resolved = await resolveToken(ctx.store, ctx.env);
  if (!resolved) throw missingTokenError();
  return resolved;
}

// ── Errors ───────────────────────────────────────────────────────────

const API_ERROR_CODES: Record<ApiError["kind"], SdkErrorCode> = {
  unauthorized: "UNAUTHORIZED",
  rate_limited: "RATE_LIMITED",
  network_unavailable: "NETWORK_ERROR",
  unknown: "API_ERROR",
};

/** Converts an ApiError value back into the SdkError the command layer reports. */
export function apiErrorToSdkError(error: ApiError): SdkError {
  const { message, hint } = describeApiError(error);
  const detail = error.kind === "unknown" ? message : `${message} ${error.message}`;
  const fix = error.kind === "unauthorized"
    ? "Run 'asana-progress login' with a valid Personal Access Token."
    : hint;
  return new SdkError(detail, API_ERROR_CODES[error.kind], fix, {
    retryAfterSeconds: error.kind === "rate_limited" ? error.retryAfterSeconds : undefined,
  });
}

const LOGIN_ACTION: NextAction = {
  command: "asana-progress login",
  description: "Store a Personal Access Token",
};

/**
 * Translates an SdkError to a fatal() call (process.exit).
 */
export function handleSdkError(err: unknown, command: string): never {
  if (err instanceof SdkError) {
    const auth = err.code === "UNAUTHORIZED" || err.code === "AUTH_MISSING";
    fatal(err.message, {
      code: err.code,
      fix: err.fix,
      command,
      nextActions: auth ? [LOGIN_ACTION, HELP_ACTION] : [HELP_ACTION],
    });
  }
  throw err;
}

/**
 * Wraps a command run function to catch SdkErrors and convert to fatal().
 */
export function withErrorHandler<T>(
  command: string,
  fn: () => Promise<T>,
): Promise<T> {
  return fn().catch((err: unknown) => handleSdkError(err, command));
}
