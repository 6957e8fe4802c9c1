/**
 * AsanaClient: the single injectable dependency threaded through every SDK call.
 *
 * Owns a bound `request` function (HTTP, auth injected) and a bound
 * `paginate` helper. No module-level state: one client per token.
 */

import type { z } from "zod";
import { createRequestFn, paginate, ASANA_BASE_URL, type RequestFn, type QueryParams } from "./http.ts";
import { SdkError } from "./errors.ts";

// ── Config ───────────────────────────────────────────────────────────

export type ClientConfig = {
  /** Bearer token for Asana API. */
  readonly token: string;
  /** Asana API base URL (override for testing). */
  readonly baseUrl?: string;
  /** Custom fetch implementation (for testing). */
  readonly fetchImpl?: typeof fetch;
};

// ── Public interface ─────────────────────────────────────────────────

export type AsanaClient = {
  /** Raw request function; prefer domain SDK functions over calling this directly. */
  readonly request: RequestFn;
  /** Paginated GET helper; every item is validated with `item`. */
  readonly paginate: <T>(
    path: string,
    item: z.ZodType<T, z.ZodTypeDef, unknown>,
    query?: QueryParams,
  ) => Promise<T[]>;
};

// ── Factory ──────────────────────────────────────────────────────────

/**
 * Creates an AsanaClient from a bearer token.
 *
 * @example
 * const client = createClient({ token });
 * const workspaces = await listWorkspaces(client);
 */
export function createClient(config: ClientConfig): AsanaClient {
  if (!config.token || !config.token.trim()) {
    throw new SdkError(
      "Asana bearer token is required.",
      "AUTH_MISSING",
      "Run 'asana-progress login' or set ASANA_ACCESS_TOKEN.",
    );
  }

  const request = createRequestFn(
    config.token.trim(),
    config.baseUrl ?? ASANA_BASE_URL,
    config.fetchImpl,
  );

  return {
    request,
    paginate: (path, item, query) => paginate(request, path, item, query),
  };
}
