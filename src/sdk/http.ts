/**
 * Injectable HTTP client for the read-only slice of the Asana REST API.
 *
 * The `RequestFn` type is the minimal surface callers need: path and options.
 * Create one per AsanaClient via `createRequestFn(token, baseUrl)`.
 * Tests inject a `fetchImpl` returning canned responses.
 */

import { z } from "zod";
import { SdkError, type SdkErrorCode } from "./errors.ts";

export const ASANA_BASE_URL = "https://app.asana.com/api/1.0";

/** Asana's maximum page size. */
export const PAGE_LIMIT = 100;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type RequestOptions = {
  readonly query?: QueryParams;
};

export type ApiEnvelope = {
  readonly data: unknown;
  readonly next_page?: { readonly offset?: string } | null;
};

export type RequestFn = (path: string, opts?: RequestOptions) => Promise<ApiEnvelope>;

const envelopeSchema = z.object({
  data: z.unknown(),
  next_page: z.object({ offset: z.string().optional() }).passthrough().nullish(),
}).passthrough();

const errorBodySchema = z.object({
  errors: z.array(z.object({ message: z.string().optional() }).passthrough()).optional(),
}).passthrough();

// ── URL builder ──────────────────────────────────────────────────────

export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const url = new URL(path.startsWith("http") ? path : `${baseUrl}${path}`);
  if (params) {
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }
  }
  return url.toString();
}

// ── Response handling ────────────────────────────────────────────────

async function safeText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return "";
  }
}

/**
 * Reads Retry-After as delta-seconds or an HTTP date.
 * Returns undefined when the header is missing or unparseable.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed);
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, Math.ceil((at - now) / 1000));
}

async function parseEnvelope(res: Response): Promise<ApiEnvelope> {
  const contentType = (res.headers.get("content-type") ?? "").toLowerCase();
  if (!contentType.includes("application/json")) {
    const text = (await safeText(res)).slice(0, 200);
    throw new SdkError(
      `API returned non-JSON (content-type: ${contentType}): ${text}`,
      "API_ERROR",
    );
  }
  let json: unknown;
  try {
    json = await res.json();
  } catch {
    throw new SdkError("Failed to parse API JSON response", "API_ERROR");
  }
  if (json === null || typeof json !== "object" || !("data" in json)) {
    throw new SdkError("API envelope missing 'data' field", "API_ERROR");
  }
  const parsed = envelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new SdkError("API envelope has an unexpected shape", "API_ERROR");
  }
  return { data: parsed.data.data, next_page: parsed.data.next_page };
}

function codeForStatus(status: number): SdkErrorCode {
  switch (status) {
    case 401: return "UNAUTHORIZED";
    case 403: return "FORBIDDEN";
    case 404: return "NOT_FOUND";
    case 429: return "RATE_LIMITED";
    default: return "API_ERROR";
  }
}

const CODE_TO_FIX: Partial<Record<SdkErrorCode, string>> = {
  UNAUTHORIZED: "The token is invalid or expired. Create a new one in the Asana developer console and save it in settings.",
  FORBIDDEN: "Check that the token user has access to the workspace or project.",
  RATE_LIMITED: "Wait a moment, then refresh manually.",
};

async function throwIfError(res: Response, path: string): Promise<void> {
  if (res.ok) return;
  const text = await safeText(res);
  let asanaMessage = `GET ${path} → HTTP ${res.status}`;
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    const first = parsed.success ? parsed.data.errors?.[0]?.message : undefined;
    if (first) asanaMessage = first;
  } catch { /* use status-based message */ }
  const code = codeForStatus(res.status);
  throw new SdkError(
    asanaMessage,
    code,
    CODE_TO_FIX[code] ?? `HTTP ${res.status}: ${res.statusText}`,
    { retryAfterSeconds: res.status === 429 ? parseRetryAfter(res.headers.get("retry-after")) : undefined },
  );
}

// ── Factory ──────────────────────────────────────────────────────────

/**
 * Returns a `RequestFn` bound to `token` and `baseUrl`.
 * Inject this into an `AsanaClient`; never store token elsewhere.
 */
export function createRequestFn(
  token: string,
  baseUrl = ASANA_BASE_URL,
  fetchImpl: typeof fetch = fetch,
): RequestFn {
  return async function request(path: string, opts?: RequestOptions): Promise<ApiEnvelope> {
    const url = buildUrl(baseUrl, path, opts?.query);

    let res: Response;
    try {
      res = await fetchImpl(url, {
        method: "GET",
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/json",
        },
      });
    } catch {
      throw new SdkError(
        `Network error: GET ${path}`,
        "NETWORK_ERROR",
        "Check network connectivity and retry.",
      );
    }

    await throwIfError(res, path);
    return parseEnvelope(res);
  };
}

// ── Paginator ────────────────────────────────────────────────────────

/**
 * Collects all pages using Asana's offset-based pagination, validating each
 * item with `item`.
 */
export async function paginate<T>(
  request: RequestFn,
  path: string,
  item: z.ZodType<T, z.ZodTypeDef, unknown>,
  query: QueryParams = {},
): Promise<T[]> {
  const all: T[] = [];
  const page = z.array(item);
  let offset: string | undefined;

  do {
    const pageQuery: QueryParams = offset === undefined
      ? { limit: PAGE_LIMIT, ...query }
      : { limit: PAGE_LIMIT, ...query, offset };
    const res = await request(path, { query: pageQuery });
    const parsed = page.safeParse(res.data);
    if (!parsed.success) {
      throw new SdkError(
        `Unexpected response shape from GET ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`,
        "API_ERROR",
      );
    }
    all.push(...parsed.data);
    offset = res.next_page?.offset;
  } while (offset !== undefined);

  return all;
}

/** Validates a single-object envelope's `data` with `schema`. */
export function parseData<T>(
  res: ApiEnvelope,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  path: string,
): T {
  const parsed = schema.safeParse(res.data);
  if (!parsed.success) {
    throw new SdkError(
      `Unexpected response shape from GET ${path}: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      "API_ERROR",
    );
  }
  return parsed.data;
}
