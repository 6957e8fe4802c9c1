/**
 * Typed SDK errors.
 *
 * The HTTP and SDK layers throw an SdkError instead of calling process.exit().
 * The progress source converts them into ApiError values; the CLI layer
 * translates whatever still escapes into its JSON error envelope.
 */

export type SdkErrorCode =
  | "AUTH_MISSING"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "API_ERROR"
  | "INVALID_INPUT"
  | "WORKSPACE_NOT_FOUND"
  | "STORE_UNAVAILABLE"
  | "NETWORK_ERROR"
  | "RATE_LIMITED";

export type SdkErrorOptions = {
  /** Seconds from the Retry-After header of a 429 response. */
  readonly retryAfterSeconds?: number;
};

export class SdkError extends Error {
  readonly code: SdkErrorCode;
  /** Human-readable remediation hint. */
  readonly fix: string;
  readonly retryAfterSeconds?: number;

  constructor(
    message: string,
    code: SdkErrorCode,
    fix = "Check the error message and retry.",
    opts: SdkErrorOptions = {},
  ) {
    super(message);
    this.name = "SdkError";
    this.code = code;
    this.fix = fix;
    this.retryAfterSeconds = opts.retryAfterSeconds;
  }
}

export function isSdkError(value: unknown): value is SdkError {
  return value instanceof SdkError;
}

