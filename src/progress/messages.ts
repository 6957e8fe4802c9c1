import type { ApiError, ConnectionState } from "./model.ts";

export type ErrorDescription = {
  readonly message: string;
  /** What the user can do about it. */
  readonly hint: string;
};

export function describeApiError(error: ApiError): ErrorDescription {
  switch (error.kind) {
    case "unauthorized":
      return {
        message: "Asana rejected the API key.",
        hint: "Open settings and save a valid Personal Access Token.",
      };
    case "rate_limited":
      return {
        message: "Asana is rate limiting requests.",
        hint: error.retryAfterSeconds === undefined
          ? "Wait a moment, then refresh."
          : `Wait ${error.retryAfterSeconds}s, then refresh.`,
      };
    case "network_unavailable":
      return {
        message: "Asana could not be reached.",
        hint: "Check your network connection, then refresh.",
      };
    case "unknown":
      return {
        message: `Asana request failed: ${error.message}`,
        hint: "Refresh to try again.",
      };
  }
}

export function connectionLabel(connection: ConnectionState): string {
  switch (connection.status) {
    case "disconnected":
      return "Not connected";
    case "connecting":
      return "Connecting…";
    case "connected":
      return "Connected to Asana";
    case "error":
      return connection.kind === "unauthorized" ? "Unauthorized" : "Connection error";
  }
}
