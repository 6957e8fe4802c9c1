// ── Progress domain model ───────────────────────────────────────────

export const STATUS_LABELS = [
  "on_track",
  "at_risk",
  "off_track",
  "on_hold",
  "complete",
  "unknown",
] as const;

export type StatusLabel = (typeof STATUS_LABELS)[number];

export type Workspace = {
  readonly gid: string;
  readonly name: string;
};

export type Project = {
  readonly gid: string;
  readonly name: string;
  /** Weak reference: projects are grouped and filtered by `workspace.gid`. */
  readonly workspace: Workspace;
  readonly status: StatusLabel;
  readonly completedTasks: number;
  readonly totalTasks: number;
  readonly completed: boolean;
  readonly archived: boolean;
  /** The task list could not be read; counts are 0/0. */
  readonly countsUnavailable: boolean;
};

export type Summary = {
  readonly totalProjects: number;
  readonly byStatus: Readonly<Record<StatusLabel, number>>;
  readonly activeProjects: number;
  readonly completedProjects: number;
  readonly archivedProjects: number;
  readonly completedTasks: number;
  readonly totalTasks: number;
  /** Task-weighted: Σcompleted / Σtotal, 0 when there are no tasks. */
  readonly overallRatio: number;
};

// ── Errors ──────────────────────────────────────────────────────────

export type ApiError =
  | { readonly kind: "unauthorized"; readonly message: string }
  | { readonly kind: "rate_limited"; readonly message: string; readonly retryAfterSeconds?: number }
  | { readonly kind: "network_unavailable"; readonly message: string }
  | { readonly kind: "unknown"; readonly message: string };

export type ApiErrorKind = ApiError["kind"];

// ── Connection ──────────────────────────────────────────────────────

export type ConnectionState =
  | { readonly status: "disconnected" }
  | { readonly status: "connecting" }
  | { readonly status: "connected" }
  | { readonly status: "error"; readonly kind: ApiErrorKind };
