/**
 * Pure aggregation over the projects of one refresh.
 *
 * Nothing here touches the network or the state; every function is total
 * over its input, including unexpected vendor status strings.
 */

import { STATUS_LABELS, type Project, type StatusLabel, type Summary, type Workspace } from "./model.ts";

export type Color = `#${string}`;

export const DEFAULT_STATUS_COLOR: Color = "#ffffff";

const STATUS_COLORS = {
  on_track: "#00ff00",
  at_risk: "#ffff00",
  off_track: "#ff0000",
  on_hold: "#0080ff",
  complete: "#00c853",
  unknown: DEFAULT_STATUS_COLOR,
} as const satisfies Readonly<Record<StatusLabel, Color>>;

const STATUS_TEXT = {
  on_track: "On track",
  at_risk: "At risk",
  off_track: "Off track",
  on_hold: "On hold",
  complete: "Completed",
  unknown: "No status",
} as const satisfies Readonly<Record<StatusLabel, string>>;

export function isStatusLabel(value: string): value is StatusLabel {
  return STATUS_LABELS.some((label) => label === value);
}

/** Colour for a status label; any value outside the enumeration gets the default. */
export function statusColor(status: string): Color {
  return isStatusLabel(status) ? STATUS_COLORS[status] : DEFAULT_STATUS_COLOR;
}

export function statusText(status: string): string {
  return isStatusLabel(status) ? STATUS_TEXT[status] : STATUS_TEXT.unknown;
}

// ── Vendor status parsing ───────────────────────────────────────────

const STATUS_TYPES: Readonly<Record<string, StatusLabel>> = {
  on_track: "on_track",
  at_risk: "at_risk",
  off_track: "off_track",
  on_hold: "on_hold",
  complete: "complete",
  achieved: "complete",
};

const LEGACY_COLORS: Readonly<Record<string, StatusLabel>> = {
  green: "on_track",
  yellow: "at_risk",
  red: "off_track",
  blue: "on_hold",
  complete: "complete",
};

/**
 * Maps the vendor's status fields onto a label. `statusType` comes from the
 * latest status update; `legacyColor` from the older `current_status` object
 * and is only consulted when there is no status update.
 */
export function parseStatusLabel(
  statusType: string | null | undefined,
  legacyColor?: string | null,
): StatusLabel {
  if (statusType) {
    return Object.hasOwn(STATUS_TYPES, statusType) ? STATUS_TYPES[statusType] : "unknown";
  }
  if (legacyColor && Object.hasOwn(LEGACY_COLORS, legacyColor)) {
    return LEGACY_COLORS[legacyColor];
  }
  return "unknown";
}

// ── Ratios ──────────────────────────────────────────────────────────

function ratio(completed: number, total: number): number {
  if (!(total > 0)) return 0;
  const value = completed / total;
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(1, value);
}

/** completed/total clamped to [0, 1]; 0 for a project without tasks. */
export function completionRatio(project: Pick<Project, "completedTasks" | "totalTasks">): number {
  return ratio(project.completedTasks, project.totalTasks);
}

function emptyStatusCounts(): Record<StatusLabel, number> {
  return {
    on_track: 0,
    at_risk: 0,
    off_track: 0,
    on_hold: 0,
    complete: 0,
    unknown: 0,
  };
}

/**
 * Summary over a project set. The overall ratio is task-weighted
 * (Σcompleted / Σtotal), not the mean of per-project ratios.
 */
export function aggregate(projects: readonly Project[]): Summary {
  const byStatus = emptyStatusCounts();
  let completedTasks = 0;
  let totalTasks = 0;
  let completedProjects = 0;
  let archivedProjects = 0;
  let activeProjects = 0;

  for (const project of projects) {
    byStatus[project.status] += 1;
    completedTasks += Math.max(0, project.completedTasks);
    totalTasks += Math.max(0, project.totalTasks);
    if (project.completed) completedProjects += 1;
    if (project.archived) archivedProjects += 1;
    if (!project.completed && !project.archived) activeProjects += 1;
  }

  return {
    totalProjects: projects.length,
    byStatus,
    activeProjects,
    completedProjects,
    archivedProjects,
    completedTasks,
    totalTasks,
    overallRatio: ratio(completedTasks, totalTasks),
  };
}

// ── Filtering & grouping ────────────────────────────────────────────

/** All projects when `workspaceGid` is undefined; otherwise the matching ones, in order. */
export function filterByWorkspace(
  projects: readonly Project[],
  workspaceGid: string | undefined,
): readonly Project[] {
  if (workspaceGid === undefined) return projects;
  return projects.filter((p) => p.workspace.gid === workspaceGid);
}

/** Distinct workspaces in first-seen order. */
export function workspacesOf(projects: readonly Project[]): Workspace[] {
  const seen = new Map<string, Workspace>();
  for (const project of projects) {
    if (!seen.has(project.workspace.gid)) seen.set(project.workspace.gid, project.workspace);
  }
  return [...seen.values()];
}

export type WorkspaceGroup = {
  readonly workspace: Workspace;
  readonly projects: readonly Project[];
};

/**
 * Groups by workspace in first-seen order. Inside a group, projects are
 * sorted by completion ratio, highest first; ties keep input order.
 */
export function groupByWorkspace(projects: readonly Project[]): WorkspaceGroup[] {
  return workspacesOf(projects).map((workspace) => ({
    workspace,
    projects: projects
      .filter((p) => p.workspace.gid === workspace.gid)
      .map((project, index) => ({ project, index, ratio: completionRatio(project) }))
      .sort((a, b) => b.ratio - a.ratio || a.index - b.index)
      .map((entry) => entry.project),
  }));
}
