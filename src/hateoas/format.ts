import { completionRatio, statusText } from "../progress/aggregate.ts";
import type { Project, Summary, Workspace } from "../progress/model.ts";
import type { WorkspaceGroup } from "../progress/aggregate.ts";

export type FormattedProject = {
  id: string;
  name: string;
  workspace: string;
  status: string;
  status_text: string;
  completed_tasks: number;
  total_tasks: number;
  /** Percentage with one decimal, 0–100. */
  percent: number;
  completed: boolean;
  archived: boolean;
  counts_unavailable?: true;
};

export type FormattedSummary = {
  total_projects: number;
  active_projects: number;
  completed_projects: number;
  archived_projects: number;
  by_status: Record<string, number>;
  completed_tasks: number;
  total_tasks: number;
  percent: number;
};

export function toPercent(ratio: number): number {
  return Math.round(ratio * 1000) / 10;
}

export function formatProject(p: Project): FormattedProject {
  return {
    id: p.gid,
    name: p.name,
    workspace: p.workspace.name,
    status: p.status,
    status_text: statusText(p.status),
    completed_tasks: p.completedTasks,
    total_tasks: p.totalTasks,
    percent: toPercent(completionRatio(p)),
    completed: p.completed,
    archived: p.archived,
    ...(p.countsUnavailable ? { counts_unavailable: true as const } : {}),
  };
}

export function formatSummary(s: Summary): FormattedSummary {
  return {
    total_projects: s.totalProjects,
    active_projects: s.activeProjects,
    completed_projects: s.completedProjects,
    archived_projects: s.archivedProjects,
    by_status: { ...s.byStatus },
    completed_tasks: s.completedTasks,
    total_tasks: s.totalTasks,
    percent: toPercent(s.overallRatio),
  };
}

export function formatWorkspace(w: Workspace): { id: string; name: string } {
  return { id: w.gid, name: w.name };
}

export function formatGroups(groups: readonly WorkspaceGroup[]) {
  return groups.map((g) => ({
    workspace: formatWorkspace(g.workspace),
    projects: g.projects.map(formatProject),
  }));
}
