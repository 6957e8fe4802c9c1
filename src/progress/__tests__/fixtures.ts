import type { Project, Workspace } from "../model.ts";

export const ACME: Workspace = { gid: "100", name: "Acme" };
export const GLOBEX: Workspace = { gid: "200", name: "Globex" };

export function project(overrides: Partial<Project> & Pick<Project, "gid">): Project {
  return {
    name: `Project ${overrides.gid}`,
    workspace: ACME,
    status: "unknown",
    completedTasks: 0,
    totalTasks: 0,
    completed: false,
    archived: false,
    countsUnavailable: false,
    ...overrides,
  };
}
