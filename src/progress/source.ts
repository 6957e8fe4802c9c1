/**
 * Project source: the Asana adapter the controller talks to.
 *
 * Each call builds a client for the given token, runs one SDK function and
 * returns a Result. SdkErrors become ApiError values here; nothing above this
 * layer sees an exception from the network.
 */

import {
  createClient,
  isSdkError,
  parallel,
  projects as projectsApi,
  tasks as tasksApi,
  users as usersApi,
  workspace as workspaceApi,
  type AsanaProject,
} from "../sdk/index.ts";
import type { TaskCounts } from "../sdk/tasks.ts";
import { err, ok, type Result } from "../lib/types/result.ts";
import { debug } from "../lib/log.ts";
import { parseStatusLabel } from "./aggregate.ts";
import type { ApiError, Project, Workspace } from "./model.ts";

export type Account = {
  readonly gid: string;
  readonly name: string;
};

export type ProjectSource = {
  /** Checks the token against `users/me`. */
  verifyToken(token: string): Promise<Result<Account, ApiError>>;
  listWorkspaces(token: string): Promise<Result<Workspace[], ApiError>>;
  /** Projects of one workspace, with task counts still at 0/0. */
  listProjects(token: string, workspace: Workspace): Promise<Result<Project[], ApiError>>;
  fetchTaskCounts(token: string, projectGid: string): Promise<Result<TaskCounts, ApiError>>;
};

export type AsanaSourceOptions = {
  readonly baseUrl?: string;
  readonly fetchImpl?: typeof fetch;
  /** Include archived projects (default true). */
  readonly includeArchived?: boolean;
};

// ── Error translation ────────────────────────────────────────────────

export function toApiError(error: unknown): ApiError {
  if (isSdkError(error)) {
    switch (error.code) {
      case "UNAUTHORIZED":
      case "AUTH_MISSING":
        return { kind: "unauthorized", message: error.message };
      case "RATE_LIMITED":
        return error.retryAfterSeconds === undefined
          ? { kind: "rate_limited", message: error.message }
          : { kind: "rate_limited", message: error.message, retryAfterSeconds: error.retryAfterSeconds };
      case "NETWORK_ERROR":
        return { kind: "network_unavailable", message: error.message };
      default:
        return { kind: "unknown", message: error.message };
    }
  }
  return { kind: "unknown", message: error instanceof Error ? error.message : String(error) };
}

async function attempt<T>(fn: () => Promise<T>): Promise<Result<T, ApiError>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(toApiError(error));
  }
}

// ── Mapping ──────────────────────────────────────────────────────────

export function toProject(raw: AsanaProject, workspace: Workspace): Project {
  return {
    gid: raw.gid,
    name: raw.name?.trim() || "Unnamed Project",
    workspace,
    status: parseStatusLabel(raw.current_status_update?.status_type, raw.current_status?.color),
    completedTasks: 0,
    totalTasks: 0,
    completed: raw.completed ?? false,
    archived: raw.archived ?? false,
    countsUnavailable: false,
  };
}

// ── Factory ──────────────────────────────────────────────────────────

export function createAsanaSource(opts: AsanaSourceOptions = {}): ProjectSource {
  const client = (token: string) =>
    createClient({ token, baseUrl: opts.baseUrl, fetchImpl: opts.fetchImpl });

  return {
    verifyToken: (token) =>
      attempt(async () => {
        const me = await usersApi.getMe(client(token));
        return { gid: me.gid, name: me.name ?? me.email ?? me.gid };
      }),

    listWorkspaces: (token) =>
      attempt(async () => {
        const workspaces = await workspaceApi.listWorkspaces(client(token));
        return workspaces.map((w) => ({ gid: w.gid, name: w.name ?? "Unknown Workspace" }));
      }),

    listProjects: (token, workspace) =>
      attempt(async () => {
        const raw = await projectsApi.listProjects(client(token), workspace.gid, {
          includeArchived: opts.includeArchived,
        });
        return raw.map((p) => toProject(p, workspace));
      }),

    fetchTaskCounts: (token, projectGid) =>
      attempt(() => tasksApi.countProjectTasks(client(token), projectGid)),
  };
}

// ── Loader ───────────────────────────────────────────────────────────

export type LoadProgress = {
  readonly done: number;
  readonly total: number;
};

export type LoadOptions = {
  /** Simultaneous task-count requests (default 5). */
  readonly concurrency?: number;
  /** Spacing between request launches in ms (default 100). */
  readonly delayMs?: number;
  readonly onProgress?: (progress: LoadProgress) => void;
};

/**
 * Fetches workspaces → projects → task counts.
 *
 * Unauthorized, rate-limited and network failures abort the whole load;
 * no further count requests are launched. Any other failure while counting one
 * project's tasks keeps that project with `countsUnavailable` set.
 */
export async function loadProjects(
  source: ProjectSource,
  token: string,
  opts: LoadOptions = {},
): Promise<Result<Project[], ApiError>> {
  const workspaces = await source.listWorkspaces(token);
  if (!workspaces.ok) return workspaces;

  const listed: Project[] = [];
  for (const workspace of workspaces.value) {
    const projects = await source.listProjects(token, workspace);
    if (!projects.ok) return projects;
    listed.push(...projects.value);
  }

  opts.onProgress?.({ done: 0, total: listed.length });

  const abort: { error?: ApiError } = {};
  const stop = new AbortController();
  const results = await parallel(
    listed.map((project) => async (): Promise<Project> => {
      if (abort.error) return project;
      const counts = await source.fetchTaskCounts(token, project.gid);
      if (counts.ok) {
        return { ...project, completedTasks: counts.value.completed, totalTasks: counts.value.total };
      }
      if (counts.error.kind !== "unknown") {
        abort.error ??= counts.error;
        stop.abort();
        return project;
      }
      debug(`task counts unavailable for project ${project.gid}:`, counts.error.message);
      return { ...project, countsUnavailable: true };
    }),
    {
      concurrency: opts.concurrency,
      delayMs: opts.delayMs,
      onSettled: (done, total) => opts.onProgress?.({ done, total }),
      signal: stop.signal,
    },
  );

  if (abort.error) return err(abort.error);

  return ok(results.map((r, index) => (r.ok ? r.value : { ...listed[index], countsUnavailable: true })));
}
