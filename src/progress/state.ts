/**
 * Presentation state: the single source the dashboard and commands render from.
 *
 * Owns the project list of the last successful fetch, the workspace filter,
 * the connection state and the last error. Only the controller mutates it.
 * `currentView()` derives the filtered list, the groups and the summary from
 * one snapshot, so they always describe the same data.
 */

import type { Result } from "../lib/types/result.ts";
import {
  aggregate,
  filterByWorkspace,
  groupByWorkspace,
  workspacesOf,
  type WorkspaceGroup,
} from "./aggregate.ts";
import type { ApiError, ConnectionState, Project, Summary, Workspace } from "./model.ts";

export type View = {
  /** Projects after the workspace filter, in fetch order. */
  readonly projects: readonly Project[];
  readonly groups: readonly WorkspaceGroup[];
  /** Every workspace seen in the unfiltered list, for the workspace picker. */
  readonly workspaces: readonly Workspace[];
  readonly summary: Summary;
  readonly connection: ConnectionState;
  readonly error?: ApiError;
  /** Selected workspace; undefined means all workspaces. */
  readonly filter?: Workspace;
  readonly lastUpdated?: Date;
};

export type PresentationState = {
  /** Marks a refresh as started. Data and filter stay as they are. */
  beginRefresh(): void;
  applyFetchResult(result: Result<readonly Project[], ApiError>): void;
  setFilter(workspaceGid: string | undefined): void;
  /** Moves the filter through [all, ...workspaces], wrapping around. */
  cycleFilter(step: 1 | -1): void;
  /** Connection goes back to disconnected (token cleared). Data stays. */
  disconnect(): void;
  currentView(): View;
};

export function createPresentationState(now: () => Date = () => new Date()): PresentationState {
  let projects: readonly Project[] = [];
  let filter: string | undefined;
  let connection: ConnectionState = { status: "disconnected" };
  let lastError: ApiError | undefined;
  let lastUpdated: Date | undefined;
  let cached: View | undefined;

  function invalidate(): void {
    cached = undefined;
  }

  function buildView(): View {
    const workspaces = workspacesOf(projects);
    const visible = filterByWorkspace(projects, filter);
    return {
      projects: visible,
      groups: groupByWorkspace(visible),
      workspaces,
      summary: aggregate(visible),
      connection,
      error: lastError,
      filter: filter === undefined
        ? undefined
        : workspaces.find((w) => w.gid === filter) ?? { gid: filter, name: filter },
      lastUpdated,
    };
  }

  const state: PresentationState = {
    beginRefresh() {
      connection = { status: "connecting" };
      invalidate();
    },

    applyFetchResult(result) {
      if (result.ok) {
        projects = result.value;
        connection = { status: "connected" };
        lastError = undefined;
        lastUpdated = now();
        if (filter !== undefined && !projects.some((p) => p.workspace.gid === filter)) {
          filter = undefined;
        }
      } else {
        connection = { status: "error", kind: result.error.kind };
        lastError = result.error;
      }
      invalidate();
    },

    setFilter(workspaceGid) {
      filter = workspaceGid;
      invalidate();
    },

    cycleFilter(step) {
      const options: (string | undefined)[] = [undefined, ...workspacesOf(projects).map((w) => w.gid)];
      const current = Math.max(0, options.indexOf(filter));
      filter = options[(current + step + options.length) % options.length];
      invalidate();
    },

    disconnect() {
      connection = { status: "disconnected" };
      lastError = undefined;
      invalidate();
    },

    currentView() {
      cached ??= buildView();
      return cached;
    },
  };

  return state;
}
