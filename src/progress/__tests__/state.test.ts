import { describe, expect, it } from "vitest";
import { err, ok } from "../../lib/types/result.ts";
import { createPresentationState } from "../state.ts";
import { ACME, GLOBEX, project } from "./fixtures.ts";

const FIXED = new Date("2026-01-15T10:00:00Z");

function loadedState() {
  const state = createPresentationState(() => FIXED);
  state.applyFetchResult(ok([
    project({ gid: "1", workspace: ACME, completedTasks: 1, totalTasks: 2 }),
    project({ gid: "2", workspace: GLOBEX, completedTasks: 4, totalTasks: 4 }),
  ]));
  return state;
}

describe("createPresentationState", () => {
  it("starts disconnected and empty", () => {
    const view = createPresentationState().currentView();
    expect(view.connection).toEqual({ status: "disconnected" });
    expect(view.projects).toEqual([]);
    expect(view.lastUpdated).toBeUndefined();
  });

  it("a successful fetch replaces the projects and connects", () => {
    const view = loadedState().currentView();
    expect(view.connection).toEqual({ status: "connected" });
    expect(view.projects.map((p) => p.gid)).toEqual(["1", "2"]);
    expect(view.summary.overallRatio).toBe(5 / 6);
    expect(view.lastUpdated).toBe(FIXED);
  });

  it("a failed network fetch keeps the previous projects", () => {
    const state = loadedState();
    const before = state.currentView().projects;

    state.beginRefresh();
    expect(state.currentView().connection).toEqual({ status: "connecting" });
    state.applyFetchResult(err({ kind: "network_unavailable", message: "Network error: GET /workspaces" }));

    const after = state.currentView();
    expect(after.projects).toEqual(before);
    expect(after.summary.totalProjects).toBe(2);
    expect(after.connection).toEqual({ status: "error", kind: "network_unavailable" });
    expect(after.error?.kind).toBe("network_unavailable");
  });

  it("a later success clears the error", () => {
    const state = loadedState();
    state.applyFetchResult(err({ kind: "unauthorized", message: "Not Authorized" }));
    state.applyFetchResult(ok([]));
    expect(state.currentView().error).toBeUndefined();
    expect(state.currentView().connection).toEqual({ status: "connected" });
  });

  it("filters the list, groups and summary together", () => {
    const state = loadedState();
    state.setFilter(GLOBEX.gid);
    const view = state.currentView();
    expect(view.filter).toEqual(GLOBEX);
    expect(view.projects.map((p) => p.gid)).toEqual(["2"]);
    expect(view.groups.map((g) => g.workspace.gid)).toEqual([GLOBEX.gid]);
    expect(view.summary.overallRatio).toBe(1);
    expect(view.workspaces).toEqual([ACME, GLOBEX]);
  });

  it("cycles through all workspaces and back to all", () => {
    const state = loadedState();
    state.cycleFilter(1);
    expect(state.currentView().filter).toEqual(ACME);
    state.cycleFilter(1);
    expect(state.currentView().filter).toEqual(GLOBEX);
    state.cycleFilter(1);
    expect(state.currentView().filter).toBeUndefined();
    state.cycleFilter(-1);
    expect(state.currentView().filter).toEqual(GLOBEX);
  });

  it("drops a filter whose workspace disappears after a refresh", () => {
    const state = loadedState();
    state.setFilter(GLOBEX.gid);
    state.applyFetchResult(ok([project({ gid: "1", workspace: ACME })]));
    expect(state.currentView().filter).toBeUndefined();
  });

  it("disconnect keeps the data and clears the error", () => {
    const state = loadedState();
    state.applyFetchResult(err({ kind: "unauthorized", message: "Not Authorized" }));
    state.disconnect();
    const view = state.currentView();
    expect(view.connection).toEqual({ status: "disconnected" });
    expect(view.error).toBeUndefined();
    expect(view.projects).toHaveLength(2);
  });

  it("returns the same view until something changes", () => {
    const state = loadedState();
    const first = state.currentView();
    expect(state.currentView()).toBe(first);
    state.setFilter(undefined);
    expect(state.currentView()).not.toBe(first);
  });
});
