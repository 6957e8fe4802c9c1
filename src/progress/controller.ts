/**
 * Progress controller: the explicitly owned application context.
 *
 * Holds the session token, the credential store, the project source and the
 * presentation state, and is the only writer of that state. The dashboard and
 * the commands dispatch refresh / filter / save / clear through it.
 */

import type { CredentialStore, StoreError } from "../lib/auth/credential-store.ts";
import { maskToken, normalizeToken, resolveToken, type TokenSource } from "../lib/auth/token.ts";
import { err, type Result } from "../lib/types/result.ts";
import type { ApiError } from "./model.ts";
import { loadProjects, type Account, type LoadProgress, type ProjectSource } from "./source.ts";
import { createPresentationState, type PresentationState } from "./state.ts";

/**
 * `stale`: the token was cleared or replaced while the load ran, so its
 * result was dropped.
 */
export type RefreshOutcome = "ok" | "failed" | "ignored" | "no_token" | "stale";

export type SaveTokenResult =
  | { readonly status: "empty" }
  | { readonly status: "rejected"; readonly error: ApiError }
  | {
      readonly status: "saved";
      /** Undefined when the token could not be checked (offline, rate limited). */
      readonly account?: Account;
      /** A failed persist leaves the token usable for this session only. */
      readonly persisted: Result<void, StoreError>;
    };

export type TokenInfo = {
  readonly source: TokenSource;
  readonly masked: string;
};

export type ControllerOptions = {
  readonly source: ProjectSource;
  readonly store: CredentialStore;
  readonly state?: PresentationState;
  readonly env?: NodeJS.ProcessEnv;
  readonly concurrency?: number;
  readonly delayMs?: number;
};

export type ProgressController = {
  readonly state: PresentationState;
  /** Registers a listener for every state change, including load progress. */
  subscribe(listener: () => void): () => void;
  /** Reads the token from the environment or the credential store. */
  init(): Promise<TokenInfo | undefined>;
  tokenInfo(): TokenInfo | undefined;
  isRefreshing(): boolean;
  /** Progress of the refresh in flight, if any. */
  progress(): LoadProgress | undefined;
  /** Starts a refresh; a second call while one is in flight is ignored. */
  refresh(): Promise<RefreshOutcome>;
  setFilter(workspaceGid: string | undefined): void;
  cycleFilter(step: 1 | -1): void;
  saveToken(token: string): Promise<SaveTokenResult>;
  clearToken(): Promise<Result<void, StoreError>>;
};

export function createProgressController(opts: ControllerOptions): ProgressController {
  const state = opts.state ?? createPresentationState();
  let token: { value: string; source: TokenSource } | undefined;
  let inFlight = false;
  let loadProgress: LoadProgress | undefined;

  const listeners = new Set<() => void>();

  const changed = () => {
    for (const listener of listeners) listener();
  };

  const controller: ProgressController = {
    state,

    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    async init() {
      const resolved = await resolveToken(opts.store, opts.env);
      token = resolved ? { value: resolved.token, source: resolved.source } : undefined;
      return controller.tokenInfo();
    },

    tokenInfo() {
      return token ? { source: token.source, masked: maskToken(token.value) } : undefined;
    },

    isRefreshing: () => inFlight,

    progress: () => loadProgress,

    async refresh() {
      if (inFlight) return "ignored";
      if (!token) return "no_token";
      const session = token;

      inFlight = true;
      loadProgress = undefined;
      state.beginRefresh();
      changed();

      try {
        const result = await loadProjects(opts.source, session.value, {
          concurrency: opts.concurrency,
          delayMs: opts.delayMs,
          onProgress: (progress) => {
            loadProgress = progress;
            changed();
          },
        });
        if (token !== session) {
          state.disconnect();
          return "stale";
        }
        state.applyFetchResult(result);
        return result.ok ? "ok" : "failed";
      } finally {
        inFlight = false;
        loadProgress = undefined;
        changed();
      }
    },

    setFilter(workspaceGid) {
      state.setFilter(workspaceGid);
      changed();
    },

    cycleFilter(step) {
      state.cycleFilter(step);
      changed();
    },

    async saveToken(raw) {
      const value = normalizeToken(raw);
      if (value === undefined) return { status: "empty" };

      const verified = await opts.source.verifyToken(value);
      if (!verified.ok && verified.error.kind === "unauthorized") {
        state.applyFetchResult(err(verified.error));
        changed();
        return { status: "rejected", error: verified.error };
      }

      const persisted = await opts.store.save(value);
      token = { value, source: persisted.ok ? "keychain" : "session" };
      changed();
      return verified.ok
        ? { status: "saved", account: verified.value, persisted }
        : { status: "saved", persisted };
    },

    async clearToken() {
      const cleared = await opts.store.clear();
      token = undefined;
      state.disconnect();
      changed();
      return cleared;
    },
  };

  return controller;
}
