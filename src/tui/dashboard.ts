/**
 * Interactive dashboard: full-screen terminal view over the progress controller.
 *
 * Network work runs on the event loop while keypresses keep arriving; every
 * controller change redraws the screen from `currentView()`.
 */

import { emitKeypressEvents } from "node:readline";
import defaultChalk, { type ChalkInstance } from "chalk";
import { SdkError } from "../sdk/errors.ts";
import { pickWorkspaceByRef } from "../sdk/workspace.ts";
import type { ProgressController } from "../progress/controller.ts";
import { keyToAction, type DashboardAction, type Keypress } from "./keys.ts";
import { promptSecret } from "./prompt.ts";
import { renderDashboard } from "./render.ts";

const ENTER_SCREEN = "\x1b[?1049h\x1b[?25l";
const LEAVE_SCREEN = "\x1b[?25h\x1b[?1049l";
const CLEAR = "\x1b[H\x1b[2J";

const SETTINGS_HELP = [
  "",
  "API Settings",
  "",
  "To get your Asana API key:",
  "  1. Go to https://app.asana.com/0/developer-console",
  "  2. Create a new Personal Access Token",
  "  3. Paste it below (leave empty to cancel)",
  "",
].join("\n");

/** What the dashboard needs from stdin; tests pass a stream with a fake raw mode. */
export type TerminalInput = NodeJS.ReadableStream & {
  readonly isTTY?: boolean;
  setRawMode(mode: boolean): unknown;
};

export type DashboardOptions = {
  readonly controller: ProgressController;
  readonly input?: TerminalInput;
  readonly output?: NodeJS.WritableStream;
  readonly chalk?: ChalkInstance;
  /** Workspace GID or name to select once projects are loaded. */
  readonly initialWorkspace?: string;
};

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runDashboard(opts: DashboardOptions): Promise<void> {
  const input: TerminalInput = opts.input ?? process.stdin;
  const output: NodeJS.WritableStream = opts.output ?? process.stdout;
  const chalk = opts.chalk ?? defaultChalk;
  const { controller } = opts;

  if (!input.isTTY) {
    throw new SdkError(
      "The dashboard needs an interactive terminal.",
      "INVALID_INPUT",
      "Use 'asana-progress projects' for JSON output.",
    );
  }

  let notice: string | undefined;
  let prompting = false;
  let closed = false;
  let pendingWorkspace = opts.initialWorkspace;

  const draw = () => {
    if (prompting || closed) return;
    const lines = renderDashboard({
      view: controller.state.currentView(),
      token: controller.tokenInfo(),
      refreshing: controller.isRefreshing(),
      progress: controller.progress(),
      notice,
    }, chalk);
    output.write(CLEAR + lines.join("\n") + "\n");
  };

  return new Promise<void>((resolve) => {
    const onKeypress = (char: string | undefined, key: Keypress | undefined) => {
      const action = keyToAction(char, key);
      if (action) handle(action);
    };

    const attach = () => {
      output.write(ENTER_SCREEN);
      input.setRawMode(true);
      input.on("keypress", onKeypress);
      input.resume();
    };

    const detach = () => {
      input.off("keypress", onKeypress);
      input.setRawMode(false);
      output.write(LEAVE_SCREEN);
    };

    const unsubscribe = controller.subscribe(draw);

    const run = (task: () => Promise<void>) => {
      void task()
        .catch((error: unknown) => {
          notice = `Unexpected error: ${messageOf(error)}`;
        })
        .finally(draw);
    };

    const applyPendingWorkspace = () => {
      if (pendingWorkspace === undefined) return;
      const ref = pendingWorkspace;
      pendingWorkspace = undefined;
      try {
        const match = pickWorkspaceByRef(controller.state.currentView().workspaces, ref);
        if (match) controller.setFilter(match.gid);
        else notice = `Workspace "${ref}" not found; showing all workspaces.`;
      } catch (error) {
        notice = messageOf(error);
      }
    };

    const refresh = async (): Promise<void> => {
      const outcome = await controller.refresh();
      if (outcome === "no_token") return openSettings();
      if (outcome === "ignored") notice = "A refresh is already running.";
      if (outcome === "stale" && controller.tokenInfo()) return refresh();
      if (outcome === "ok") {
        notice = undefined;
        applyPendingWorkspace();
      }
    };

    const openSettings = async (): Promise<void> => {
      prompting = true;
      detach();
      output.write(SETTINGS_HELP + "\n");
      const raw = await promptSecret("Asana API Key: ", input, output).finally(() => {
        prompting = false;
        attach();
      });

      const saved = await controller.saveToken(raw);
      switch (saved.status) {
        case "empty":
          notice = "No key entered; settings unchanged.";
          return;
        case "rejected":
          notice = "Asana rejected that key. Press [s] to try another.";
          return;
        case "saved":
          notice = saved.persisted.ok
            ? `API key saved${saved.account ? ` for ${saved.account.name}` : ""}.`
            : `Could not store the key in the system keychain (${saved.persisted.error.message}); using it for this session only.`;
          await refresh();
      }
    };

    const finish = () => {
      closed = true;
      unsubscribe();
      detach();
      input.pause();
      resolve();
    };

    function handle(action: DashboardAction): void {
      switch (action) {
        case "refresh":
          run(refresh);
          return;
        case "next_workspace":
          controller.cycleFilter(1);
          return;
        case "prev_workspace":
          controller.cycleFilter(-1);
          return;
        case "all_workspaces":
          controller.setFilter(undefined);
          return;
        case "settings":
          if (!prompting) run(openSettings);
          return;
        case "clear_token":
          run(async () => {
            const cleared = await controller.clearToken();
            notice = cleared.ok
              ? "API key cleared."
              : `Could not remove the key from the system keychain: ${cleared.error.message}`;
          });
          return;
        case "quit":
          finish();
          return;
      }
    }

    emitKeypressEvents(input);
    attach();

    run(async () => {
      const token = await controller.init();
      draw();
      if (token) await refresh();
      else await openSettings();
    });
  });
}
