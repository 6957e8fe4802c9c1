import { define } from "gunshi";
import { apiErrorToSdkError, createCliContext, missingTokenError, requireToken, withErrorHandler } from "../context.ts";
import { formatGroups, formatSummary, formatWorkspace, ok } from "../../hateoas/index.ts";
import { SdkError } from "../../sdk/errors.ts";
import { pickWorkspaceByRef } from "../../sdk/workspace.ts";

// ── projects ─────────────────────────────────────────────────────────

export const projects = define({
  name: "projects",
  description: "Show completion progress of every project, grouped by workspace",
  args: {
    workspace: {
      type: "string" as const,
      description: "Only this workspace (GID or name)",
      short: "w",
    },
  },
  run: (ctx) => withErrorHandler("projects", async () => {
    const cli = await createCliContext({ overrides: { workspace: ctx.values.workspace } });
    const { controller, config } = cli;

    if (!(await controller.init())) throw missingTokenError();

    const outcome = await controller.refresh();
    const error = controller.state.currentView().error;
    if (outcome === "failed" && error) throw apiErrorToSdkError(error);

    if (config.workspace !== undefined) {
      const match = pickWorkspaceByRef(controller.state.currentView().workspaces, config.workspace);
      if (!match) {
        throw new SdkError(
          `Workspace "${config.workspace}" not found among workspaces with projects.`,
          "WORKSPACE_NOT_FOUND",
          "Run 'asana-progress workspaces' to list available workspaces.",
        );
      }
      controller.setFilter(match.gid);
    }

    const view = controller.state.currentView();
    ok("projects", {
      workspace: view.filter ? formatWorkspace(view.filter) : null,
      summary: formatSummary(view.summary),
      workspaces: formatGroups(view.groups),
      last_updated: view.lastUpdated?.toISOString() ?? null,
    }, [
      {
        command: "asana-progress projects --workspace <workspace>",
        description: "Limit the report to one workspace",
        params: { workspace: { required: true, description: "Workspace GID or name" } },
      },
      {
        command: "asana-progress dashboard",
        description: "Open the interactive dashboard",
      },
    ]);
  }),
});

// ── workspaces ───────────────────────────────────────────────────────

export const workspaces = define({
  name: "workspaces",
  description: "List workspaces the token can access",
  args: {},
  run: () => withErrorHandler("workspaces", async () => {
    const cli = await createCliContext();
    const { token } = await requireToken(cli);
    const listed = await cli.source.listWorkspaces(token);
    if (!listed.ok) throw apiErrorToSdkError(listed.error);

    ok("workspaces", {
      count: listed.value.length,
      workspaces: listed.value.map(formatWorkspace),
    }, [
      {
        command: "asana-progress projects --workspace <workspace>",
        description: "Show project progress in a workspace",
        params: { workspace: { required: true, description: "Workspace GID or name" } },
      },
    ]);
  }),
});
