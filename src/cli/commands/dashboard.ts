import { define } from "gunshi";
import { createCliContext, withErrorHandler } from "../context.ts";
import { runDashboard } from "../../tui/dashboard.ts";

export const dashboard = define({
  name: "dashboard",
  description: "Interactive progress dashboard (default command)",
  args: {
    workspace: {
      type: "string" as const,
      description: "Workspace to show first (GID or name)",
      short: "w",
    },
  },
  run: (ctx) => withErrorHandler("dashboard", async () => {
    const { controller, config } = await createCliContext({
      overrides: { workspace: ctx.values.workspace },
    });
    await runDashboard({ controller, initialWorkspace: config.workspace });
  }),
});
