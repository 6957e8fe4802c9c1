/**
 * asana-progress: Asana project progress in the terminal.
 *
 * `dashboard` (the default) opens the interactive view; every other command
 * prints a HATEOAS JSON envelope.
 *
 * Usage: asana-progress [command] [options]
 */

import { cli } from "gunshi";
import { dashboard } from "./cli/commands/dashboard.ts";
import { login, logout, status } from "./cli/commands/auth.ts";
import { projects, workspaces } from "./cli/commands/projects.ts";

await cli(process.argv.slice(2), dashboard, {
  name: "asana-progress",
  version: "0.1.0",
  description: "Track completion of Asana projects across workspaces",
  subCommands: new Map([
    ["dashboard", dashboard],
    ["projects", projects],
    ["workspaces", workspaces],
    ["login", login],
    ["logout", logout],
    ["status", status],
  ]),
});
