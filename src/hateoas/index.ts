export { ok, fatal, HELP_ACTION, CLI_NAME, type NextAction } from "./output.ts";
export { formatProject, formatSummary, formatWorkspace, formatGroups, toPercent } from "./format.ts";
