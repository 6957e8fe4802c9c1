/**
 * Dashboard rendering. Pure: view in, lines out.
 *
 * Colour goes through the injected chalk instance so tests can render with
 * `new Chalk({ level: 0 })` and compare plain text.
 */

import type { ChalkInstance } from "chalk";
import { completionRatio, statusColor, statusText } from "../progress/aggregate.ts";
import { STATUS_LABELS, type Project, type Summary } from "../progress/model.ts";
import { connectionLabel, describeApiError } from "../progress/messages.ts";
import type { LoadProgress } from "../progress/source.ts";
import type { View } from "../progress/state.ts";
import type { TokenInfo } from "../progress/controller.ts";
import { KEY_HELP } from "./keys.ts";

export const TITLE = "Asana Project Progress Tracker";
export const ALL_WORKSPACES = "All Workspaces";

const NAME_WIDTH = 32;
const BAR_WIDTH = 16;
const SUMMARY_BAR_WIDTH = 40;

const COLORS = {
  ok: "#00ff00",
  warn: "#ffa500",
  error: "#ff0000",
  busy: "#ffff00",
  muted: "#808080",
  header: "#bbbbbb",
  completed: "#0080ff",
} as const;

export type RenderInput = {
  readonly view: View;
  readonly token?: TokenInfo;
  readonly refreshing: boolean;
  readonly progress?: LoadProgress;
  /** Transient message from the last action. */
  readonly notice?: string;
};

// ── Primitives ───────────────────────────────────────────────────────

export function progressBar(ratio: number, width: number): string {
  const clamped = Math.min(1, Math.max(0, ratio));
  const filled = Math.round(clamped * width);
  return "█".repeat(filled) + "░".repeat(width - filled);
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/** Pads to `width`, truncating with an ellipsis when longer. */
export function fit(text: string, width: number): string {
  if (text.length <= width) return text.padEnd(width);
  return `${text.slice(0, width - 1)}…`;
}

// ── Sections ─────────────────────────────────────────────────────────

function statusLine(input: RenderInput, chalk: ChalkInstance): string {
  const { view } = input;
  const connection = view.connection;

  let label: string;
  let color: string;
  if (!input.token && connection.status === "disconnected") {
    label = "API key not found";
    color = COLORS.warn;
  } else {
    label = connectionLabel(connection);
    color = connection.status === "connected" ? COLORS.ok
      : connection.status === "connecting" ? COLORS.busy
      : COLORS.error;
  }

  const parts = [chalk.hex(color)(label)];
  if (view.lastUpdated) parts.push(`last updated ${view.lastUpdated.toLocaleTimeString()}`);
  if (input.token) parts.push(`key ${input.token.masked} (${input.token.source})`);
  return parts.join(" · ");
}

export function renderSummary(summary: Summary, chalk: ChalkInstance): string[] {
  const cards: [string, number, string][] = [
    ["Total Projects", summary.totalProjects, "#ffffff"],
    ["Active Projects", summary.activeProjects, COLORS.ok],
    ["Completed Projects", summary.completedProjects, COLORS.completed],
    ["Archived Projects", summary.archivedProjects, COLORS.muted],
  ];
  const width = 20;
  const labels = cards.map(([label]) => chalk.hex(COLORS.muted)(fit(label, width))).join("");
  const values = cards.map(([, value, color]) => chalk.bold.hex(color)(fit(String(value), width))).join("");

  const byStatus = STATUS_LABELS
    .map((status) => chalk.hex(statusColor(status))(`${statusText(status)} ${summary.byStatus[status]}`))
    .join(" · ");

  return [
    labels.trimEnd(),
    values.trimEnd(),
    "",
    chalk.bold("Overall Progress"),
    `${progressBar(summary.overallRatio, SUMMARY_BAR_WIDTH)}  ${summary.completedTasks}/${summary.totalTasks} tasks completed (${formatPercent(summary.overallRatio)})`,
    byStatus,
  ];
}

export function renderProjectRow(project: Project, chalk: ChalkInstance): string {
  const ratio = completionRatio(project);
  const tasks = project.countsUnavailable ? "n/a" : `${project.completedTasks}/${project.totalTasks}`;
  const status = chalk.hex(statusColor(project.status))(statusText(project.status));
  return [
    chalk.bold(fit(project.name, NAME_WIDTH)),
    progressBar(ratio, BAR_WIDTH),
    formatPercent(ratio).padStart(6),
    tasks.padStart(9),
    status,
  ].join("  ");
}

function tableHeader(chalk: ChalkInstance): string {
  return chalk.hex(COLORS.header).bold([
    fit("Project Name", NAME_WIDTH),
    fit("Progress", BAR_WIDTH + 8),
    "Tasks".padStart(9),
    "Status",
  ].join("  "));
}

function bodyLines(input: RenderInput, chalk: ChalkInstance): string[] {
  const { view } = input;

  if (input.refreshing) {
    const progress = input.progress;
    const ratio = progress && progress.total > 0 ? progress.done / progress.total : 0;
    return [
      "Loading projects...",
      `${progressBar(ratio, SUMMARY_BAR_WIDTH)}  ${Math.floor(ratio * 100)}%`,
    ];
  }

  if (!view.lastUpdated) {
    return [input.token
      ? "Press [r] to load your Asana projects"
      : "Press [s] to enter your Asana API key"];
  }

  if (view.projects.length === 0) return ["No projects found"];

  const lines: string[] = [];
  for (const group of view.groups) {
    lines.push("", chalk.bold(`Workspace: ${group.workspace.name}`), tableHeader(chalk));
    for (const project of group.projects) lines.push(renderProjectRow(project, chalk));
  }
  return lines;
}

// ── Dashboard ────────────────────────────────────────────────────────

export function renderDashboard(input: RenderInput, chalk: ChalkInstance): string[] {
  const { view } = input;
  const lines = [
    chalk.bold(TITLE),
    statusLine(input, chalk),
    `Workspace: ${view.filter?.name ?? ALL_WORKSPACES}`,
    chalk.hex(COLORS.muted)(KEY_HELP),
  ];

  if (view.error) {
    const { message, hint } = describeApiError(view.error);
    lines.push(chalk.hex(COLORS.error)(`${message} ${hint}`));
  }
  if (input.notice) lines.push(chalk.hex(COLORS.warn)(input.notice));

  if (view.lastUpdated) lines.push("", ...renderSummary(view.summary, chalk));
  lines.push("", ...bodyLines(input, chalk));
  return lines;
}
