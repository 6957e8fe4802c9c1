// ── HATEOAS JSON Output ─────────────────────────────────────────────

import type { SdkErrorCode } from "../sdk/errors.ts";

export const CLI_NAME = "asana-progress";

type NextActionParam = {
  description?: string;
  value?: string | number;
  required?: boolean;
};

export type NextAction = {
  command: string;
  description: string;
  params?: Record<string, NextActionParam>;
};

export const HELP_ACTION: NextAction = {
  command: `${CLI_NAME} --help`,
  description: "Show available commands",
};

export function ok(
  command: string,
  result: unknown,
  nextActions: NextAction[] = [],
): void {
  console.log(
    JSON.stringify(
      {
        ok: true,
        command: `${CLI_NAME} ${command}`,
        result,
        next_actions: nextActions,
      },
      null,
      2,
    ),
  );
}

export function fatal(
  message: string,
  opts: { code?: SdkErrorCode | "COMMAND_FAILED"; fix?: string; command?: string; nextActions?: NextAction[] } = {},
): never {
  console.error(
    JSON.stringify({
      ok: false,
      command: opts.command ? `${CLI_NAME} ${opts.command}` : undefined,
      error: {
        message,
        code: opts.code ?? "COMMAND_FAILED",
      },
      fix: opts.fix ?? "Check the error message and retry with corrected input.",
      next_actions: opts.nextActions ?? [HELP_ACTION],
    }),
  );
  process.exit(1);
}
