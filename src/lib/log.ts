/**
 * Diagnostics for the command layer.
 *
 * Output belongs to the JSON envelopes and the dashboard; diagnostics only go
 * to stderr, and only when ASANA_PROGRESS_DEBUG is set.
 */

const PREFIX = "[asana-progress]";

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.ASANA_PROGRESS_DEBUG?.trim().toLowerCase();
  return value === "1" || value === "true" || value === "yes";
}

export function debug(message: string, ...details: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.error(PREFIX, message, ...details);
}

export function warn(message: string): void {
  console.error(`${PREFIX} warning: ${message}`);
}
