/**
 * Workspace utilities for the SDK layer.
 *
 * These are pure helpers: they receive a client and return data.
 */

import { type AsanaClient } from "./client.ts";
import { SdkError } from "./errors.ts";
import { type AsanaWorkspace, WORKSPACE_OPT_FIELDS, workspaceSchema } from "./types.ts";

/**
 * Lists all workspaces accessible to the authenticated user.
 * Returned sorted lexicographically by name then GID (deterministic).
 */
export async function listWorkspaces(client: AsanaClient): Promise<AsanaWorkspace[]> {
  const workspaces = await client.paginate("/workspaces", workspaceSchema, {
    opt_fields: WORKSPACE_OPT_FIELDS,
  });
  return [...workspaces].sort((a, b) =>
    (a.name ?? a.gid).toLowerCase().localeCompare((b.name ?? b.gid).toLowerCase()),
  );
}

/**
 * Picks a workspace by GID or case-insensitive exact name.
 * Returns undefined when nothing matches; throws when a name is ambiguous.
 */
export function pickWorkspaceByRef<W extends { readonly gid: string; readonly name?: string | null }>(
  workspaces: readonly W[],
  ref: string,
): W | undefined {
  const trimmed = ref.trim();
  if (/^\d+$/.test(trimmed)) return workspaces.find((w) => w.gid === trimmed);
  const lower = trimmed.toLowerCase();
  const exact = workspaces.filter((w) => (w.name ?? "").toLowerCase() === lower);
  if (exact.length === 1) return exact[0];
  if (exact.length > 1) {
    throw new SdkError(
      `Workspace "${trimmed}" is ambiguous (${exact.length} matches).`,
      "INVALID_INPUT",
      "Use the workspace GID instead of name to disambiguate.",
    );
  }
  return undefined;
}
