import { type AsanaClient } from "./client.ts";
import { type AsanaProject, PROJECT_OPT_FIELDS, projectSchema } from "./types.ts";

export async function listProjects(
  client: AsanaClient,
  workspaceGid: string,
  opts: { includeArchived?: boolean } = {},
): Promise<AsanaProject[]> {
  return client.paginate(`/workspaces/${workspaceGid}/projects`, projectSchema, {
    opt_fields: PROJECT_OPT_FIELDS,
    archived: opts.includeArchived === false ? false : undefined,
  });
}
