// ── Asana API Types ─────────────────────────────────────────────────
//
// Schemas cover only the fields requested through opt_fields below.
// Unknown fields pass through untouched.

import { z } from "zod";

const compactRef = z.object({
  gid: z.string(),
  name: z.string().nullish(),
}).passthrough();

export const workspaceSchema = z.object({
  gid: z.string(),
  name: z.string().nullish(),
  is_default: z.boolean().nullish(),
}).passthrough();

export const projectSchema = z.object({
  gid: z.string(),
  name: z.string().nullish(),
  workspace: compactRef.nullish(),
  archived: z.boolean().nullish(),
  completed: z.boolean().nullish(),
  color: z.string().nullish(),
  current_status_update: z.object({
    status_type: z.string().nullish(),
  }).passthrough().nullish(),
  current_status: z.object({
    color: z.string().nullish(),
  }).passthrough().nullish(),
}).passthrough();

export const taskSchema = z.object({
  gid: z.string(),
  completed: z.boolean().nullish(),
}).passthrough();

export const userSchema = z.object({
  gid: z.string(),
  name: z.string().nullish(),
  email: z.string().nullish(),
}).passthrough();

export type AsanaWorkspace = z.infer<typeof workspaceSchema>;
export type AsanaProject = z.infer<typeof projectSchema>;
export type AsanaTask = z.infer<typeof taskSchema>;
export type AsanaUser = z.infer<typeof userSchema>;

// ── opt_fields constants ────────────────────────────────────────────

export const WORKSPACE_OPT_FIELDS = "gid,name,is_default";

export const PROJECT_OPT_FIELDS = [
  "gid", "name", "workspace", "workspace.name", "archived", "completed",
  "color", "current_status_update", "current_status_update.status_type",
  "current_status", "current_status.color",
].join(",");

export const TASK_COUNT_OPT_FIELDS = "completed";

export const USER_OPT_FIELDS = "gid,name,email";
