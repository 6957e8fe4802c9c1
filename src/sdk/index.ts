import * as projects from "./projects.ts";
import * as tasks from "./tasks.ts";
import * as users from "./users.ts";
import * as workspace from "./workspace.ts";

export { projects, tasks, users, workspace };

export type { AsanaClient, ClientConfig } from "./client.ts";
export { createClient } from "./client.ts";
export type { SdkErrorCode } from "./errors.ts";
export { SdkError, isSdkError } from "./errors.ts";
export { parallel, type ParallelOpts, type ParallelResult } from "./parallel.ts";
export type * from "./types.ts";
