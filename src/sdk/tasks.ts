import { type AsanaClient } from "./client.ts";
import { TASK_COUNT_OPT_FIELDS, taskSchema } from "./types.ts";

export type TaskCounts = {
  readonly completed: number;
  readonly total: number;
};

/**
 * Counts the tasks of a project and how many of them are completed.
 * Walks every page of the project's task list, requesting only `completed`.
 */
export async function countProjectTasks(client: AsanaClient, projectGid: string): Promise<TaskCounts> {
  const tasks = await client.paginate(`/projects/${projectGid}/tasks`, taskSchema, {
    opt_fields: TASK_COUNT_OPT_FIELDS,
  });
  const completed = tasks.filter((t) => t.completed === true).length;
  return { completed, total: tasks.length };
}
