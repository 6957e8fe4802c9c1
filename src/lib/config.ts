import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { SdkError } from "../sdk/errors.ts";
import { ASANA_BASE_URL } from "../sdk/http.ts";

export const CONFIG_FILE = ".asana-progress.json";

export const DEFAULT_CONCURRENCY = 5;

const fileConfigSchema = z.object({
  /** Workspace GID or name selected when the dashboard opens. */
  workspace: z.string().trim().min(1).optional(),
  concurrency: z.number().int().min(1).max(20).optional(),
  includeArchived: z.boolean().optional(),
  baseUrl: z.string().url().optional(),
}).strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export type AppConfig = {
  readonly workspace?: string;
  readonly concurrency: number;
  readonly includeArchived: boolean;
  readonly baseUrl: string;
};

export type LoadConfigOptions = {
  /** Directory to search for .asana-progress.json (default: cwd). */
  readonly dir?: string;
  readonly env?: NodeJS.ProcessEnv;
  /** Values from command-line flags. Take precedence over everything else. */
  readonly overrides?: Partial<AppConfig>;
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readFileConfig(dir: string): Promise<FileConfig> {
  const path = join(dir, CONFIG_FILE);
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new SdkError(
      `${CONFIG_FILE} is not valid JSON.`,
      "INVALID_INPUT",
      `Fix or remove ${path}.`,
    );
  }

  const parsed = fileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new SdkError(
      `${CONFIG_FILE} is invalid (${where}${issue?.message ?? "unknown issue"}).`,
      "INVALID_INPUT",
      `Allowed keys: workspace, concurrency (1-20), includeArchived, baseUrl.`,
    );
  }
  return parsed.data;
}

/**
 * Resolves configuration: flags > environment > .asana-progress.json > defaults.
 */
export async function loadConfig(opts: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = opts.env ?? process.env;
  const file = await readFileConfig(opts.dir ?? process.cwd());
  const envWorkspace = env.ASANA_PROGRESS_WORKSPACE?.trim() || undefined;

  return {
    workspace: opts.overrides?.workspace ?? envWorkspace ?? file.workspace,
    concurrency: opts.overrides?.concurrency ?? file.concurrency ?? DEFAULT_CONCURRENCY,
    includeArchived: opts.overrides?.includeArchived ?? file.includeArchived ?? true,
    baseUrl: opts.overrides?.baseUrl ?? file.baseUrl ?? ASANA_BASE_URL,
  };
}
