import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CONFIG_FILE, DEFAULT_CONCURRENCY, loadConfig } from "../config.ts";
import { ASANA_BASE_URL } from "../../sdk/http.ts";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "asana-progress-config-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeConfig(content: string): Promise<void> {
  await writeFile(join(dir, CONFIG_FILE), content, "utf8");
}

describe("loadConfig", () => {
  it("uses defaults when there is no config file", async () => {
    const config = await loadConfig({ dir, env: {} });
    expect(config).toEqual({
      workspace: undefined,
      concurrency: DEFAULT_CONCURRENCY,
      includeArchived: true,
      baseUrl: ASANA_BASE_URL,
    });
  });

  it("reads values from the config file", async () => {
    await writeConfig(JSON.stringify({ workspace: "Acme", concurrency: 2, includeArchived: false }));
    const config = await loadConfig({ dir, env: {} });
    expect(config.workspace).toBe("Acme");
    expect(config.concurrency).toBe(2);
    expect(config.includeArchived).toBe(false);
  });

  it("lets the environment override the file and flags override both", async () => {
    await writeConfig(JSON.stringify({ workspace: "From file" }));
    const env = { ASANA_PROGRESS_WORKSPACE: "From env" };

    expect((await loadConfig({ dir, env })).workspace).toBe("From env");
    expect((await loadConfig({ dir, env, overrides: { workspace: "From flag" } })).workspace).toBe("From flag");
  });

  it("ignores a blank workspace variable", async () => {
    await writeConfig(JSON.stringify({ workspace: "From file" }));
    const config = await loadConfig({ dir, env: { ASANA_PROGRESS_WORKSPACE: "  " } });
    expect(config.workspace).toBe("From file");
  });

  it("reports malformed JSON as INVALID_INPUT", async () => {
    await writeConfig("{ not json");
    await expect(loadConfig({ dir, env: {} })).rejects.toMatchObject({
      code: "INVALID_INPUT",
      message: ".asana-progress.json is not valid JSON.",
    });
  });

  it("rejects out-of-range and unknown keys", async () => {
    await writeConfig(JSON.stringify({ concurrency: 50 }));
    await expect(loadConfig({ dir, env: {} })).rejects.toMatchObject({ code: "INVALID_INPUT" });

    await writeConfig(JSON.stringify({ token: "test-secret" }));
    await expect(loadConfig({ dir, env: {} })).rejects.toMatchObject({ code: "INVALID_INPUT" });
  });
});
