import { describe, it, expect } from "vitest";
import { createClient } from "../client.ts";
import { SdkError } from "../errors.ts";
import { listWorkspaces, pickWorkspaceByRef } from "../workspace.ts";
import { listProjects } from "../projects.ts";
import { countProjectTasks } from "../tasks.ts";
import { getMe } from "../users.ts";
import { BASE_URL, routes, stubFetch } from "./stub-fetch.ts";

describe("createClient", () => {
  it("throws SdkError AUTH_MISSING when token is empty", () => {
    expect(() => createClient({ token: "" })).toThrow(SdkError);
    expect(() => createClient({ token: "  " })).toThrow(SdkError);
  });

  it("trims the token before sending it", async () => {
    const { fetchImpl, calls } = stubFetch(routes({ "/users/me": { data: { gid: "7", name: "Ada" } } }));
    const client = createClient({ token: "  test-token\n", baseUrl: BASE_URL, fetchImpl });
    await getMe(client);
    expect(new Headers(calls[0]?.init?.headers).get("authorization")).toBe("Bearer test-token");
  });
});

describe("listWorkspaces", () => {
  it("returns workspaces sorted by name", async () => {
    const { fetchImpl } = stubFetch(routes({
      "/workspaces": { data: [{ gid: "200", name: "Zebra Corp" }, { gid: "100", name: "alpha Inc" }] },
    }));
    const client = createClient({ token: "test-token", baseUrl: BASE_URL, fetchImpl });
    const workspaces = await listWorkspaces(client);
    expect(workspaces.map((w) => w.gid)).toEqual(["100", "200"]);
  });
});

describe("pickWorkspaceByRef", () => {
  const workspaces = [
    { gid: "100", name: "Alpha Inc" },
    { gid: "200", name: "Zebra Corp" },
    { gid: "300", name: "zebra corp" },
  ];

  it("matches a numeric ref against the GID", () => {
    expect(pickWorkspaceByRef(workspaces, "200")).toEqual({ gid: "200", name: "Zebra Corp" });
  });

  it("matches a name case-insensitively", () => {
    expect(pickWorkspaceByRef(workspaces, " alpha inc ")).toEqual({ gid: "100", name: "Alpha Inc" });
  });

  it("returns undefined when nothing matches", () => {
    expect(pickWorkspaceByRef(workspaces, "999")).toBeUndefined();
    expect(pickWorkspaceByRef(workspaces, "Beta")).toBeUndefined();
  });

  it("throws INVALID_INPUT for an ambiguous name", () => {
    expect(() => pickWorkspaceByRef(workspaces, "Zebra Corp")).toThrow(SdkError);
  });
});

describe("listProjects", () => {
  it("requests the workspace's projects with status fields", async () => {
    const { fetchImpl, calls } = stubFetch(routes({
      "/workspaces/100/projects": { data: [{ gid: "1", name: "Launch", archived: false }] },
    }));
    const client = createClient({ token: "test-token", baseUrl: BASE_URL, fetchImpl });

    const projects = await listProjects(client, "100");

    expect(projects).toEqual([{ gid: "1", name: "Launch", archived: false }]);
    expect(calls[0]?.url.searchParams.get("opt_fields")).toContain("current_status_update.status_type");
    expect(calls[0]?.url.searchParams.has("archived")).toBe(false);
  });

  it("asks only for unarchived projects when archived ones are excluded", async () => {
    const { fetchImpl, calls } = stubFetch(routes({ "/workspaces/100/projects": { data: [] } }));
    const client = createClient({ token: "test-token", baseUrl: BASE_URL, fetchImpl });
    await listProjects(client, "100", { includeArchived: false });
    expect(calls[0]?.url.searchParams.get("archived")).toBe("false");
  });
});

describe("countProjectTasks", () => {
  it("counts completed tasks across pages", async () => {
    const { fetchImpl } = stubFetch((url) =>
      url.searchParams.get("offset") === "next"
        ? new Response(JSON.stringify({ data: [{ gid: "3", completed: true }] }), {
            headers: { "content-type": "application/json" },
          })
        : new Response(JSON.stringify({
            data: [{ gid: "1", completed: true }, { gid: "2", completed: false }],
            next_page: { offset: "next" },
          }), { headers: { "content-type": "application/json" } }),
    );
    const client = createClient({ token: "test-token", baseUrl: BASE_URL, fetchImpl });
    expect(await countProjectTasks(client, "1")).toEqual({ completed: 2, total: 3 });
  });
});
