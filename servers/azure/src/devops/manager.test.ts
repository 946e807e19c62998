import { beforeEach, describe, expect, it, vi } from "vitest";
import { NotFoundError, ToolInputError } from "../../../../src/index.js";
import { NO_RETRY, fakeCredentials } from "../testing.js";
import { AzureDevOpsError, DevOpsRestClient, organizationUrl, releaseUrl } from "./client.js";
import { AzureDevOpsManager } from "./manager.js";

const fetchSpy = vi.fn<typeof fetch>();

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function requestAt(index: number): { url: string; init: RequestInit | undefined } {
  const [input, init] = fetchSpy.mock.calls[index];
  return { url: String(input), init };
}

function header(init: RequestInit | undefined, name: string): string | undefined {
  return new Headers(init?.headers).get(name) ?? undefined;
}

describe("organizationUrl", () => {
  it("accepts names and URLs", () => {
    expect(organizationUrl("contoso")).toBe("https://dev.azure.com/contoso");
    expect(organizationUrl("https://dev.azure.com/contoso/")).toBe("https://dev.azure.com/contoso");
  });
});

describe("releaseUrl", () => {
  it("points at the release management host", () => {
    expect(releaseUrl("https://dev.azure.com/contoso")).toBe("https://vsrm.dev.azure.com/contoso");
    expect(releaseUrl("https://contoso.visualstudio.com")).toBe("https://contoso.vsrm.visualstudio.com");
  });
});

describe("AzureDevOpsManager", () => {
  let manager: AzureDevOpsManager;

  beforeEach(() => {
    fetchSpy.mockReset();
    manager = new AzureDevOpsManager(
      new DevOpsRestClient({ organization: "contoso", pat: "test-pat", credentials: fakeCredentials, retry: NO_RETRY, fetch: fetchSpy }),
    );
  });

  it("authenticates with the PAT and pins the API version", async () => {
    fetchSpy.mockResolvedValue(json({ value: [{ id: "p1", name: "Web", state: "wellFormed" }] }));
    const projects = await manager.listProjects();
    expect(projects).toEqual([expect.objectContaining({ id: "p1", name: "Web", state: "wellFormed" })]);
    const { url, init } = requestAt(0);
    expect(url).toBe("https://dev.azure.com/contoso/_apis/projects?%24top=500&api-version=7.1");
    expect(header(init, "Authorization")).toBe(`Basic ${Buffer.from(":test-pat").toString("base64")}`);
  });

  it("falls back to an Entra ID token without a PAT", async () => {
    const client = new DevOpsRestClient({ organization: "contoso", credentials: fakeCredentials, retry: NO_RETRY, fetch: fetchSpy });
    fetchSpy.mockResolvedValue(json({ value: [] }));
    await new AzureDevOpsManager(client).listPipelines("Web");
    expect(client.authMethod).toBe("entra-id");
    expect(header(requestAt(0).init, "Authorization")).toBe("Bearer test-token");
  });

  it("turns HTTP failures into AzureDevOpsError", async () => {
    fetchSpy.mockResolvedValue(json({ message: "Access denied", typeKey: "UnauthorizedRequestException" }, 401));
    const error = await manager.listProjects().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AzureDevOpsError);
    expect(error).toMatchObject({ statusCode: 401, code: "HTTP401", typeKey: "UnauthorizedRequestException" });
  });

  it("maps 404 lookups to NotFoundError", async () => {
    fetchSpy.mockResolvedValue(json({ message: "Build not found" }, 404));
    await expect(manager.getBuild("Web", 99)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("maps work item fields", async () => {
    fetchSpy.mockResolvedValue(
      json({
        id: 12,
        rev: 3,
        fields: {
          "System.WorkItemType": "Bug",
          "System.Title": "Login fails",
          "System.State": "Active",
          "System.AssignedTo": { displayName: "Sam Doe", uniqueName: "sam@example.com" },
        },
      }),
    );
    expect(await manager.getWorkItem(12)).toMatchObject({
      id: 12,
      type: "Bug",
      title: "Login fails",
      state: "Active",
      assignedTo: "Sam Doe",
    });
  });

  it("runs WIQL then fetches the items", async () => {
    fetchSpy
      .mockResolvedValueOnce(json({ workItems: [{ id: 1 }, { id: 2 }] }))
      .mockResolvedValueOnce(json({ value: [{ id: 1, fields: { "System.Title": "A" } }, { id: 2, fields: { "System.Title": "B" } }] }));
    const result = await manager.queryWorkItems("Web", "SELECT [System.Id] FROM WorkItems", 10);
    expect(result.workItems.map((w) => w.title)).toEqual(["A", "B"]);
    expect(requestAt(0).init?.method).toBe("POST");
    expect(requestAt(1).url).toContain("ids=1%2C2");
  });

  it("sends work item fields as a JSON patch", async () => {
    fetchSpy.mockResolvedValue(json({ id: 30, fields: { "System.Title": "New task" } }));
    await manager.createWorkItem("Web", "Task", { title: "New task", assignedTo: "sam@example.com" });
    const { url, init } = requestAt(0);
    expect(url).toBe("https://dev.azure.com/contoso/Web/_apis/wit/workitems/$Task?api-version=7.1");
    expect(header(init, "Content-Type")).toBe("application/json-patch+json");
    expect(JSON.parse(String(init?.body))).toEqual([
      { op: "add", path: "/fields/System.Title", value: "New task" },
      { op: "add", path: "/fields/System.AssignedTo", value: "sam@example.com" },
    ]);
  });

  it("queues builds on a branch ref", async () => {
    fetchSpy.mockResolvedValue(json({ id: 501, buildNumber: "20240501.1", status: "notStarted" }));
    const build = await manager.queueBuild("Web", 7, "release/1.0");
    expect(build.buildNumber).toBe("20240501.1");
    expect(JSON.parse(String(requestAt(0).init?.body))).toEqual({ definition: { id: 7 }, sourceBranch: "refs/heads/release/1.0" });
  });

  it("searches every log of a build", async () => {
    fetchSpy
      .mockResolvedValueOnce(json({ value: [{ id: 1 }, { id: 2 }] }))
      .mockResolvedValueOnce(new Response("checkout\nall good"))
      .mockResolvedValueOnce(new Response("compile\nerror: missing semicolon\ndone"));
    const result = await manager.searchBuildLogs("Web", 501, "error:", { contextLines: 1 });
    expect(result.logsSearched).toBe(2);
    expect(result.matches).toEqual([
      { logId: 2, lineNumber: 2, line: "error: missing semicolon", before: ["compile"], after: ["done"] },
    ]);
    expect(header(requestAt(1).init, "Accept")).toBe("text/plain");
  });

  it("lists releases from the release host", async () => {
    fetchSpy.mockResolvedValue(
      json({ value: [{ id: 40, name: "Release-40", status: "active", releaseDefinition: { id: 3, name: "Deploy" } }] }),
    );
    const releases = await manager.listReleases("Web", { definitionId: 3, top: 5 });
    expect(releases).toEqual([
      expect.objectContaining({ id: 40, name: "Release-40", status: "active", releaseDefinition: { id: 3, name: "Deploy" } }),
    ]);
    expect(requestAt(0).url).toBe(
      "https://vsrm.dev.azure.com/contoso/Web/_apis/release/releases?definitionId=3&%24top=5&queryOrder=descending&api-version=7.1",
    );
  });

  it("maps release definition stages and artifacts", async () => {
    fetchSpy.mockResolvedValue(
      json({
        id: 3,
        name: "Deploy",
        environments: [{ id: 1, name: "Staging", rank: 1 }],
        artifacts: [{ alias: "_web", type: "Build", isPrimary: true }],
      }),
    );
    const definition = await manager.getReleaseDefinition("Web", 3);
    expect(definition.environments).toEqual([{ id: 1, name: "Staging", rank: 1 }]);
    expect(definition.artifacts).toEqual([{ alias: "_web", type: "Build", isPrimary: true }]);
  });

  it("reports a missing release definition", async () => {
    fetchSpy.mockResolvedValue(json({ message: "not found" }, 404));
    await expect(manager.getReleaseDefinition("Web", 8)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("finds YAML files in a repository", async () => {
    fetchSpy.mockResolvedValue(
      json({
        value: [
          { path: "/", isFolder: true },
          { path: "/ci/build.yml" },
          { path: "/README.md" },
          { path: "/azure-pipelines.yaml" },
        ],
      }),
    );
    expect(await manager.findYamlFiles("Web", "app")).toEqual(["/azure-pipelines.yaml", "/ci/build.yml"]);
  });

  it("reads the YAML file behind a build definition", async () => {
    fetchSpy
      .mockResolvedValueOnce(
        json({
          id: 4,
          process: { type: 2, yamlFilename: "/ci/build.yml" },
          repository: { id: "r1", name: "app", defaultBranch: "refs/heads/main" },
        }),
      )
      .mockResolvedValueOnce(json({ path: "/ci/build.yml", content: "trigger: none" }));
    expect(await manager.getPipelineYaml("Web", 4)).toEqual({
      definitionId: 4,
      repository: "app",
      branch: "main",
      path: "/ci/build.yml",
      content: "trigger: none",
    });
    expect(requestAt(1).url).toContain("versionDescriptor.version=main");
  });

  it("rejects designer build definitions", async () => {
    fetchSpy.mockResolvedValue(json({ id: 4, process: { type: 1 }, repository: { id: "r1" } }));
    const error = await manager.getPipelineYaml("Web", 4).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ToolInputError);
    expect(error).toMatchObject({ message: "Build definition 4 is not a YAML pipeline" });
  });

  it("pushes a file edit on top of the branch head", async () => {
    fetchSpy
      .mockResolvedValueOnce(json({ id: "r1", name: "app", defaultBranch: "refs/heads/main" }))
      .mockResolvedValueOnce(json({ value: [{ name: "refs/heads/main", objectId: "abc123" }] }))
      .mockResolvedValueOnce(json({ path: "/azure-pipelines.yml" }))
      .mockResolvedValueOnce(json({ pushId: 9, commits: [{ commitId: "def456" }] }));
    const update = await manager.updateFile("Web", "app", "/azure-pipelines.yml", "trigger: main", {
      commitMessage: "Build on main",
    });
    expect(update).toEqual({ path: "/azure-pipelines.yml", branch: "refs/heads/main", commitId: "def456", pushId: 9, changeType: "edit" });
    expect(requestAt(1).url).toBe("https://dev.azure.com/contoso/Web/_apis/git/repositories/r1/refs?filter=heads%2Fmain&api-version=7.1");
    const push = requestAt(3);
    expect(push.url).toBe("https://dev.azure.com/contoso/Web/_apis/git/repositories/r1/pushes?api-version=7.1");
    expect(JSON.parse(String(push.init?.body))).toEqual({
      refUpdates: [{ name: "refs/heads/main", oldObjectId: "abc123" }],
      commits: [
        {
          comment: "Build on main",
          changes: [
            { changeType: "edit", item: { path: "/azure-pipelines.yml" }, newContent: { content: "trigger: main", contentType: "rawtext" } },
          ],
        },
      ],
    });
  });

  it("adds the file when the branch does not have it", async () => {
    fetchSpy
      .mockResolvedValueOnce(json({ id: "r1", name: "app", defaultBranch: "refs/heads/main" }))
      .mockResolvedValueOnce(json({ value: [{ name: "refs/heads/dev", objectId: "0a0a" }] }))
      .mockResolvedValueOnce(json({ message: "not found" }, 404))
      .mockResolvedValueOnce(json({ pushId: 10, commits: [{ commitId: "1b1b" }] }));
    const update = await manager.updateFile("Web", "app", "/new.yml", "steps: []", { commitMessage: "Add", branch: "dev" });
    expect(update.changeType).toBe("add");
    expect(update.branch).toBe("refs/heads/dev");
  });
});
