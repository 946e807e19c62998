/**
 * Azure DevOps Manager
 *
 * Projects, repositories, builds, work items and pipelines over the
 * DevOps REST API.
 */

import { NotFoundError, ToolInputError, isRecord } from "../../../../src/index.js";
import { getOrNull } from "../retry.js";
import { DevOpsRestClient } from "./client.js";
import { identity, listValue, num, rec, records, str, type Json } from "./fields.js";
import { searchLogLines, type LogSearchOptions } from "./log-search.js";
import type {
  Build,
  BuildDefinition,
  BuildLog,
  DevOpsProject,
  DevOpsRepository,
  FileUpdate,
  LogSearchResult,
  Pipeline,
  PipelineRun,
  PipelineYaml,
  Release,
  ReleaseDefinition,
  ReleaseDefinitionDetails,
  RepositoryFile,
  TimelineRecord,
  WorkItem,
} from "./types.js";

/** Work items fetched per batch request. */
const WORK_ITEM_BATCH = 200;

const YAML_FILE = /\.ya?ml$/i;

const seg = encodeURIComponent;

function branchRef(branch: string): string {
  return branch.startsWith("refs/") ? branch : `refs/heads/${branch}`;
}

function mapProject(p: Json): DevOpsProject {
  return {
    id: str(p, "id") ?? "",
    name: str(p, "name") ?? "",
    description: str(p, "description"),
    state: str(p, "state"),
    visibility: str(p, "visibility"),
    lastUpdateTime: str(p, "lastUpdateTime"),
    url: str(p, "url"),
  };
}

function mapRepository(r: Json): DevOpsRepository {
  return {
    id: str(r, "id") ?? "",
    name: str(r, "name") ?? "",
    defaultBranch: str(r, "defaultBranch"),
    size: num(r, "size"),
    remoteUrl: str(r, "remoteUrl"),
    webUrl: str(r, "webUrl"),
  };
}

function mapBuild(b: Json): Build {
  const definition = rec(b, "definition");
  return {
    id: num(b, "id") ?? 0,
    buildNumber: str(b, "buildNumber"),
    status: str(b, "status"),
    result: str(b, "result"),
    definition: { id: num(definition, "id"), name: str(definition, "name") },
    sourceBranch: str(b, "sourceBranch"),
    sourceVersion: str(b, "sourceVersion"),
    requestedFor: identity(b.requestedFor),
    queueTime: str(b, "queueTime"),
    startTime: str(b, "startTime"),
    finishTime: str(b, "finishTime"),
    url: str(rec(rec(b, "_links"), "web"), "href") ?? str(b, "url"),
  };
}

function mapTimelineRecord(r: Json): TimelineRecord {
  const log = r.log;
  return {
    id: str(r, "id") ?? "",
    parentId: str(r, "parentId"),
    type: str(r, "type"),
    name: str(r, "name"),
    state: str(r, "state"),
    result: str(r, "result"),
    startTime: str(r, "startTime"),
    finishTime: str(r, "finishTime"),
    errorCount: num(r, "errorCount"),
    warningCount: num(r, "warningCount"),
    logId: isRecord(log) ? num(log, "id") : undefined,
    issues: records(r.issues).map((issue) => ({ type: str(issue, "type"), message: str(issue, "message") })),
  };
}

function mapWorkItem(w: Json): WorkItem {
  const fields = rec(w, "fields");
  return {
    id: num(w, "id") ?? 0,
    rev: num(w, "rev"),
    type: str(fields, "System.WorkItemType"),
    title: str(fields, "System.Title"),
    state: str(fields, "System.State"),
    assignedTo: identity(fields["System.AssignedTo"]),
    areaPath: str(fields, "System.AreaPath"),
    iterationPath: str(fields, "System.IterationPath"),
    createdDate: str(fields, "System.CreatedDate"),
    changedDate: str(fields, "System.ChangedDate"),
    description: str(fields, "System.Description"),
    url: str(w, "url"),
  };
}

function mapPipeline(p: Json): Pipeline {
  return { id: num(p, "id") ?? 0, name: str(p, "name") ?? "", folder: str(p, "folder"), revision: num(p, "revision") };
}

function mapRun(r: Json): PipelineRun {
  return {
    id: num(r, "id") ?? 0,
    name: str(r, "name"),
    state: str(r, "state"),
    result: str(r, "result"),
    createdDate: str(r, "createdDate"),
    finishedDate: str(r, "finishedDate"),
    url: str(rec(rec(r, "_links"), "web"), "href") ?? str(r, "url"),
  };
}

function mapReleaseDefinition(d: Json): ReleaseDefinition {
  return {
    id: num(d, "id") ?? 0,
    name: str(d, "name") ?? "",
    path: str(d, "path"),
    releaseNameFormat: str(d, "releaseNameFormat"),
    createdBy: identity(d.createdBy),
    createdOn: str(d, "createdOn"),
    modifiedOn: str(d, "modifiedOn"),
    url: str(rec(rec(d, "_links"), "web"), "href") ?? str(d, "url"),
  };
}

function mapRelease(r: Json): Release {
  const definition = rec(r, "releaseDefinition");
  return {
    id: num(r, "id") ?? 0,
    name: str(r, "name"),
    status: str(r, "status"),
    reason: str(r, "reason"),
    releaseDefinition: { id: num(definition, "id"), name: str(definition, "name") },
    createdBy: identity(r.createdBy),
    createdOn: str(r, "createdOn"),
    modifiedOn: str(r, "modifiedOn"),
    url: str(rec(rec(r, "_links"), "web"), "href") ?? str(r, "url"),
  };
}

function asRecord(body: unknown): Json {
  return isRecord(body) ? body : {};
}

export class AzureDevOpsManager {
  private client: DevOpsRestClient;

  constructor(client: DevOpsRestClient) {
    this.client = client;
  }

  get organizationUrl(): string {
    return this.client.baseUrl;
  }

  private async getJson(path: string, query?: Record<string, string | number | undefined>): Promise<Json | null> {
    const body = await getOrNull(() => this.client.json(path, { query }), { maxAttempts: 1 });
    return body === null ? null : asRecord(body);
  }

  // ===========================================================================
  // Projects and repositories
  // ===========================================================================

  async listProjects(): Promise<DevOpsProject[]> {
    return listValue(await this.client.json("_apis/projects", { query: { $top: 500 } })).map(mapProject);
  }

  async getProject(project: string): Promise<DevOpsProject> {
    const body = await this.getJson(`_apis/projects/${seg(project)}`);
    if (!body) throw new NotFoundError("Project", project);
    return mapProject(body);
  }

  async listRepositories(project: string): Promise<DevOpsRepository[]> {
    return listValue(await this.client.json(`${seg(project)}/_apis/git/repositories`)).map(mapRepository);
  }

  async getRepository(project: string, repository: string): Promise<DevOpsRepository> {
    const body = await this.getJson(`${seg(project)}/_apis/git/repositories/${seg(repository)}`);
    if (!body) throw new NotFoundError("Repository", repository);
    return mapRepository(body);
  }

  async getFile(project: string, repository: string, path: string, branch?: string): Promise<RepositoryFile> {
    const body = await this.getJson(`${seg(project)}/_apis/git/repositories/${seg(repository)}/items`, {
      path,
      includeContent: "true",
      "versionDescriptor.version": branch,
      "versionDescriptor.versionType": branch ? "branch" : undefined,
      $format: "json",
    });
    if (!body) throw new NotFoundError("File", path, `File '${path}' not found in ${repository}${branch ? ` (${branch})` : ""}`);
    return {
      path: str(body, "path") ?? path,
      branch,
      objectId: str(body, "objectId"),
      commitId: str(body, "commitId"),
      content: str(body, "content") ?? "",
    };
  }

  async findYamlFiles(project: string, repository: string): Promise<string[]> {
    const body = await this.getJson(`${seg(project)}/_apis/git/repositories/${seg(repository)}/items`, {
      scopePath: "/",
      recursionLevel: "Full",
    });
    if (!body) throw new NotFoundError("Repository", repository);
    return listValue(body)
      .filter((item) => item.isFolder !== true)
      .map((item) => str(item, "path") ?? "")
      .filter((path) => YAML_FILE.test(path))
      .sort();
  }

  /**
   * Commit new content for one file. The file is added when it does not
   * exist on the branch yet.
   */
  async updateFile(
    project: string,
    repository: string,
    path: string,
    content: string,
    options: { commitMessage: string; branch?: string },
  ): Promise<FileUpdate> {
    const repo = await this.getRepository(project, repository);
    const ref = branchRef(options.branch ?? repo.defaultBranch ?? "main");
    const refs = await this.client.json(`${seg(project)}/_apis/git/repositories/${seg(repo.id)}/refs`, {
      query: { filter: ref.replace(/^refs\//, "") },
    });
    const oldObjectId = listValue(refs).find((r) => str(r, "name") === ref)?.objectId;
    if (typeof oldObjectId !== "string") {
      throw new NotFoundError("Branch", ref, `Branch '${ref}' not found in ${repository}`);
    }

    const existing = await this.getJson(`${seg(project)}/_apis/git/repositories/${seg(repo.id)}/items`, {
      path,
      "versionDescriptor.version": ref.replace(/^refs\/heads\//, ""),
      "versionDescriptor.versionType": "branch",
    });
    const changeType = existing ? "edit" : "add";

    const push = asRecord(
      await this.client.json(`${seg(project)}/_apis/git/repositories/${seg(repo.id)}/pushes`, {
        method: "POST",
        body: {
          refUpdates: [{ name: ref, oldObjectId }],
          commits: [
            {
              comment: options.commitMessage,
              changes: [{ changeType, item: { path }, newContent: { content, contentType: "rawtext" } }],
            },
          ],
        },
      }),
    );
    return {
      path,
      branch: ref,
      commitId: str(records(push.commits)[0] ?? {}, "commitId"),
      pushId: num(push, "pushId"),
      changeType,
    };
  }

  // ===========================================================================
  // Builds
  // ===========================================================================

  async listBuildDefinitions(project: string): Promise<BuildDefinition[]> {
    return listValue(await this.client.json(`${seg(project)}/_apis/build/definitions`)).map((d) => ({
      id: num(d, "id") ?? 0,
      name: str(d, "name") ?? "",
      path: str(d, "path"),
      revision: num(d, "revision"),
      queueStatus: str(d, "queueStatus"),
    }));
  }

  async listBuilds(project: string, options: { definitionId?: number; top?: number } = {}): Promise<Build[]> {
    const body = await this.client.json(`${seg(project)}/_apis/build/builds`, {
      query: { definitions: options.definitionId, $top: options.top ?? 20, queryOrder: "queueTimeDescending" },
    });
    return listValue(body).map(mapBuild);
  }

  async getBuild(project: string, buildId: number): Promise<Build> {
    const body = await this.getJson(`${seg(project)}/_apis/build/builds/${buildId}`);
    if (!body) throw new NotFoundError("Build", String(buildId));
    return mapBuild(body);
  }

  async queueBuild(project: string, definitionId: number, branch?: string): Promise<Build> {
    const body = await this.client.json(`${seg(project)}/_apis/build/builds`, {
      method: "POST",
      body: { definition: { id: definitionId }, sourceBranch: branch ? branchRef(branch) : undefined },
    });
    return mapBuild(asRecord(body));
  }

  async getBuildTimeline(project: string, buildId: number): Promise<TimelineRecord[]> {
    const body = await this.getJson(`${seg(project)}/_apis/build/builds/${buildId}/timeline`);
    if (!body) throw new NotFoundError("Build", String(buildId));
    return records(body.records)
      .map(mapTimelineRecord)
      .sort((a, b) => (a.startTime ?? "").localeCompare(b.startTime ?? ""));
  }

  async listBuildLogs(project: string, buildId: number): Promise<BuildLog[]> {
    const body = await this.getJson(`${seg(project)}/_apis/build/builds/${buildId}/logs`);
    if (!body) throw new NotFoundError("Build", String(buildId));
    return listValue(body).map((l) => ({
      id: num(l, "id") ?? 0,
      lineCount: num(l, "lineCount"),
      createdOn: str(l, "createdOn"),
      lastChangedOn: str(l, "lastChangedOn"),
    }));
  }

  async getBuildLog(project: string, buildId: number, logId: number, range: { startLine?: number; endLine?: number } = {}) {
    return this.client.text(`${seg(project)}/_apis/build/builds/${buildId}/logs/${logId}`, {
      query: { startLine: range.startLine, endLine: range.endLine },
    });
  }

  async searchBuildLogs(
    project: string,
    buildId: number,
    pattern: string,
    options: LogSearchOptions = {},
  ): Promise<LogSearchResult> {
    const logs = await this.listBuildLogs(project, buildId);
    const contents: Array<{ logId: number; content: string }> = [];
    for (const log of logs) {
      contents.push({ logId: log.id, content: await this.getBuildLog(project, buildId, log.id) });
    }
    const { matches, truncated } = searchLogLines(contents, pattern, options);
    return { buildId, pattern, logsSearched: logs.length, matches, truncated };
  }

  /** Repository, branch and YAML path behind a YAML build definition. */
  private async yamlSource(project: string, definitionId: number) {
    const body = await this.getJson(`${seg(project)}/_apis/build/definitions/${definitionId}`);
    if (!body) throw new NotFoundError("Build definition", String(definitionId));
    const path = str(rec(body, "process"), "yamlFilename");
    const repository = rec(body, "repository");
    const repositoryId = str(repository, "id") ?? str(repository, "name");
    if (!path || !repositoryId) {
      throw new ToolInputError(`Build definition ${definitionId} is not a YAML pipeline`, { field: "definitionId" });
    }
    return {
      repositoryId,
      repositoryName: str(repository, "name") ?? repositoryId,
      branch: str(repository, "defaultBranch")?.replace(/^refs\/heads\//, ""),
      path,
    };
  }

  async getPipelineYaml(project: string, definitionId: number): Promise<PipelineYaml> {
    const source = await this.yamlSource(project, definitionId);
    const file = await this.getFile(project, source.repositoryId, source.path, source.branch);
    return { definitionId, repository: source.repositoryName, branch: source.branch, path: source.path, content: file.content };
  }

  async updatePipelineYaml(project: string, definitionId: number, content: string, commitMessage: string): Promise<FileUpdate> {
    const source = await this.yamlSource(project, definitionId);
    return this.updateFile(project, source.repositoryId, source.path, content, { commitMessage, branch: source.branch });
  }

  // ===========================================================================
  // Releases
  // ===========================================================================

  async listReleaseDefinitions(project: string): Promise<ReleaseDefinition[]> {
    const body = await this.client.json(`${seg(project)}/_apis/release/definitions`, { area: "release" });
    return listValue(body).map(mapReleaseDefinition);
  }

  async getReleaseDefinition(project: string, definitionId: number): Promise<ReleaseDefinitionDetails> {
    const body = await getOrNull(
      () => this.client.json(`${seg(project)}/_apis/release/definitions/${definitionId}`, { area: "release" }),
      { maxAttempts: 1 },
    );
    if (!isRecord(body)) throw new NotFoundError("Release definition", String(definitionId));
    return {
      ...mapReleaseDefinition(body),
      environments: records(body.environments).map((e) => ({ id: num(e, "id"), name: str(e, "name"), rank: num(e, "rank") })),
      artifacts: records(body.artifacts).map((a) => ({
        alias: str(a, "alias"),
        type: str(a, "type"),
        isPrimary: typeof a.isPrimary === "boolean" ? a.isPrimary : undefined,
      })),
    };
  }

  async listReleases(project: string, options: { definitionId?: number; top?: number } = {}): Promise<Release[]> {
    const body = await this.client.json(`${seg(project)}/_apis/release/releases`, {
      area: "release",
      query: { definitionId: options.definitionId, $top: options.top ?? 20, queryOrder: "descending" },
    });
    return listValue(body).map(mapRelease);
  }

  // ===========================================================================
  // Work items
  // ===========================================================================

  async getWorkItem(id: number): Promise<WorkItem> {
    const body = await this.getJson(`_apis/wit/workitems/${id}`, { $expand: "fields" });
    if (!body) throw new NotFoundError("Work item", String(id));
    return mapWorkItem(body);
  }

  async queryWorkItems(project: string, wiql: string, top = 50): Promise<{ total: number; workItems: WorkItem[] }> {
    if (!/^\s*select\b/i.test(wiql)) {
      throw new ToolInputError("WIQL queries start with SELECT", { field: "wiql" });
    }
    const result = asRecord(
      await this.client.json(`${seg(project)}/_apis/wit/wiql`, { method: "POST", query: { $top: top }, body: { query: wiql } }),
    );
    const ids = records(result.workItems)
      .map((w) => num(w, "id"))
      .filter((id): id is number => id !== undefined)
      .slice(0, top);

    const workItems: WorkItem[] = [];
    for (let i = 0; i < ids.length; i += WORK_ITEM_BATCH) {
      const batch = ids.slice(i, i + WORK_ITEM_BATCH);
      const body = await this.client.json("_apis/wit/workitems", { query: { ids: batch.join(",") } });
      workItems.push(...listValue(body).map(mapWorkItem));
    }
    return { total: ids.length, workItems };
  }

  async createWorkItem(
    project: string,
    type: string,
    fields: { title: string; description?: string; assignedTo?: string },
  ): Promise<WorkItem> {
    const patch = [
      { op: "add", path: "/fields/System.Title", value: fields.title },
      ...(fields.description ? [{ op: "add", path: "/fields/System.Description", value: fields.description }] : []),
      ...(fields.assignedTo ? [{ op: "add", path: "/fields/System.AssignedTo", value: fields.assignedTo }] : []),
    ];
    const body = await this.client.json(`${seg(project)}/_apis/wit/workitems/$${seg(type)}`, {
      method: "POST",
      body: patch,
      contentType: "application/json-patch+json",
    });
    return mapWorkItem(asRecord(body));
  }

  // ===========================================================================
  // Pipelines
  // ===========================================================================

  async listPipelines(project: string): Promise<Pipeline[]> {
    return listValue(await this.client.json(`${seg(project)}/_apis/pipelines`)).map(mapPipeline);
  }

  async runPipeline(project: string, pipelineId: number, branch?: string): Promise<PipelineRun> {
    const body = await this.client.json(`${seg(project)}/_apis/pipelines/${pipelineId}/runs`, {
      method: "POST",
      body: branch ? { resources: { repositories: { self: { refName: branchRef(branch) } } } } : {},
    });
    return mapRun(asRecord(body));
  }
}
