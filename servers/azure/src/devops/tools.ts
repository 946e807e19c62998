/**
 * Azure DevOps tools: projects, repositories, builds, releases, work items
 * and pipelines.
 */

import { Type } from "@sinclair/typebox";
import { defineTool, type ToolDefinition } from "../../../../src/index.js";
import { optional } from "../params.js";
import type { AzureServerState } from "../state.js";

const SERVICE = "devops";

const Project = Type.String({ minLength: 1, description: "Project name or id" });
const BuildId = Type.Integer({ minimum: 1 });
const Branch = Type.Optional(Type.String({ description: "Branch name or full ref; the default branch when omitted" }));

export function createDevOpsTools(state: AzureServerState): ToolDefinition[] {
  return [
    defineTool({
      name: "azure_devops_list_projects",
      label: "List DevOps Projects",
      description: "Projects of the configured Azure DevOps organization.",
      service: SERVICE,
      parameters: Type.Object({}),
      async run() {
        const devops = state.devOps();
        const projects = await devops.listProjects();
        return { organization: devops.organizationUrl, projects, count: projects.length };
      },
    }),

    defineTool({
      name: "azure_devops_get_project",
      label: "Get DevOps Project",
      description: "Details of a DevOps project.",
      service: SERVICE,
      parameters: Type.Object({ project: Project }),
      async run(params) {
        return { project: await state.devOps().getProject(params.project) };
      },
    }),

    defineTool({
      name: "azure_devops_list_repositories",
      label: "List Repositories",
      description: "Git repositories of a project.",
      service: SERVICE,
      parameters: Type.Object({ project: Project }),
      async run(params) {
        const repositories = await state.devOps().listRepositories(params.project);
        return { project: params.project, repositories, count: repositories.length };
      },
    }),

    defineTool({
      name: "azure_devops_get_repository",
      label: "Get Repository",
      description: "Details of a Git repository.",
      service: SERVICE,
      parameters: Type.Object({ project: Project, repository: Type.String({ minLength: 1 }) }),
      async run(params) {
        return { repository: await state.devOps().getRepository(params.project, params.repository) };
      },
    }),

    defineTool({
      name: "azure_devops_get_file",
      label: "Get Repository File",
      description: "Text content of a file in a repository.",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        repository: Type.String({ minLength: 1 }),
        path: Type.String({ minLength: 1, description: "Path from the repository root, e.g. /src/app.ts" }),
        branch: Branch,
      }),
      async run(params) {
        return {
          file: await state.devOps().getFile(params.project, params.repository, params.path, optional(params.branch)),
        };
      },
    }),

    defineTool({
      name: "azure_devops_update_file",
      label: "Update Repository File",
      description: "Commit new content for a file, adding it when the branch does not have it.",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        repository: Type.String({ minLength: 1 }),
        path: Type.String({ minLength: 1, description: "Path from the repository root, e.g. /azure-pipelines.yml" }),
        content: Type.String(),
        commitMessage: Type.String({ minLength: 1 }),
        branch: Branch,
      }),
      async run(params) {
        const update = await state.devOps().updateFile(params.project, params.repository, params.path, params.content, {
          commitMessage: params.commitMessage,
          branch: optional(params.branch),
        });
        return { update, message: `${update.path} committed to ${update.branch}` };
      },
    }),

    defineTool({
      name: "azure_devops_find_yaml_pipelines",
      label: "Find YAML Files",
      description: "Paths of every .yml and .yaml file in a repository.",
      service: SERVICE,
      parameters: Type.Object({ project: Project, repository: Type.String({ minLength: 1 }) }),
      async run(params) {
        const files = await state.devOps().findYamlFiles(params.project, params.repository);
        return { repository: params.repository, files, count: files.length };
      },
    }),

    defineTool({
      name: "azure_devops_get_pipeline_yaml",
      label: "Get Pipeline YAML",
      description: "The YAML file behind a build definition, read from its default branch.",
      service: SERVICE,
      parameters: Type.Object({ project: Project, definitionId: Type.Integer({ minimum: 1 }) }),
      async run(params) {
        return { pipeline: await state.devOps().getPipelineYaml(params.project, params.definitionId) };
      },
    }),

    defineTool({
      name: "azure_devops_update_pipeline_yaml",
      label: "Update Pipeline YAML",
      description: "Commit new YAML for a build definition to its default branch.",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        definitionId: Type.Integer({ minimum: 1 }),
        content: Type.String({ minLength: 1 }),
        commitMessage: Type.String({ minLength: 1 }),
      }),
      async run(params) {
        const update = await state
          .devOps()
          .updatePipelineYaml(params.project, params.definitionId, params.content, params.commitMessage);
        return { definitionId: params.definitionId, update };
      },
    }),

    defineTool({
      name: "azure_devops_list_build_definitions",
      label: "List Build Definitions",
      description: "Build definitions of a project.",
      service: SERVICE,
      parameters: Type.Object({ project: Project }),
      async run(params) {
        const definitions = await state.devOps().listBuildDefinitions(params.project);
        return { project: params.project, definitions, count: definitions.length };
      },
    }),

    defineTool({
      name: "azure_devops_list_builds",
      label: "List Builds",
      description: "Most recent builds, optionally of one definition.",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        definitionId: Type.Optional(Type.Integer({ minimum: 1 })),
        top: Type.Integer({ minimum: 1, maximum: 200, default: 20 }),
      }),
      async run(params) {
        const builds = await state.devOps().listBuilds(params.project, { definitionId: params.definitionId, top: params.top });
        return { project: params.project, builds, count: builds.length };
      },
    }),

    defineTool({
      name: "azure_devops_get_build",
      label: "Get Build",
      description: "Status and result of a build.",
      service: SERVICE,
      parameters: Type.Object({ project: Project, buildId: BuildId }),
      async run(params) {
        return { build: await state.devOps().getBuild(params.project, params.buildId) };
      },
    }),

    defineTool({
      name: "azure_devops_queue_build",
      label: "Queue Build",
      description: "Queue a build of a definition.",
      service: SERVICE,
      parameters: Type.Object({ project: Project, definitionId: Type.Integer({ minimum: 1 }), branch: Branch }),
      async run(params) {
        const build = await state.devOps().queueBuild(params.project, params.definitionId, optional(params.branch));
        return { build, message: `Build ${build.buildNumber ?? build.id} queued` };
      },
    }),

    defineTool({
      name: "azure_devops_get_build_timeline",
      label: "Get Build Timeline",
      description: "Stages, jobs and tasks of a build with their results and issues.",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        buildId: BuildId,
        failedOnly: Type.Boolean({ default: false }),
      }),
      async run(params) {
        const records = await state.devOps().getBuildTimeline(params.project, params.buildId);
        const selected = params.failedOnly ? records.filter((r) => r.result === "failed") : records;
        return { buildId: params.buildId, records: selected, count: selected.length };
      },
    }),

    defineTool({
      name: "azure_devops_get_build_logs",
      label: "Get Build Logs",
      description: "List the logs of a build, or return one log's text when logId is given.",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        buildId: BuildId,
        logId: Type.Optional(Type.Integer({ minimum: 1 })),
        startLine: Type.Optional(Type.Integer({ minimum: 1 })),
        endLine: Type.Optional(Type.Integer({ minimum: 1 })),
      }),
      async run(params) {
        const devops = state.devOps();
        if (params.logId === undefined) {
          const logs = await devops.listBuildLogs(params.project, params.buildId);
          return { buildId: params.buildId, logs, count: logs.length };
        }
        const content = await devops.getBuildLog(params.project, params.buildId, params.logId, {
          startLine: params.startLine,
          endLine: params.endLine,
        });
        return { buildId: params.buildId, logId: params.logId, content };
      },
    }),

    defineTool({
      name: "azure_devops_search_build_logs",
      label: "Search Build Logs",
      description: "Search every log of a build with a regular expression; matches include context lines.",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        buildId: BuildId,
        regex: Type.String({ minLength: 1 }),
        contextLines: Type.Integer({ minimum: 0, maximum: 20, default: 3 }),
        caseSensitive: Type.Boolean({ default: false }),
        maxMatches: Type.Integer({ minimum: 1, maximum: 500, default: 50 }),
      }),
      async run(params) {
        const result = await state.devOps().searchBuildLogs(params.project, params.buildId, params.regex, {
          contextLines: params.contextLines,
          caseSensitive: params.caseSensitive,
          maxMatches: params.maxMatches,
        });
        return { ...result, matchCount: result.matches.length };
      },
    }),

    defineTool({
      name: "azure_devops_list_release_definitions",
      label: "List Release Definitions",
      description: "Classic release definitions of a project.",
      service: SERVICE,
      parameters: Type.Object({ project: Project }),
      async run(params) {
        const definitions = await state.devOps().listReleaseDefinitions(params.project);
        return { project: params.project, definitions, count: definitions.length };
      },
    }),

    defineTool({
      name: "azure_devops_get_release_definition",
      label: "Get Release Definition",
      description: "A release definition with its stages and artifacts.",
      service: SERVICE,
      parameters: Type.Object({ project: Project, definitionId: Type.Integer({ minimum: 1 }) }),
      async run(params) {
        return { definition: await state.devOps().getReleaseDefinition(params.project, params.definitionId) };
      },
    }),

    defineTool({
      name: "azure_devops_list_releases",
      label: "List Releases",
      description: "Most recent releases, optionally of one definition.",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        definitionId: Type.Optional(Type.Integer({ minimum: 1 })),
        top: Type.Integer({ minimum: 1, maximum: 200, default: 20 }),
      }),
      async run(params) {
        const releases = await state.devOps().listReleases(params.project, { definitionId: params.definitionId, top: params.top });
        return { project: params.project, releases, count: releases.length };
      },
    }),

    defineTool({
      name: "azure_devops_get_work_item",
      label: "Get Work Item",
      description: "A work item with its main fields.",
      service: SERVICE,
      parameters: Type.Object({ id: Type.Integer({ minimum: 1 }) }),
      async run(params) {
        return { workItem: await state.devOps().getWorkItem(params.id) };
      },
    }),

    defineTool({
      name: "azure_devops_query_work_items",
      label: "Query Work Items",
      description: "Run a WIQL query and return the matching work items.",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        wiql: Type.String({ minLength: 1, description: "e.g. SELECT [System.Id] FROM WorkItems WHERE [System.State] = 'Active'" }),
        top: Type.Integer({ minimum: 1, maximum: 1000, default: 50 }),
      }),
      async run(params) {
        const result = await state.devOps().queryWorkItems(params.project, params.wiql, params.top);
        return { workItems: result.workItems, count: result.total };
      },
    }),

    defineTool({
      name: "azure_devops_create_work_item",
      label: "Create Work Item",
      description: "Create a work item (Bug, Task, User Story, ...).",
      service: SERVICE,
      parameters: Type.Object({
        project: Project,
        type: Type.String({ minLength: 1 }),
        title: Type.String({ minLength: 1 }),
        description: Type.Optional(Type.String()),
        assignedTo: Type.Optional(Type.String()),
      }),
      async run(params) {
        const workItem = await state.devOps().createWorkItem(params.project, params.type, {
          title: params.title,
          description: optional(params.description),
          assignedTo: optional(params.assignedTo),
        });
        return { workItem, message: `${params.type} ${workItem.id} created` };
      },
    }),

    defineTool({
      name: "azure_devops_list_pipelines",
      label: "List Pipelines",
      description: "YAML pipelines of a project.",
      service: SERVICE,
      parameters: Type.Object({ project: Project }),
      async run(params) {
        const pipelines = await state.devOps().listPipelines(params.project);
        return { project: params.project, pipelines, count: pipelines.length };
      },
    }),

    defineTool({
      name: "azure_devops_run_pipeline",
      label: "Run Pipeline",
      description: "Start a pipeline run.",
      service: SERVICE,
      parameters: Type.Object({ project: Project, pipelineId: Type.Integer({ minimum: 1 }), branch: Branch }),
      async run(params) {
        const run = await state.devOps().runPipeline(params.project, params.pipelineId, optional(params.branch));
        return { run, message: `Pipeline run ${run.id} started` };
      },
    }),
  ];
}
