/**
 * Azure DevOps types.
 */

export type DevOpsProject = {
  id: string;
  name: string;
  description?: string;
  state?: string;
  visibility?: string;
  lastUpdateTime?: string;
  url?: string;
};

export type DevOpsRepository = {
  id: string;
  name: string;
  defaultBranch?: string;
  size?: number;
  remoteUrl?: string;
  webUrl?: string;
};

export type RepositoryFile = {
  path: string;
  branch?: string;
  objectId?: string;
  commitId?: string;
  content: string;
};

export type BuildDefinition = {
  id: number;
  name: string;
  path?: string;
  revision?: number;
  queueStatus?: string;
};

export type Build = {
  id: number;
  buildNumber?: string;
  status?: string;
  result?: string;
  definition?: { id?: number; name?: string };
  sourceBranch?: string;
  sourceVersion?: string;
  requestedFor?: string;
  queueTime?: string;
  startTime?: string;
  finishTime?: string;
  url?: string;
};

export type TimelineRecord = {
  id: string;
  parentId?: string;
  type?: string;
  name?: string;
  state?: string;
  result?: string;
  startTime?: string;
  finishTime?: string;
  errorCount?: number;
  warningCount?: number;
  logId?: number;
  issues: Array<{ type?: string; message?: string }>;
};

export type BuildLog = {
  id: number;
  lineCount?: number;
  createdOn?: string;
  lastChangedOn?: string;
};

export type LogMatch = {
  logId: number;
  lineNumber: number;
  line: string;
  before: string[];
  after: string[];
};

export type LogSearchResult = {
  buildId: number;
  pattern: string;
  logsSearched: number;
  matches: LogMatch[];
  truncated: boolean;
};

export type WorkItem = {
  id: number;
  rev?: number;
  type?: string;
  title?: string;
  state?: string;
  assignedTo?: string;
  areaPath?: string;
  iterationPath?: string;
  createdDate?: string;
  changedDate?: string;
  description?: string;
  url?: string;
};

export type Pipeline = {
  id: number;
  name: string;
  folder?: string;
  revision?: number;
};

export type PipelineRun = {
  id: number;
  name?: string;
  state?: string;
  result?: string;
  createdDate?: string;
  finishedDate?: string;
  url?: string;
};

export type ReleaseDefinition = {
  id: number;
  name: string;
  path?: string;
  releaseNameFormat?: string;
  createdBy?: string;
  createdOn?: string;
  modifiedOn?: string;
  url?: string;
};

export type ReleaseDefinitionDetails = ReleaseDefinition & {
  environments: Array<{ id?: number; name?: string; rank?: number }>;
  artifacts: Array<{ alias?: string; type?: string; isPrimary?: boolean }>;
};

export type Release = {
  id: number;
  name?: string;
  status?: string;
  reason?: string;
  releaseDefinition: { id?: number; name?: string };
  createdBy?: string;
  createdOn?: string;
  modifiedOn?: string;
  url?: string;
};

export type PipelineYaml = {
  definitionId: number;
  repository: string;
  branch?: string;
  path: string;
  content: string;
};

export type FileUpdate = {
  path: string;
  branch: string;
  commitId?: string;
  pushId?: number;
  changeType: "add" | "edit";
};
