/**
 * ECR types.
 */

export type EcrRepositorySummary = {
  name: string;
  arn?: string;
  uri?: string;
  registryId?: string;
  createdAt?: string;
  imageTagMutability?: string;
  scanOnPush: boolean;
  encryptionType?: string;
};

export type EcrImageId = {
  imageTag?: string;
  imageDigest?: string;
};

export type EcrImageDetail = {
  digest?: string;
  tags: string[];
  sizeBytes?: number;
  pushedAt?: string;
  lastPulledAt?: string;
  scanStatus?: string;
  findingSeverityCounts?: Partial<Record<string, number>>;
};

export type EcrAuthorization = {
  username: string;
  password: string;
  proxyEndpoint?: string;
  expiresAt?: string;
  loginCommand: string;
};

export type EcrScanFinding = {
  name?: string;
  severity?: string;
  description?: string;
  uri?: string;
};

export type EcrScanFindings = {
  repository: string;
  imageId: EcrImageId;
  status?: string;
  completedAt?: string;
  severityCounts: Partial<Record<string, number>>;
  findings: EcrScanFinding[];
};

export type TagMutability = "MUTABLE" | "IMMUTABLE";
export type TagStatus = "TAGGED" | "UNTAGGED" | "ANY";
