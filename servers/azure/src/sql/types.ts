/**
 * Azure SQL types.
 */

export type SqlServer = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  fullyQualifiedDomainName?: string;
  administratorLogin?: string;
  version?: string;
  state?: string;
  publicNetworkAccess?: string;
  tags: Record<string, string>;
};

export type SqlDatabase = {
  id: string;
  name: string;
  server: string;
  resourceGroup: string;
  location: string;
  status?: string;
  sku?: string;
  tier?: string;
  capacity?: number;
  maxSizeBytes?: number;
  collation?: string;
  elasticPoolId?: string;
  createdAt?: string;
};

export type SqlElasticPool = {
  id: string;
  name: string;
  location: string;
  state?: string;
  sku?: string;
  tier?: string;
  capacity?: number;
  maxSizeBytes?: number;
};

export type SqlFirewallRule = {
  id: string;
  name: string;
  startIpAddress?: string;
  endIpAddress?: string;
};

export type SqlQueryResult = {
  columns: string[];
  rows: Array<Record<string, unknown>>;
  rowCount: number;
  truncated: boolean;
  rowsAffected: number[];
  durationMs: number;
};

export type FlexibleEngine = "postgresql" | "mysql";

export type FlexibleServer = {
  id: string;
  name: string;
  engine: FlexibleEngine;
  resourceGroup: string;
  location: string;
  state?: string;
  version?: string;
  skuName?: string;
  skuTier?: string;
  administratorLogin?: string;
  fullyQualifiedDomainName?: string;
  storageGB?: number;
  backupRetentionDays?: number;
  highAvailability?: string;
  tags: Record<string, string>;
};

export type FlexibleDatabase = {
  id: string;
  name: string;
  charset?: string;
  collation?: string;
};
