/**
 * Event Hubs types.
 */

export type EventHubsNamespaceInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location?: string;
  sku?: string;
  tier?: string;
  capacity?: number;
  endpoint?: string;
  status?: string;
  kafkaEnabled?: boolean;
  autoInflate?: boolean;
  maximumThroughputUnits?: number;
  createdAt?: string;
};

export type EventHubInfo = {
  id: string;
  name: string;
  namespaceName: string;
  partitionCount?: number;
  partitionIds: string[];
  retentionDays?: number;
  status?: string;
  createdAt?: string;
  updatedAt?: string;
};

export type ConsumerGroupInfo = {
  id: string;
  name: string;
  eventHubName: string;
  userMetadata?: string;
  createdAt?: string;
  updatedAt?: string;
};

export type SendEventsResult = {
  sent: number;
  batches: number;
};

export type PartitionInfo = {
  partitionId: string;
  beginningSequenceNumber: number;
  lastEnqueuedSequenceNumber: number;
  lastEnqueuedOffset: string;
  lastEnqueuedTime?: string;
  isEmpty: boolean;
};
