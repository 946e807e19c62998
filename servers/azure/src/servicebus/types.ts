/**
 * Service Bus types.
 */

export type ServiceBusNamespaceInfo = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  sku?: string;
  tier?: string;
  endpoint?: string;
  status?: string;
  provisioningState?: string;
  createdAt?: string;
};

export type MessageCounts = {
  messageCount?: number;
  activeMessageCount?: number;
  deadLetterMessageCount?: number;
  scheduledMessageCount?: number;
};

export type ServiceBusQueueInfo = MessageCounts & {
  id: string;
  name: string;
  namespaceName: string;
  status?: string;
  sizeInBytes?: number;
  maxSizeInMegabytes?: number;
  lockDuration?: string;
  maxDeliveryCount?: number;
  requiresSession?: boolean;
  requiresDuplicateDetection?: boolean;
  deadLetteringOnMessageExpiration?: boolean;
};

export type ServiceBusTopicInfo = {
  id: string;
  name: string;
  namespaceName: string;
  status?: string;
  subscriptionCount?: number;
  sizeInBytes?: number;
  maxSizeInMegabytes?: number;
  enablePartitioning?: boolean;
};

export type ServiceBusSubscriptionInfo = MessageCounts & {
  id: string;
  name: string;
  topicName: string;
  status?: string;
  lockDuration?: string;
  maxDeliveryCount?: number;
  requiresSession?: boolean;
};

export type QueueOptions = {
  maxSizeInMegabytes?: number;
  lockDuration?: string;
  maxDeliveryCount?: number;
};

/** A queue, or a topic subscription to read from. */
export type ReceiveSource = { queue: string } | { topic: string; subscription: string };

export type OutgoingMessage = {
  body: string;
  subject?: string;
  contentType?: string;
  correlationId?: string;
  messageId?: string;
  applicationProperties?: Record<string, string | number | boolean>;
};

export type ReceivedMessageInfo = {
  messageId?: string;
  sequenceNumber?: string;
  body: unknown;
  subject?: string;
  contentType?: string;
  correlationId?: string;
  applicationProperties?: Record<string, unknown>;
  enqueuedTime?: string;
  expiresAt?: string;
  deliveryCount?: number;
  deadLetterReason?: string;
};
