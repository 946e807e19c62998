/**
 * Service Bus messaging through @azure/service-bus.
 *
 * Each call opens a client for the namespace and closes it afterwards.
 */

import { randomUUID } from "node:crypto";
import type { ServiceBusClient, ServiceBusReceivedMessage, ServiceBusReceiver } from "@azure/service-bus";
import { ToolInputError } from "../../../../src/index.js";
import { iso, type AzureCredentialProvider } from "../types.js";
import type { OutgoingMessage, ReceivedMessageInfo, ReceiveSource } from "./types.js";

export const MAX_MESSAGES = 100;

export function namespaceHost(namespace: string): string {
  return namespace.includes(".") ? namespace : `${namespace}.servicebus.windows.net`;
}

function idText(id: string | number | Buffer | undefined): string | undefined {
  if (id === undefined) return undefined;
  return Buffer.isBuffer(id) ? id.toString("utf8") : String(id);
}

function decodeBody(body: unknown): unknown {
  if (Buffer.isBuffer(body)) return body.toString("utf8");
  if (body instanceof Uint8Array) return Buffer.from(body).toString("utf8");
  return body;
}

export function mapReceivedMessage(message: ServiceBusReceivedMessage): ReceivedMessageInfo {
  return {
    messageId: idText(message.messageId),
    sequenceNumber: message.sequenceNumber?.toString(),
    body: decodeBody(message.body),
    subject: message.subject,
    contentType: message.contentType,
    correlationId: idText(message.correlationId),
    applicationProperties: message.applicationProperties,
    enqueuedTime: iso(message.enqueuedTimeUtc),
    expiresAt: iso(message.expiresAtUtc),
    deliveryCount: message.deliveryCount,
    deadLetterReason: message.deadLetterReason,
  };
}

function checkCount(maxMessages: number): void {
  if (!Number.isInteger(maxMessages) || maxMessages < 1 || maxMessages > MAX_MESSAGES) {
    throw new ToolInputError(`maxMessages must be between 1 and ${MAX_MESSAGES}`, { field: "maxMessages" });
  }
}

export class AzureServiceBusMessaging {
  private credentials: AzureCredentialProvider;

  constructor(credentials: AzureCredentialProvider) {
    this.credentials = credentials;
  }

  private async withClient<T>(namespace: string, fn: (client: ServiceBusClient) => Promise<T>): Promise<T> {
    const { ServiceBusClient } = await import("@azure/service-bus");
    const { credential } = await this.credentials.getCredential();
    const client = new ServiceBusClient(namespaceHost(namespace), credential);
    try {
      return await fn(client);
    } finally {
      await client.close();
    }
  }

  private async withReceiver<T>(
    namespace: string,
    source: ReceiveSource,
    fn: (receiver: ServiceBusReceiver) => Promise<T>,
  ): Promise<T> {
    return this.withClient(namespace, async (client) => {
      const receiver =
        "queue" in source
          ? client.createReceiver(source.queue, { receiveMode: "peekLock" })
          : client.createReceiver(source.topic, source.subscription, { receiveMode: "peekLock" });
      try {
        return await fn(receiver);
      } finally {
        await receiver.close();
      }
    });
  }

  /** Sends to a queue or topic and returns the message id. */
  async sendMessage(namespace: string, entity: string, message: OutgoingMessage): Promise<string> {
    const messageId = message.messageId ?? randomUUID();
    await this.withClient(namespace, async (client) => {
      const sender = client.createSender(entity);
      try {
        await sender.sendMessages({
          body: message.body,
          messageId,
          subject: message.subject,
          contentType: message.contentType,
          correlationId: message.correlationId,
          applicationProperties: message.applicationProperties,
        });
      } finally {
        await sender.close();
      }
    });
    return messageId;
  }

  /** Reads without locking or removing anything. */
  async peekMessages(namespace: string, source: ReceiveSource, maxMessages = 10): Promise<ReceivedMessageInfo[]> {
    checkCount(maxMessages);
    return this.withReceiver(namespace, source, async (receiver) => {
      const messages = await receiver.peekMessages(maxMessages);
      return messages.map(mapReceivedMessage);
    });
  }

  /** Receives in peek-lock mode and completes each message, removing it. */
  async receiveMessages(
    namespace: string,
    source: ReceiveSource,
    maxMessages = 10,
    maxWaitSeconds = 5,
  ): Promise<ReceivedMessageInfo[]> {
    checkCount(maxMessages);
    return this.withReceiver(namespace, source, async (receiver) => {
      const messages = await receiver.receiveMessages(maxMessages, { maxWaitTimeInMs: maxWaitSeconds * 1000 });
      const received: ReceivedMessageInfo[] = [];
      for (const message of messages) {
        received.push(mapReceivedMessage(message));
        await receiver.completeMessage(message);
      }
      return received;
    });
  }
}

/** Resolve queue or topic+subscription arguments into a source. */
export function receiveSource(args: { queueName?: string; topicName?: string; subscriptionName?: string }): ReceiveSource {
  if (args.queueName) {
    if (args.topicName) throw new ToolInputError("Pass either queueName or topicName, not both", { field: "topicName" });
    return { queue: args.queueName };
  }
  if (args.topicName && args.subscriptionName) return { topic: args.topicName, subscription: args.subscriptionName };
  if (args.topicName) throw new ToolInputError("subscriptionName is required with topicName", { field: "subscriptionName" });
  throw new ToolInputError("queueName or topicName is required", { field: "queueName" });
}
