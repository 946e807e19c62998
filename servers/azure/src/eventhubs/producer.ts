/**
 * Event Hubs data plane: batched sends and runtime properties through
 * @azure/event-hubs.
 */

import type { EventData, EventHubProducerClient } from "@azure/event-hubs";
import { ToolInputError } from "../../../../src/index.js";
import { iso, type AzureCredentialProvider } from "../types.js";
import type { PartitionInfo, SendEventsResult } from "./types.js";

export function eventHubsHost(namespace: string): string {
  return namespace.includes(".") ? namespace : `${namespace}.servicebus.windows.net`;
}

export type SendOptions = {
  partitionKey?: string;
  partitionId?: string;
  properties?: Record<string, string | number | boolean>;
};

export class AzureEventHubsProducer {
  private credentials: AzureCredentialProvider;

  constructor(credentials: AzureCredentialProvider) {
    this.credentials = credentials;
  }

  private async withProducer<T>(namespace: string, eventHub: string, fn: (producer: EventHubProducerClient) => Promise<T>): Promise<T> {
    const { EventHubProducerClient } = await import("@azure/event-hubs");
    const { credential } = await this.credentials.getCredential();
    const producer = new EventHubProducerClient(eventHubsHost(namespace), eventHub, credential);
    try {
      return await fn(producer);
    } finally {
      await producer.close();
    }
  }

  /**
   * Packs events into as few batches as the size limit allows. An event that
   * does not fit an empty batch is rejected.
   */
  async sendEvents(namespace: string, eventHub: string, bodies: unknown[], options: SendOptions = {}): Promise<SendEventsResult> {
    if (bodies.length === 0) throw new ToolInputError("events must not be empty", { field: "events" });
    if (options.partitionKey && options.partitionId) {
      throw new ToolInputError("Pass either partitionKey or partitionId, not both", { field: "partitionKey" });
    }
    const batchOptions = { partitionKey: options.partitionKey, partitionId: options.partitionId };

    return this.withProducer(namespace, eventHub, async (producer) => {
      let batch = await producer.createBatch(batchOptions);
      let batches = 0;
      for (const [index, body] of bodies.entries()) {
        const event: EventData = { body, properties: options.properties };
        if (batch.tryAdd(event)) continue;
        if (batch.count === 0) {
          throw new ToolInputError(`Event ${index} is larger than the maximum batch size`, { field: "events" });
        }
        await producer.sendBatch(batch);
        batches += 1;
        batch = await producer.createBatch(batchOptions);
        if (!batch.tryAdd(event)) {
          throw new ToolInputError(`Event ${index} is larger than the maximum batch size`, { field: "events" });
        }
      }
      if (batch.count > 0) {
        await producer.sendBatch(batch);
        batches += 1;
      }
      return { sent: bodies.length, batches };
    });
  }

  async getEventHubProperties(namespace: string, eventHub: string): Promise<{ name: string; createdOn?: string; partitionIds: string[] }> {
    return this.withProducer(namespace, eventHub, async (producer) => {
      const props = await producer.getEventHubProperties();
      return { name: props.name, createdOn: iso(props.createdOn), partitionIds: props.partitionIds };
    });
  }

  async getPartitionProperties(namespace: string, eventHub: string, partitionId: string): Promise<PartitionInfo> {
    return this.withProducer(namespace, eventHub, async (producer) => {
      const p = await producer.getPartitionProperties(partitionId);
      return {
        partitionId: p.partitionId,
        beginningSequenceNumber: p.beginningSequenceNumber,
        lastEnqueuedSequenceNumber: p.lastEnqueuedSequenceNumber,
        lastEnqueuedOffset: p.lastEnqueuedOffset,
        lastEnqueuedTime: iso(p.lastEnqueuedOnUtc),
        isEmpty: p.isEmpty,
      };
    });
  }
}
