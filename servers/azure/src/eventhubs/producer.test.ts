import { beforeEach, describe, expect, it, vi } from "vitest";
import { fakeCredentials } from "../testing.js";

const { mockProducer, EventHubProducerClient } = vi.hoisted(() => {
  const mockProducer = {
    createBatch: vi.fn(),
    sendBatch: vi.fn(),
    getEventHubProperties: vi.fn(),
    getPartitionProperties: vi.fn(),
    close: vi.fn(),
  };
  return { mockProducer, EventHubProducerClient: vi.fn().mockImplementation(() => mockProducer) };
});

vi.mock("@azure/event-hubs", () => ({ EventHubProducerClient }));

import { AzureEventHubsProducer } from "./producer.js";

/** A batch that holds at most `capacity` events. */
function fakeBatch(capacity: number) {
  const events: unknown[] = [];
  return {
    events,
    get count() {
      return events.length;
    },
    tryAdd(event: unknown) {
      if (events.length >= capacity) return false;
      events.push(event);
      return true;
    },
  };
}

describe("AzureEventHubsProducer", () => {
  let producer: AzureEventHubsProducer;

  beforeEach(() => {
    vi.clearAllMocks();
    producer = new AzureEventHubsProducer(fakeCredentials);
  });

  it("splits events across batches when one fills up", async () => {
    const batches = [fakeBatch(2), fakeBatch(2)];
    mockProducer.createBatch.mockImplementation(async () => batches.shift());

    const result = await producer.sendEvents("eh-prod", "telemetry", [{ n: 1 }, { n: 2 }, { n: 3 }], { partitionKey: "device-7" });

    expect(result).toEqual({ sent: 3, batches: 2 });
    expect(mockProducer.createBatch).toHaveBeenCalledWith({ partitionKey: "device-7", partitionId: undefined });
    expect(mockProducer.sendBatch).toHaveBeenCalledTimes(2);
    expect(EventHubProducerClient).toHaveBeenCalledWith("eh-prod.servicebus.windows.net", "telemetry", expect.anything());
    expect(mockProducer.close).toHaveBeenCalled();
  });

  it("rejects an event too large for an empty batch", async () => {
    mockProducer.createBatch.mockResolvedValue(fakeBatch(0));
    await expect(producer.sendEvents("eh-prod", "telemetry", ["huge"])).rejects.toThrow("Event 0 is larger than the maximum batch size");
    expect(mockProducer.sendBatch).not.toHaveBeenCalled();
    expect(mockProducer.close).toHaveBeenCalled();
  });

  it("refuses both a partition key and a partition id", async () => {
    await expect(producer.sendEvents("eh-prod", "telemetry", ["a"], { partitionKey: "k", partitionId: "0" })).rejects.toThrow(
      "Pass either partitionKey or partitionId, not both",
    );
    expect(EventHubProducerClient).not.toHaveBeenCalled();
  });

  it("maps partition properties", async () => {
    mockProducer.getPartitionProperties.mockResolvedValue({
      eventHubName: "telemetry",
      partitionId: "1",
      beginningSequenceNumber: 0,
      lastEnqueuedSequenceNumber: 41,
      lastEnqueuedOffset: "8192",
      lastEnqueuedOnUtc: new Date("2024-05-05T12:00:00Z"),
      isEmpty: false,
    });

    expect(await producer.getPartitionProperties("eh-prod", "telemetry", "1")).toEqual({
      partitionId: "1",
      beginningSequenceNumber: 0,
      lastEnqueuedSequenceNumber: 41,
      lastEnqueuedOffset: "8192",
      lastEnqueuedTime: "2024-05-05T12:00:00.000Z",
      isEmpty: false,
    });
  });
});
