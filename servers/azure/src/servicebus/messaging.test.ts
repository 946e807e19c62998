import { beforeEach, describe, expect, it, vi } from "vitest";
import { ToolInputError } from "../../../../src/index.js";
import { fakeCredentials } from "../testing.js";

const { mockClient, mockSender, mockReceiver, ServiceBusClient } = vi.hoisted(() => {
  const mockSender = { sendMessages: vi.fn(), close: vi.fn() };
  const mockReceiver = { peekMessages: vi.fn(), receiveMessages: vi.fn(), completeMessage: vi.fn(), close: vi.fn() };
  const mockClient = { createSender: vi.fn(), createReceiver: vi.fn(), close: vi.fn() };
  return { mockClient, mockSender, mockReceiver, ServiceBusClient: vi.fn().mockImplementation(() => mockClient) };
});

vi.mock("@azure/service-bus", () => ({ ServiceBusClient }));

import { AzureServiceBusMessaging, namespaceHost, receiveSource } from "./messaging.js";

const enqueued = new Date("2024-04-02T08:30:00Z");

describe("receiveSource", () => {
  it("prefers a queue", () => {
    expect(receiveSource({ queueName: "orders" })).toEqual({ queue: "orders" });
  });

  it("needs a subscription for topics", () => {
    expect(receiveSource({ topicName: "events", subscriptionName: "audit" })).toEqual({ topic: "events", subscription: "audit" });
    expect(() => receiveSource({ topicName: "events" })).toThrow("subscriptionName is required with topicName");
  });

  it("rejects both queue and topic", () => {
    expect(() => receiveSource({ queueName: "orders", topicName: "events" })).toThrow(ToolInputError);
  });
});

describe("AzureServiceBusMessaging", () => {
  let messaging: AzureServiceBusMessaging;

  beforeEach(() => {
    vi.clearAllMocks();
    mockClient.createSender.mockReturnValue(mockSender);
    mockClient.createReceiver.mockReturnValue(mockReceiver);
    messaging = new AzureServiceBusMessaging(fakeCredentials);
  });

  it("connects to the namespace host", () => {
    expect(namespaceHost("sb-prod")).toBe("sb-prod.servicebus.windows.net");
  });

  it("sends a message and closes the client", async () => {
    const id = await messaging.sendMessage("sb-prod", "orders", {
      body: '{"id":1}',
      messageId: "msg-1",
      applicationProperties: { priority: 2 },
    });

    expect(id).toBe("msg-1");
    expect(ServiceBusClient).toHaveBeenCalledWith("sb-prod.servicebus.windows.net", expect.anything());
    expect(mockSender.sendMessages).toHaveBeenCalledWith(
      expect.objectContaining({ body: '{"id":1}', messageId: "msg-1", applicationProperties: { priority: 2 } }),
    );
    expect(mockSender.close).toHaveBeenCalled();
    expect(mockClient.close).toHaveBeenCalled();
  });

  it("peeks subscription messages and decodes binary bodies", async () => {
    mockReceiver.peekMessages.mockResolvedValue([
      { messageId: "m-1", body: Buffer.from("hello"), sequenceNumber: { toString: () => "42" }, enqueuedTimeUtc: enqueued, deliveryCount: 0 },
    ]);

    const [message] = await messaging.peekMessages("sb-prod", { topic: "events", subscription: "audit" }, 5);

    expect(mockClient.createReceiver).toHaveBeenCalledWith("events", "audit", { receiveMode: "peekLock" });
    expect(mockReceiver.peekMessages).toHaveBeenCalledWith(5);
    expect(message).toMatchObject({ messageId: "m-1", body: "hello", sequenceNumber: "42", enqueuedTime: "2024-04-02T08:30:00.000Z" });
    expect(mockReceiver.completeMessage).not.toHaveBeenCalled();
  });

  it("completes each received message", async () => {
    const first = { messageId: "a", body: "one" };
    const second = { messageId: "b", body: "two" };
    mockReceiver.receiveMessages.mockResolvedValue([first, second]);

    const messages = await messaging.receiveMessages("sb-prod", { queue: "orders" }, 10, 3);

    expect(mockReceiver.receiveMessages).toHaveBeenCalledWith(10, { maxWaitTimeInMs: 3000 });
    expect(mockReceiver.completeMessage.mock.calls).toEqual([[first], [second]]);
    expect(messages.map((m) => m.body)).toEqual(["one", "two"]);
    expect(mockReceiver.close).toHaveBeenCalled();
  });

  it("rejects out of range message counts", async () => {
    await expect(messaging.peekMessages("sb-prod", { queue: "orders" }, 0)).rejects.toThrow("maxMessages must be between 1 and 100");
    expect(ServiceBusClient).not.toHaveBeenCalled();
  });
});
