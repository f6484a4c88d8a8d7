import { beforeEach, describe, expect, it, vi } from "vitest";

import type { NotificationTransport } from "@/services/transport/transport";
import { MemoryNotificationStore } from "@/test/memoryStore";
import type { DeliveryResult } from "@/types/delivery";
import type { Notification } from "@/types/notification";
import type { BackoffPolicy } from "./backoff";
import { DeliveryQueue } from "./deliveryQueue";
import { delivered, permanentFailure, transientFailure } from "./deliveryResult";
import { DeliveryWorker } from "./deliveryWorker";
import { createNotification } from "./notification";

const NOW = 1_700_000_000_000;
const backoff: BackoffPolicy = { baseMs: 2000, factor: 2, maxMs: 60_000 };

function createTransport() {
  const send = vi.fn<NotificationTransport["send"]>();
  const transport: NotificationTransport = {
    name: "fake",
    connect: vi.fn(async () => undefined),
    disconnect: vi.fn(async () => undefined),
    send,
  };
  return { transport, send };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

describe("DeliveryWorker", () => {
  let clock: number;
  let store: MemoryNotificationStore;
  let queue: DeliveryQueue;

  const now = () => clock;

  function createWorker(transport: NotificationTransport, overrides: { transportTimeoutMs?: number } = {}) {
    return new DeliveryWorker({
      queue,
      transport,
      backoff,
      transportTimeoutMs: overrides.transportTimeoutMs ?? 1_000,
      idleTickMs: 10,
      now,
    });
  }

  beforeEach(() => {
    clock = NOW;
    store = new MemoryNotificationStore();
    queue = new DeliveryQueue({ store, maxAttempts: 5, now });
  });

  it("should deliver after two transient failures with two recorded attempts", async () => {
    const { transport, send } = createTransport();
    send
      .mockResolvedValueOnce(transientFailure("HTTP 503"))
      .mockResolvedValueOnce(transientFailure("HTTP 503"))
      .mockResolvedValueOnce(delivered());
    const worker = createWorker(transport);
    const n1 = createNotification({ title: "Announcement", body: "round started" }, NOW);
    await queue.enqueue(n1);

    const first = await worker.processNext();
    expect(first).toMatchObject({ status: "rescheduled", delayMs: 2000 });
    expect(await worker.processNext()).toBeNull();

    clock += 2000;
    const second = await worker.processNext();
    expect(second).toMatchObject({ status: "rescheduled", delayMs: 4000 });

    clock += 4000;
    const third = await worker.processNext();

    expect(third?.status).toBe("delivered");
    expect(third?.notification.attempts).toBe(2);
    expect(store.records.has(n1.id)).toBe(false);
    expect(send).toHaveBeenCalledTimes(3);
    expect(send.mock.calls[0][0]).toEqual(n1.payload);
  });

  it("should drop a permanently rejected notification after one attempt", async () => {
    const { transport, send } = createTransport();
    send.mockResolvedValue(permanentFailure("Discord rejected the message with HTTP 403: Missing Access"));
    const worker = createWorker(transport);
    const n2 = createNotification({ title: "Announcement", body: "rejected" }, NOW);
    await queue.enqueue(n2);

    const outcome = await worker.processNext();

    expect(outcome?.status).toBe("dropped");
    expect(outcome?.notification.attempts).toBe(1);
    expect(store.records.has(n2.id)).toBe(false);

    clock += 3_600_000;
    expect(await worker.processNext()).toBeNull();
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("should deliver a notification restored after a restart", async () => {
    const n3 = createNotification({ title: "Announcement", body: "survives restart" }, NOW);
    await queue.enqueue(n3);

    const restarted = new DeliveryQueue({ store, maxAttempts: 5, now });
    await restarted.restore();
    expect(restarted.list()).toEqual([{ notification: n3, persisted: true }]);

    queue = restarted;
    const { transport, send } = createTransport();
    send.mockResolvedValue(delivered());
    const outcome = await createWorker(transport).processNext();

    expect(outcome).toEqual({ status: "delivered", notification: n3 });
    expect(send).toHaveBeenCalledWith(n3.payload, expect.any(AbortSignal));
  });

  it("should drop an always-failing notification after exactly the max attempts", async () => {
    const { transport, send } = createTransport();
    send.mockResolvedValue(transientFailure("connection reset"));
    const worker = createWorker(transport);
    await queue.enqueue(createNotification({ title: "t", body: "b" }, NOW));

    const deadlines: number[] = [];
    const attempts: number[] = [];

    for (let round = 0; round < 4; round += 1) {
      const outcome = await worker.processNext();
      expect(outcome?.status).toBe("rescheduled");
      if (!outcome) return;
      deadlines.push(outcome.notification.nextEligibleAt);
      attempts.push(outcome.notification.attempts);
      clock = outcome.notification.nextEligibleAt;
    }

    const last = await worker.processNext();

    expect(last?.status).toBe("dropped");
    expect(last?.notification.attempts).toBe(5);
    expect(attempts).toEqual([1, 2, 3, 4]);
    expect(deadlines).toEqual([NOW + 2000, NOW + 6000, NOW + 14_000, NOW + 30_000]);
    expect(send).toHaveBeenCalledTimes(5);
    expect(queue.size).toBe(0);
  });

  it("should wait at least as long as the platform asks", async () => {
    const { transport, send } = createTransport();
    send.mockResolvedValue(transientFailure("Discord rate limit reached", 30_000));
    await queue.enqueue(createNotification({ title: "t", body: "b" }, NOW));

    const outcome = await createWorker(transport).processNext();

    expect(outcome).toMatchObject({ status: "rescheduled", delayMs: 30_000 });
  });

  it("should treat a hung send as a transient failure and abort it", async () => {
    const { transport, send } = createTransport();
    let sendSignal: AbortSignal | undefined;
    send.mockImplementation((_payload, signal) => {
      sendSignal = signal;
      return new Promise<DeliveryResult>(() => undefined);
    });
    await queue.enqueue(createNotification({ title: "t", body: "b" }, NOW));

    const outcome = await createWorker(transport, { transportTimeoutMs: 20 }).processNext();

    expect(outcome).toMatchObject({ status: "rescheduled", delayMs: 2000 });
    expect(sendSignal?.aborted).toBe(true);
  });

  it("should treat a throwing transport as a transient failure", async () => {
    const { transport, send } = createTransport();
    send.mockRejectedValue(new Error("socket hang up"));
    const notification = createNotification({ title: "t", body: "b" }, NOW);
    await queue.enqueue(notification);

    const outcome = await createWorker(transport).processNext();

    expect(outcome?.status).toBe("rescheduled");
    expect(queue.get(notification.id)?.attempts).toBe(1);
  });

  it("should report an item cancelled while its send was in flight", async () => {
    const { transport, send } = createTransport();
    const notification = createNotification({ title: "t", body: "b" }, NOW);
    send.mockImplementation(async () => {
      await queue.cancel(notification.id);
      return delivered();
    });
    await queue.enqueue(notification);

    const outcome = await createWorker(transport).processNext();

    expect(outcome).toEqual({ status: "vanished", notification });
    expect(queue.getStats(clock).delivered).toBe(0);
  });

  it("should deliver items enqueued while running", async () => {
    const { transport, send } = createTransport();
    send.mockResolvedValue(delivered());
    const worker = createWorker(transport);
    const delivery = deferred<Notification>();
    queue.on("delivered", delivery.resolve);

    worker.start();
    expect(worker.isRunning()).toBe(true);
    const notification = createNotification({ title: "live", body: "b" }, NOW);
    await queue.enqueue(notification);

    await expect(delivery.promise).resolves.toEqual(notification);
    await worker.stop();
    expect(worker.isRunning()).toBe(false);
  });

  it("should let the in-flight send settle before stopping", async () => {
    const { transport, send } = createTransport();
    const started = deferred<void>();
    const result = deferred<DeliveryResult>();
    send.mockImplementation(() => {
      started.resolve();
      return result.promise;
    });
    const worker = createWorker(transport);
    const notification = createNotification({ title: "in flight", body: "b" }, NOW);
    await queue.enqueue(notification);

    worker.start();
    await started.promise;
    expect(worker.getInFlight()).toEqual(notification);

    const stopping = worker.stop();
    result.resolve(delivered());
    await stopping;

    expect(worker.getInFlight()).toBeNull();
    expect(queue.size).toBe(0);
    expect(store.records.has(notification.id)).toBe(false);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("should keep running when waiting for work fails", async () => {
    const { transport, send } = createTransport();
    send.mockResolvedValue(delivered());
    const worker = createWorker(transport);
    const delivery = deferred<Notification>();
    queue.on("delivered", delivery.resolve);
    const nextEligibleAt = vi.spyOn(queue, "nextEligibleAt").mockImplementationOnce(() => {
      throw new RangeError("Maximum call stack size exceeded");
    });

    worker.start();
    await vi.waitFor(() => expect(nextEligibleAt).toHaveBeenCalled());
    const notification = createNotification({ title: "after failure", body: "b" }, NOW);
    await queue.enqueue(notification);

    await expect(delivery.promise).resolves.toEqual(notification);
    expect(worker.isRunning()).toBe(true);
    await worker.stop();
  });
});
