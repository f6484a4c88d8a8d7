import { afterEach, beforeEach, describe, expect, it } from "vitest";
import request from "supertest";
import type { FastifyInstance } from "fastify";

import { DeliveryQueue } from "@/queue/deliveryQueue";
import { createNotification } from "@/queue/notification";
import { createServer } from "@/server";
import { MemoryNotificationStore } from "@/test/memoryStore";

describe("Health routes", () => {
  let app: FastifyInstance;
  let store: MemoryNotificationStore;
  let queue: DeliveryQueue;

  beforeEach(async () => {
    store = new MemoryNotificationStore();
    queue = new DeliveryQueue({ store, maxAttempts: 5 });
    app = await createServer({ queue });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it("should report liveness", async () => {
    const response = await request(app.server).get("/api/health");

    expect(response.status).toBe(200);
    expect(response.body.status).toBe("ok");
  });

  it("should report a healthy queue", async () => {
    const response = await request(app.server).get("/api/health/queue");

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: "ok", service: "delivery-queue", pending: 0, degraded: false });
  });

  it("should return 503 while the queue is not persisting", async () => {
    store.failing = true;
    await queue.enqueue(createNotification({ title: "t", body: "b" }));

    const response = await request(app.server).get("/api/health/queue");

    expect(response.status).toBe(503);
    expect(response.body.error).toMatchObject({
      code: "SERVICE_UNAVAILABLE",
      message: "Delivery queue is not persisting to disk",
    });
    expect(response.body.error.details).toMatchObject({ degraded: true, unpersisted: 1 });
  });
});
