import { FastifyInstance } from "fastify";

import type { StatusQueue } from "@/server";
import { ServiceUnavailableError } from "@/utils/errors";

const now = () => new Date().toISOString();

export interface HealthRouteOptions {
  queue: StatusQueue;
}

export async function registerHealthRoutes(app: FastifyInstance, { queue }: HealthRouteOptions) {
  app.get("/health", async () => ({
    status: "ok",
    timestamp: now(),
  }));

  app.get("/health/queue", async () => {
    const stats = queue.getStats();

    if (stats.degraded) {
      throw new ServiceUnavailableError("Delivery queue is not persisting to disk", stats);
    }

    return {
      status: "ok",
      service: "delivery-queue",
      ...stats,
      timestamp: now(),
    };
  });
}
