import { randomUUID } from "node:crypto";
import type { IncomingHttpHeaders } from "node:http";

import Fastify, { FastifyInstance } from "fastify";
import helmet from "@fastify/helmet";

import { config } from "@/config/config";
import { errorHandler } from "@/middleware/errorHandler";
import { registerRequestLogger } from "@/middleware/requestLogger";
import type { DeliveryQueue } from "@/queue/deliveryQueue";
import { registerHealthRoutes } from "@/routes/health";
import { registerQueueRoutes } from "@/routes/queue";

/** The queue operations the status server exposes. */
export type StatusQueue = Pick<DeliveryQueue, "list" | "getStats" | "retryNow" | "cancel">;

export interface ServerDependencies {
  queue: StatusQueue;
}

function getRequestId(headers: IncomingHttpHeaders) {
  const headerValue = headers[config.server.requestIdHeader];
  if (typeof headerValue === "string" && headerValue.length > 0) {
    return headerValue;
  }

  if (Array.isArray(headerValue) && headerValue.length > 0) {
    return headerValue[0];
  }

  return randomUUID();
}

export async function createServer({ queue }: ServerDependencies): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false,
    requestIdHeader: config.server.requestIdHeader,
    genReqId: (request) => getRequestId(request.headers),
  });

  await app.register(helmet);

  registerRequestLogger(app);
  app.setErrorHandler(errorHandler);

  await app.register(registerHealthRoutes, { prefix: "/api", queue });
  await app.register(registerQueueRoutes, { prefix: "/api/v1/queue", queue });

  return app;
}
