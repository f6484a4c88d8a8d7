import { FastifyInstance } from "fastify";
import { z } from "zod";

import { validateRequest } from "@/middleware/validateRequest";
import type { StatusQueue } from "@/server";

const notificationParamsSchema = z.object({
  id: z.string().uuid(),
});

type NotificationParams = z.infer<typeof notificationParamsSchema>;

export interface QueueRouteOptions {
  queue: StatusQueue;
}

export async function registerQueueRoutes(app: FastifyInstance, { queue }: QueueRouteOptions) {
  app.get("/", async () => ({
    items: queue.list().map(({ notification, persisted }) => ({ ...notification, persisted })),
    stats: queue.getStats(),
  }));

  app.post<{ Params: NotificationParams }>(
    "/:id/retry",
    { preHandler: validateRequest({ params: notificationParamsSchema }) },
    async (request) => {
      const notification = await queue.retryNow(request.params.id);
      return { notification };
    },
  );

  app.delete<{ Params: NotificationParams }>(
    "/:id",
    { preHandler: validateRequest({ params: notificationParamsSchema }) },
    async (request) => {
      const notification = await queue.cancel(request.params.id);
      return { notification, reason: "cancelled" };
    },
  );
}
