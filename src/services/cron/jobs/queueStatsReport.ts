import type { DeliveryQueue } from "@/queue/deliveryQueue";
import { logger } from "@/utils/logger";

export function runQueueStatsReport(queue: Pick<DeliveryQueue, "getStats">) {
  const stats = queue.getStats();

  if (stats.degraded) {
    logger.warn("Delivery queue is running without durable persistence", stats);
  } else {
    logger.info("Delivery queue stats", stats);
  }

  return stats;
}
