import type { NotificationStore } from "@/queue/persistentStore";
import { logger } from "@/utils/logger";

export async function runStoreCompaction(store: Pick<NotificationStore, "compact">) {
  logger.info("Starting notification journal compaction");

  try {
    const result = await store.compact();
    logger.info("Notification journal compaction completed", result);
    return result;
  } catch (error) {
    logger.error("Notification journal compaction failed", { error });
    throw error;
  }
}
