import cron, { type ScheduledTask } from "node-cron";

import type { DeliveryQueue } from "@/queue/deliveryQueue";
import type { NotificationStore } from "@/queue/persistentStore";
import { ConfigurationError } from "@/utils/errors";
import { logger } from "@/utils/logger";
import { runQueueStatsReport } from "./jobs/queueStatsReport";
import { runStoreCompaction } from "./jobs/storeCompaction";

export const QUEUE_STATS_SCHEDULE = "*/5 * * * *";

export interface MaintenanceTargets {
  store: Pick<NotificationStore, "compact">;
  queue: Pick<DeliveryQueue, "getStats">;
  compactionSchedule: string;
}

const scheduledTasks: ScheduledTask[] = [];
let isSchedulerRunning = false;

export function startCronJobs({ store, queue, compactionSchedule }: MaintenanceTargets) {
  if (isSchedulerRunning) {
    logger.warn("Cron scheduler is already running");
    return;
  }

  if (!cron.validate(compactionSchedule)) {
    throw new ConfigurationError(`Invalid STORE_COMPACTION_CRON expression "${compactionSchedule}"`);
  }

  logger.info("Starting cron scheduler");

  const compactionTask = cron.schedule(
    compactionSchedule,
    async () => {
      logger.debug("Cron job triggered: journal compaction");
      try {
        await runStoreCompaction(store);
      } catch (error) {
        logger.error("Journal compaction failed with unhandled error", { error });
      }
    },
    {
      scheduled: true,
      timezone: "UTC",
    },
  );

  const statsTask = cron.schedule(
    QUEUE_STATS_SCHEDULE,
    () => {
      runQueueStatsReport(queue);
    },
    {
      scheduled: true,
      timezone: "UTC",
    },
  );

  scheduledTasks.push(compactionTask, statsTask);

  isSchedulerRunning = true;
  logger.info("Cron scheduler started with 2 jobs", {
    jobs: [
      { name: "journal_compaction", schedule: compactionSchedule, timezone: "UTC" },
      { name: "queue_stats_report", schedule: QUEUE_STATS_SCHEDULE, timezone: "UTC" },
    ],
  });
}

export function stopCronJobs() {
  if (!isSchedulerRunning) {
    logger.warn("Cron scheduler is not running");
    return;
  }

  logger.info("Stopping cron scheduler");

  for (const task of scheduledTasks) {
    task.stop();
  }

  scheduledTasks.length = 0;
  isSchedulerRunning = false;

  logger.info("Cron scheduler stopped");
}

export function isRunning(): boolean {
  return isSchedulerRunning;
}
