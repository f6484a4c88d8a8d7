import type { FastifyInstance } from "fastify";

import { createServer } from "./server";

import { config } from "@/config/config";
import { DeliveryQueue } from "@/queue/deliveryQueue";
import { DeliveryWorker } from "@/queue/deliveryWorker";
import { FileNotificationStore } from "@/queue/persistentStore";
import { acquireProcessLock, type ProcessLock } from "@/queue/processLock";
import { startCronJobs, stopCronJobs } from "@/services/cron/cronScheduler";
import { GzctfClient } from "@/services/gzctf/gzctfClient";
import { PollingService } from "@/services/polling/polling.service";
import type { NotificationTransport } from "@/services/transport/transport";
import { createTransport } from "@/services/transport/transportFactory";
import { ConfigurationError } from "@/utils/errors";
import { logger } from "@/utils/logger";

interface RunningServices {
  lock?: ProcessLock;
  transport?: NotificationTransport;
  worker?: DeliveryWorker;
  poller?: PollingService;
  server?: FastifyInstance;
}

async function stopServices(services: RunningServices) {
  await services.poller?.stop();
  // Lets the in-flight send settle so its result reaches the journal.
  await services.worker?.stop();
  stopCronJobs();
  await services.server?.close();
  await services.transport?.disconnect();
  await services.lock?.release();
}

async function start() {
  const services: RunningServices = {};

  try {
    const gzctfUrl = config.gzctf.url;
    if (!gzctfUrl) {
      throw new ConfigurationError("GZCTF_URL is required");
    }

    services.lock = await acquireProcessLock(config.queue.storePath);

    const store = new FileNotificationStore(config.queue.storePath);
    const queue = new DeliveryQueue({ store, maxAttempts: config.queue.maxAttempts });
    await queue.restore();

    try {
      const compaction = await store.compact();
      logger.info("Notification journal compacted", compaction);
    } catch (error) {
      logger.warn("Startup journal compaction failed, continuing with the existing journal", { error });
    }

    const transport = createTransport(config.chat);
    await transport.connect();
    services.transport = transport;

    const worker = new DeliveryWorker({
      queue,
      transport,
      backoff: config.queue.backoff,
      transportTimeoutMs: config.queue.transportTimeoutMs,
      idleTickMs: config.queue.idleTickMs,
    });
    worker.start();
    services.worker = worker;

    const poller = new PollingService({
      client: new GzctfClient({ baseUrl: gzctfUrl, timeoutMs: config.gzctf.timeoutMs }),
      queue,
      matches: config.gzctf.matches,
      intervalMs: config.gzctf.pollIntervalMs,
    });
    await poller.start();
    services.poller = poller;

    startCronJobs({ store, queue, compactionSchedule: config.queue.compactionSchedule });

    if (config.server.enabled) {
      const server = await createServer({ queue });
      await server.listen({ port: config.server.port, host: config.server.host });
      services.server = server;
      logger.info(`Status server listening on http://${config.server.host}:${config.server.port}`);
    }

    logger.info("Notice relay started", {
      platform: transport.name,
      matches: config.gzctf.matches.length,
      pending: queue.size,
    });

    const shutdown = async (signal?: string) => {
      logger.info("Received shutdown signal", { signal });
      try {
        await stopServices(services);
        logger.info("Cleanup complete, exiting process", { pending: queue.size });
        process.exit(0);
      } catch (error) {
        logger.error("Failed to gracefully shut down", { error });
        process.exit(1);
      }
    };

    process.once("SIGINT", () => {
      void shutdown("SIGINT");
    });

    process.once("SIGTERM", () => {
      void shutdown("SIGTERM");
    });
  } catch (error) {
    logger.error("Failed to start notice relay", { error });
    await stopServices(services).catch((cleanupError: unknown) => {
      logger.error("Failed to clean up resources after startup failure", { cleanupError });
    });
    process.exit(1);
  }
}

void start();
