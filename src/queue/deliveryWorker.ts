import { applyTransientFailure, type BackoffPolicy } from "@/queue/backoff";
import type { DeliveryQueue } from "@/queue/deliveryQueue";
import { transientFailure } from "@/queue/deliveryResult";
import type { NotificationTransport } from "@/services/transport/transport";
import type { DeliveryResult } from "@/types/delivery";
import type { Notification } from "@/types/notification";
import { describeErrorCause } from "@/utils/errors";
import { logger } from "@/utils/logger";
import { sleep } from "@/utils/sleep";

export type DeliveryOutcome =
  | { status: "delivered"; notification: Notification }
  | { status: "rescheduled"; notification: Notification; delayMs: number }
  | { status: "dropped"; notification: Notification }
  // cancelled by an operator while the send was in flight
  | { status: "vanished"; notification: Notification };

export interface DeliveryWorkerOptions {
  queue: DeliveryQueue;
  transport: NotificationTransport;
  backoff: BackoffPolicy;
  transportTimeoutMs: number;
  /** Longest sleep between queue checks. */
  idleTickMs: number;
  now?: () => number;
}

/**
 * Single consumer of one `DeliveryQueue`. Sends at most one notification at a
 * time, in queue order, skipping items still in backoff.
 */
export class DeliveryWorker {
  private readonly queue: DeliveryQueue;
  private readonly transport: NotificationTransport;
  private readonly backoff: BackoffPolicy;
  private readonly transportTimeoutMs: number;
  private readonly idleTickMs: number;
  private readonly now: () => number;

  private controller: AbortController | null = null;
  private wakeController = new AbortController();
  private loop: Promise<void> | null = null;
  private unsubscribe: (() => void) | null = null;
  private inFlight: Notification | null = null;

  constructor(options: DeliveryWorkerOptions) {
    this.queue = options.queue;
    this.transport = options.transport;
    this.backoff = options.backoff;
    this.transportTimeoutMs = options.transportTimeoutMs;
    this.idleTickMs = options.idleTickMs;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.loop) {
      logger.warn("Delivery worker is already running");
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.unsubscribe = this.queue.on("enqueued", () => this.wake());
    this.loop = this.run(controller.signal);

    logger.info("Delivery worker started", {
      transport: this.transport.name,
      maxAttempts: this.queue.maxAttempts,
      transportTimeoutMs: this.transportTimeoutMs,
    });
  }

  /**
   * Stops the loop after the in-flight delivery settles. An item whose send
   * never completed stays in the journal and is retried after restart.
   */
  async stop(): Promise<void> {
    if (!this.loop || !this.controller) {
      return;
    }

    logger.info("Stopping delivery worker", { inFlight: this.inFlight?.id ?? null });
    this.controller.abort();
    this.wake();

    await this.loop;

    this.unsubscribe?.();
    this.unsubscribe = null;
    this.loop = null;
    this.controller = null;
    logger.info("Delivery worker stopped", { pending: this.queue.size });
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  getInFlight(): Notification | null {
    return this.inFlight;
  }

  /** Interrupts the current idle sleep. */
  wake(): void {
    this.wakeController.abort();
  }

  /** Delivers the next ready item, if any. Returns null when nothing was ready. */
  async processNext(): Promise<DeliveryOutcome | null> {
    const notification = this.queue.dequeueReady(this.now());
    if (!notification) {
      return null;
    }

    this.inFlight = notification;
    try {
      logger.debug("Delivering notification", { notificationId: notification.id, attempt: notification.attempts + 1 });
      const result = await this.deliver(notification);
      return await this.settle(notification, result);
    } finally {
      this.inFlight = null;
    }
  }

  private async run(signal: AbortSignal) {
    while (!signal.aborted) {
      try {
        const outcome = await this.processNext();
        if (!outcome && !signal.aborted) {
          await this.waitForWork(signal);
        }
      } catch (error) {
        logger.error("Delivery worker iteration failed", { error });
        await sleep(this.idleTickMs, signal);
      }
    }
  }

  private async waitForWork(signal: AbortSignal) {
    const wake = new AbortController();
    this.wakeController = wake;

    // Re-check after arming the wake signal so an enqueue in between is not missed.
    const now = this.now();
    if (this.queue.dequeueReady(now)) {
      return;
    }

    const nextEligibleAt = this.queue.nextEligibleAt();
    const delay = nextEligibleAt === null ? this.idleTickMs : Math.min(Math.max(nextEligibleAt - now, 0), this.idleTickMs);

    await sleep(delay, signal, wake.signal);
  }

  private async deliver(notification: Notification): Promise<DeliveryResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<DeliveryResult>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(transientFailure(`Transport timed out after ${this.transportTimeoutMs}ms`));
      }, this.transportTimeoutMs);
    });

    try {
      return await Promise.race([this.transport.send(notification.payload, controller.signal), timeout]);
    } catch (error) {
      return transientFailure(`Transport threw: ${describeErrorCause(error)}`);
    } finally {
      clearTimeout(timer);
    }
  }

  private async settle(notification: Notification, result: DeliveryResult): Promise<DeliveryOutcome> {
    const { id } = notification;

    if (!this.queue.get(id)) {
      logger.warn("Notification left the queue while in flight", { notificationId: id, delivered: result.ok });
      return { status: "vanished", notification };
    }

    if (result.ok) {
      const deliveredNotification = await this.queue.acknowledge(id);
      return { status: "delivered", notification: deliveredNotification };
    }

    const { failure } = result;

    if (failure.kind === "permanent") {
      logger.warn("Permanent delivery failure", { notificationId: id, detail: failure.detail });
      const outcome = await this.queue.reschedule(
        id,
        Math.max(this.queue.maxAttempts, notification.attempts + 1),
        this.now(),
        failure,
      );
      return { status: "dropped", notification: outcome.notification };
    }

    const now = this.now();
    const next = applyTransientFailure(notification, failure, this.backoff, now);
    const outcome = await this.queue.reschedule(id, next.attempts, next.nextEligibleAt, failure);

    if (outcome.status === "dropped") {
      return outcome;
    }

    const delayMs = outcome.notification.nextEligibleAt - now;
    logger.warn("Transient delivery failure, retry scheduled", {
      notificationId: id,
      attempts: outcome.notification.attempts,
      maxAttempts: this.queue.maxAttempts,
      delayMs,
      detail: failure.detail,
    });

    return { status: "rescheduled", notification: outcome.notification, delayMs };
  }
}
