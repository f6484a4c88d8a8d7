import type { NotificationStore } from "@/queue/persistentStore";
import type { DeliveryFailure, DropReason } from "@/types/delivery";
import type { Notification } from "@/types/notification";
import { AsyncLock } from "@/utils/asyncLock";
import { NotFoundError, ValidationError, type StoreOperation } from "@/utils/errors";
import { logger } from "@/utils/logger";

/**
 * `synced`: the journal matches memory. `unconfirmed`: the append rejected, so
 * the line may or may not be in the journal. `stale`: in the journal with
 * outdated attempt metadata.
 */
type SyncState = "synced" | "unconfirmed" | "stale";

interface QueueEntry {
  notification: Notification;
  sync: SyncState;
}

export interface DropReport {
  notification: Notification;
  reason: DropReason;
  failure?: DeliveryFailure;
}

export interface DeliveryQueueEvents {
  enqueued: Notification;
  delivered: Notification;
  dropped: DropReport;
  degraded: boolean;
}

type QueueListener<K extends keyof DeliveryQueueEvents> = (payload: DeliveryQueueEvents[K]) => void;

export type RescheduleOutcome =
  | { status: "rescheduled"; notification: Notification }
  | { status: "dropped"; notification: Notification };

export interface QueueItemView {
  notification: Notification;
  persisted: boolean;
}

export interface DeliveryQueueStats {
  pending: number;
  ready: number;
  backingOff: number;
  delivered: number;
  dropped: number;
  degraded: boolean;
  unpersisted: number;
}

export interface DeliveryQueueOptions {
  store: NotificationStore;
  maxAttempts: number;
  now?: () => number;
}

/**
 * FIFO buffer of pending notifications backed by a `NotificationStore`.
 *
 * Mutations run under one lock and write the journal before touching memory,
 * so the journal and the buffer change in the same order. When the store
 * fails the queue keeps working in memory, flags itself degraded, and retries
 * the missing writes at the start of every later mutation.
 */
export class DeliveryQueue {
  readonly maxAttempts: number;

  private readonly store: NotificationStore;
  private readonly now: () => number;
  private readonly lock = new AsyncLock();
  private readonly entries: QueueEntry[] = [];
  /** Ids already gone from memory whose journal removal failed. */
  private readonly pendingRemovals = new Set<string>();
  private readonly listeners: { [K in keyof DeliveryQueueEvents]: Set<QueueListener<K>> } = {
    enqueued: new Set(),
    delivered: new Set(),
    dropped: new Set(),
    degraded: new Set(),
  };
  private degraded = false;
  private deliveredCount = 0;
  private droppedCount = 0;

  constructor(options: DeliveryQueueOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new ValidationError("maxAttempts must be a positive integer", { maxAttempts: options.maxAttempts });
    }

    this.store = options.store;
    this.maxAttempts = options.maxAttempts;
    this.now = options.now ?? Date.now;
  }

  on<K extends keyof DeliveryQueueEvents>(event: K, listener: QueueListener<K>): () => void {
    this.listeners[event].add(listener);
    return () => {
      this.listeners[event].delete(listener);
    };
  }

  /** Boot-time load. Store failures are fatal here: the journal is the source of truth. */
  restore(): Promise<number> {
    return this.lock.runExclusive(async () => {
      const restored = await this.store.loadAll();
      let added = 0;

      for (const notification of restored) {
        if (this.indexOf(notification.id) >= 0) continue;
        this.entries.push({ notification, sync: "synced" });
        added += 1;
      }

      logger.info("Delivery queue restored", { restored: added, pending: this.entries.length });
      return added;
    });
  }

  async enqueue(notification: Notification): Promise<QueueItemView> {
    const view = await this.lock.runExclusive(async () => {
      if (this.indexOf(notification.id) >= 0) {
        throw new ValidationError(`Notification ${notification.id} is already queued`, { id: notification.id });
      }

      // Appending while older items are still unconfirmed would reorder the journal.
      const repaired = await this.repairPersistence();
      const persisted = repaired && (await this.tryStore("append", notification.id, () => this.store.append(notification)));

      this.entries.push({ notification, sync: persisted ? "synced" : "unconfirmed" });
      this.refreshDegraded();

      logger.info("Notification enqueued", {
        notificationId: notification.id,
        title: notification.payload.title,
        persisted,
        pending: this.entries.length,
      });

      return { notification, persisted };
    });

    this.emit("enqueued", notification);
    return view;
  }

  /** Oldest item whose backoff has elapsed. Does not remove it. */
  dequeueReady(now = this.now()): Notification | null {
    return this.entries.find((entry) => entry.notification.nextEligibleAt <= now)?.notification ?? null;
  }

  /** Earliest backoff deadline across pending items, or null when empty. */
  nextEligibleAt(): number | null {
    let earliest: number | null = null;

    for (const { notification } of this.entries) {
      if (earliest === null || notification.nextEligibleAt < earliest) {
        earliest = notification.nextEligibleAt;
      }
    }

    return earliest;
  }

  async acknowledge(id: string): Promise<Notification> {
    const notification = await this.lock.runExclusive(async () => {
      const entry = this.requireEntry(id);
      await this.repairPersistence();
      await this.removeDurably(entry);
      this.detach(id);
      this.deliveredCount += 1;
      this.refreshDegraded();

      logger.info("Notification delivered", {
        notificationId: id,
        attempts: entry.notification.attempts,
        pending: this.entries.length,
      });

      return entry.notification;
    });

    this.emit("delivered", notification);
    return notification;
  }

  /**
   * Records a failed attempt. Reaching `maxAttempts` drops the item instead.
   * A permanent failure is reported with the attempt it actually took, not the
   * forced maximum.
   */
  async reschedule(
    id: string,
    attempts: number,
    nextEligibleAt: number,
    failure?: DeliveryFailure,
  ): Promise<RescheduleOutcome> {
    const outcome = await this.lock.runExclusive(async (): Promise<RescheduleOutcome> => {
      const entry = this.requireEntry(id);

      if (attempts < entry.notification.attempts) {
        throw new ValidationError("Delivery attempts cannot decrease", {
          id,
          current: entry.notification.attempts,
          requested: attempts,
        });
      }

      await this.repairPersistence();

      if (attempts >= this.maxAttempts) {
        const recordedAttempts =
          failure?.kind === "permanent" ? Math.min(attempts, entry.notification.attempts + 1) : attempts;
        const dropped = await this.dropEntry(
          entry,
          { ...entry.notification, attempts: recordedAttempts },
          dropReasonFor(failure),
          failure,
        );
        return { status: "dropped", notification: dropped };
      }

      const updated: Notification = { ...entry.notification, attempts, nextEligibleAt };
      await this.updateDurably(entry, updated);

      logger.debug("Notification rescheduled", {
        notificationId: id,
        attempts,
        nextEligibleAt: new Date(nextEligibleAt).toISOString(),
      });

      return { status: "rescheduled", notification: updated };
    });

    if (outcome.status === "dropped") {
      this.emit("dropped", { notification: outcome.notification, reason: dropReasonFor(failure), failure });
    }

    return outcome;
  }

  /** Operator override: makes an item in backoff eligible immediately. */
  retryNow(id: string): Promise<Notification> {
    return this.lock.runExclusive(async () => {
      const entry = this.requireEntry(id);
      await this.repairPersistence();

      const updated: Notification = {
        ...entry.notification,
        nextEligibleAt: Math.min(entry.notification.nextEligibleAt, this.now()),
      };
      await this.updateDurably(entry, updated);

      logger.warn("Notification retry requested", { notificationId: id, attempts: updated.attempts });
      return updated;
    });
  }

  /** Operator drop. Reported like any other drop. */
  async cancel(id: string): Promise<Notification> {
    const notification = await this.lock.runExclusive(async () => {
      const entry = this.requireEntry(id);
      await this.repairPersistence();
      return this.dropEntry(entry, entry.notification, "cancelled");
    });

    this.emit("dropped", { notification, reason: "cancelled" });
    return notification;
  }

  get(id: string): Notification | null {
    const index = this.indexOf(id);
    return index >= 0 ? this.entries[index].notification : null;
  }

  list(): QueueItemView[] {
    return this.entries.map((entry) => ({ notification: entry.notification, persisted: entry.sync === "synced" }));
  }

  get size(): number {
    return this.entries.length;
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  getStats(now = this.now()): DeliveryQueueStats {
    const ready = this.entries.filter((entry) => entry.notification.nextEligibleAt <= now).length;

    return {
      pending: this.entries.length,
      ready,
      backingOff: this.entries.length - ready,
      delivered: this.deliveredCount,
      dropped: this.droppedCount,
      degraded: this.degraded,
      unpersisted: this.entries.filter((entry) => entry.sync !== "synced").length + this.pendingRemovals.size,
    };
  }

  private async dropEntry(
    entry: QueueEntry,
    reported: Notification,
    reason: DropReason,
    failure?: DeliveryFailure,
  ): Promise<Notification> {
    await this.removeDurably(entry);
    this.detach(entry.notification.id);
    this.droppedCount += 1;
    this.refreshDegraded();

    logger.error("Notification dropped", {
      notificationId: reported.id,
      title: reported.payload.title,
      reason,
      attempts: reported.attempts,
      failure: failure?.detail,
    });

    return reported;
  }

  private async updateDurably(entry: QueueEntry, updated: Notification) {
    if (entry.sync !== "unconfirmed") {
      const written = await this.tryStore("update", updated.id, () => this.store.update(updated));
      entry.sync = written ? "synced" : "stale";
    }

    entry.notification = updated;
    this.refreshDegraded();
  }

  /** Also issued for unconfirmed entries: replay ignores a remove of an id it never saw. */
  private async removeDurably(entry: QueueEntry) {
    const { id } = entry.notification;
    const removed = await this.tryStore("remove", id, () => this.store.remove(id));
    if (!removed) {
      this.pendingRemovals.add(id);
    }
  }

  /**
   * Replays writes that failed earlier, oldest first. Stops at the first
   * failure. Returns true when nothing is left outstanding.
   */
  private async repairPersistence(): Promise<boolean> {
    for (const id of Array.from(this.pendingRemovals)) {
      if (!(await this.tryStore("remove", id, () => this.store.remove(id)))) {
        return false;
      }
      this.pendingRemovals.delete(id);
    }

    for (const entry of this.entries) {
      if (entry.sync === "synced") continue;

      const { notification } = entry;

      if (entry.sync === "unconfirmed") {
        if (!(await this.tryStore("append", notification.id, () => this.store.append(notification)))) {
          return false;
        }
        // A half-failed earlier append may already hold the creation-time record; replay keeps that one.
        entry.sync = hasCreationMetadata(notification) ? "synced" : "stale";
      }

      if (entry.sync === "stale") {
        if (!(await this.tryStore("update", notification.id, () => this.store.update(notification)))) {
          return false;
        }
        entry.sync = "synced";
      }
    }

    this.refreshDegraded();
    return true;
  }

  private async tryStore(operation: StoreOperation, id: string, write: () => Promise<void>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (error) {
      logger.warn("Notification store write failed, keeping state in memory", {
        operation,
        notificationId: id,
        error,
      });
      return false;
    }
  }

  private refreshDegraded() {
    const degraded = this.pendingRemovals.size > 0 || this.entries.some((entry) => entry.sync !== "synced");
    if (degraded === this.degraded) {
      return;
    }

    this.degraded = degraded;
    if (degraded) {
      logger.error("Delivery queue entered degraded-persistence mode; pending notifications are not restart-safe", {
        pending: this.entries.length,
      });
    } else {
      logger.info("Delivery queue persistence restored", { pending: this.entries.length });
    }

    this.emit("degraded", degraded);
  }

  private requireEntry(id: string): QueueEntry {
    const index = this.indexOf(id);
    if (index < 0) {
      throw new NotFoundError(`Notification ${id} is not queued`, { id });
    }
    return this.entries[index];
  }

  private detach(id: string) {
    const index = this.indexOf(id);
    if (index >= 0) {
      this.entries.splice(index, 1);
    }
  }

  private indexOf(id: string): number {
    return this.entries.findIndex((entry) => entry.notification.id === id);
  }

  private emit<K extends keyof DeliveryQueueEvents>(event: K, payload: DeliveryQueueEvents[K]) {
    for (const listener of this.listeners[event]) {
      try {
        listener(payload);
      } catch (error) {
        logger.error("Delivery queue listener failed", { event, error });
      }
    }
  }
}

function hasCreationMetadata(notification: Notification): boolean {
  return notification.attempts === 0 && notification.nextEligibleAt === notification.createdAt;
}

function dropReasonFor(failure?: DeliveryFailure): DropReason {
  return failure?.kind === "permanent" ? "permanent" : "exhausted";
}
