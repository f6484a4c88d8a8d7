import type { MatchConfig } from "@/config/config";
import type { DeliveryQueue } from "@/queue/deliveryQueue";
import { createNotification } from "@/queue/notification";
import { formatNotice, matchLabel } from "@/services/gzctf/formatter";
import { filterByType, type GzctfClient } from "@/services/gzctf/gzctfClient";
import { NoticeTracker } from "@/services/polling/noticeTracker";
import { ALL_NOTICE_TYPES } from "@/types/gzctf";
import { logger } from "@/utils/logger";
import { sleep } from "@/utils/sleep";

export interface PollingServiceOptions {
  client: Pick<GzctfClient, "baseUrl" | "fetchNotices">;
  queue: Pick<DeliveryQueue, "enqueue">;
  matches: readonly MatchConfig[];
  intervalMs: number;
  tracker?: NoticeTracker;
  now?: () => number;
}

/**
 * Watches the notice feed of every configured match and enqueues one
 * notification per notice it has not announced yet.
 */
export class PollingService {
  private readonly client: PollingServiceOptions["client"];
  private readonly queue: PollingServiceOptions["queue"];
  private readonly matches: readonly MatchConfig[];
  private readonly intervalMs: number;
  private readonly tracker: NoticeTracker;
  private readonly now: () => number;
  /** Matches whose history has been recorded without announcing it. */
  private readonly seeded = new Set<number>();

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: PollingServiceOptions) {
    this.client = options.client;
    this.queue = options.queue;
    this.matches = options.matches;
    this.intervalMs = options.intervalMs;
    this.tracker = options.tracker ?? new NoticeTracker();
    this.now = options.now ?? Date.now;
  }

  async start(): Promise<void> {
    if (this.loop) {
      logger.warn("Polling service is already running");
      return;
    }

    if (this.matches.length === 0) {
      logger.error("No matches configured to monitor");
      return;
    }

    logger.info("Monitoring matches", {
      intervalMs: this.intervalMs,
      matches: this.matches.map((match) => ({ id: match.id, name: matchLabel(match) })),
    });

    await this.seedAll();

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  async stop(): Promise<void> {
    if (!this.loop || !this.controller) {
      return;
    }

    this.controller.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    logger.info("Polling service stopped");
  }

  /** One polling round over every match. Failures are logged per match. */
  async pollOnce(): Promise<number> {
    let enqueued = 0;

    for (const match of this.matches) {
      try {
        enqueued += this.seeded.has(match.id) ? await this.checkMatch(match) : await this.seedMatch(match);
      } catch (error) {
        logger.error("Failed to poll notices", { matchId: match.id, error });
      }
    }

    return enqueued;
  }

  private async run(signal: AbortSignal) {
    while (!signal.aborted) {
      await sleep(this.intervalMs, signal);
      if (signal.aborted) break;

      logger.debug("Polling for new notices");
      await this.pollOnce();
    }
  }

  private async seedAll() {
    for (const match of this.matches) {
      try {
        await this.seedMatch(match);
      } catch (error) {
        logger.error("Failed to initialise notice tracker, will retry on next poll", { matchId: match.id, error });
      }
    }
  }

  /** Records the current history so it is not re-announced. Enqueues nothing. */
  private async seedMatch(match: MatchConfig): Promise<number> {
    const notices = await this.client.fetchNotices(match.id);

    for (const type of ALL_NOTICE_TYPES) {
      const times = filterByType(notices, type).map((notice) => notice.time);
      if (times.length > 0) {
        this.tracker.set(match.id, type, times.reduce((latest, time) => Math.max(latest, time)));
      }
    }

    this.seeded.add(match.id);
    logger.info("Initialised notice tracker", { matchId: match.id, name: matchLabel(match), notices: notices.length });
    return 0;
  }

  private async checkMatch(match: MatchConfig): Promise<number> {
    const notices = await this.client.fetchNotices(match.id);
    let enqueued = 0;

    for (const type of ALL_NOTICE_TYPES) {
      const lastSeen = this.tracker.get(match.id, type);
      const fresh = filterByType(notices, type)
        .filter((notice) => notice.time > lastSeen)
        .sort((left, right) => left.time - right.time || left.id - right.id);

      if (fresh.length === 0) continue;

      logger.info("Found new notices", { matchId: match.id, type, count: fresh.length });

      for (const notice of fresh) {
        const payload = formatNotice(notice, type, match, this.client.baseUrl);
        await this.queue.enqueue(createNotification(payload, this.now()));
        this.tracker.advance(match.id, type, notice.time);
        enqueued += 1;
      }
    }

    return enqueued;
  }
}
