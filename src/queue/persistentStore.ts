import { mkdir, open, readFile, rename, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

import { notificationSchema } from "@/queue/notification";
import type { Notification } from "@/types/notification";
import { AsyncLock } from "@/utils/asyncLock";
import { StoreUnavailableError, type StoreOperation } from "@/utils/errors";
import { logger } from "@/utils/logger";

/**
 * Durable record of notifications that have not been delivered or dropped yet.
 * Every method either completes durably or rejects with `StoreUnavailableError`.
 */
export interface NotificationStore {
  append(notification: Notification): Promise<void>;
  update(notification: Notification): Promise<void>;
  remove(id: string): Promise<void>;
  /** Live records in original insertion order. */
  loadAll(): Promise<Notification[]>;
  compact(): Promise<CompactionResult>;
}

export interface CompactionResult {
  kept: number;
  discardedLines: number;
}

const journalRecordSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("append"), notification: notificationSchema }),
  z.object({
    op: z.literal("update"),
    id: z.string().min(1),
    attempts: z.number().int().nonnegative(),
    nextEligibleAt: z.number().int().nonnegative(),
  }),
  z.object({ op: z.literal("remove"), id: z.string().min(1) }),
]);

export type JournalRecord = z.infer<typeof journalRecordSchema>;

export interface JournalReplay {
  notifications: Notification[];
  totalLines: number;
  /** 1-based line numbers that could not be parsed. */
  skippedLines: number[];
}

/**
 * Rebuilds the live set from journal text. Torn or foreign lines are skipped,
 * a repeated append of a live id is ignored, and updates or removals of
 * unknown ids are no-ops.
 */
export function replayJournal(content: string): JournalReplay {
  const live = new Map<string, Notification>();
  const skippedLines: number[] = [];
  let totalLines = 0;

  content.split("\n").forEach((line, index) => {
    if (line.trim().length === 0) return;
    totalLines += 1;

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      skippedLines.push(index + 1);
      return;
    }

    const parsed = journalRecordSchema.safeParse(raw);
    if (!parsed.success) {
      skippedLines.push(index + 1);
      return;
    }

    const record = parsed.data;
    switch (record.op) {
      case "append":
        if (!live.has(record.notification.id)) {
          live.set(record.notification.id, record.notification);
        }
        break;
      case "update": {
        const current = live.get(record.id);
        if (current) {
          live.set(record.id, { ...current, attempts: record.attempts, nextEligibleAt: record.nextEligibleAt });
        }
        break;
      }
      case "remove":
        live.delete(record.id);
        break;
    }
  });

  return { notifications: Array.from(live.values()), totalLines, skippedLines };
}

function serialize(record: JournalRecord): string {
  return `${JSON.stringify(record)}\n`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Append-only JSON-lines journal. Each operation is one line written with a
 * single append and flushed with `datasync` before the promise resolves.
 */
export class FileNotificationStore implements NotificationStore {
  private readonly lock = new AsyncLock();
  private directoryReady = false;
  /** Set when the journal may end in a torn line without a newline. */
  private tailNeedsRepair = false;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  append(notification: Notification): Promise<void> {
    return this.write("append", { op: "append", notification });
  }

  update(notification: Notification): Promise<void> {
    return this.write("update", {
      op: "update",
      id: notification.id,
      attempts: notification.attempts,
      nextEligibleAt: notification.nextEligibleAt,
    });
  }

  remove(id: string): Promise<void> {
    return this.write("remove", { op: "remove", id });
  }

  loadAll(): Promise<Notification[]> {
    return this.lock.runExclusive(async () => {
      const content = await this.readJournal("load");
      if (content === null) {
        logger.info("No notification journal found", { path: this.filePath });
        return [];
      }

      this.tailNeedsRepair = content.length > 0 && !content.endsWith("\n");
      const replay = replayJournal(content);

      if (replay.skippedLines.length > 0) {
        logger.warn("Skipped unreadable notification journal lines", {
          path: this.filePath,
          lines: replay.skippedLines,
        });
      }

      logger.info("Loaded pending notifications from journal", {
        path: this.filePath,
        pending: replay.notifications.length,
        journalLines: replay.totalLines,
      });

      return replay.notifications;
    });
  }

  /** Rewrites the journal as one append per live record (temp file + rename). */
  compact(): Promise<CompactionResult> {
    return this.lock.runExclusive(async () => {
      const content = await this.readJournal("compact");
      if (content === null) {
        return { kept: 0, discardedLines: 0 };
      }

      const replay = replayJournal(content);
      const tempPath = `${this.filePath}.${process.pid}.tmp`;
      const body = replay.notifications.map((notification) => serialize({ op: "append", notification })).join("");

      try {
        const handle = await open(tempPath, "w");
        try {
          await handle.writeFile(body, "utf8");
          await handle.datasync();
        } finally {
          await handle.close();
        }
        await rename(tempPath, this.filePath);
      } catch (error) {
        await unlink(tempPath).catch((cleanupError: unknown) => {
          if (!isMissingFile(cleanupError)) {
            logger.warn("Failed to remove temporary journal file", { path: tempPath, cleanupError });
          }
        });
        throw new StoreUnavailableError("compact", error);
      }

      this.tailNeedsRepair = false;
      return { kept: replay.notifications.length, discardedLines: replay.totalLines - replay.notifications.length };
    });
  }

  private write(operation: StoreOperation, record: JournalRecord): Promise<void> {
    return this.lock.runExclusive(async () => {
      const line = serialize(record);

      try {
        await this.ensureDirectory();
        const handle = await open(this.filePath, "a");
        try {
          await handle.appendFile(this.tailNeedsRepair ? `\n${line}` : line, "utf8");
          await handle.datasync();
        } finally {
          await handle.close();
        }
        this.tailNeedsRepair = false;
      } catch (error) {
        this.tailNeedsRepair = true;
        throw new StoreUnavailableError(operation, error);
      }
    });
  }

  private async readJournal(operation: StoreOperation): Promise<string | null> {
    try {
      return await readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new StoreUnavailableError(operation, error);
    }
  }

  private async ensureDirectory() {
    if (this.directoryReady) {
      return;
    }

    await mkdir(dirname(this.filePath), { recursive: true });
    this.directoryReady = true;
  }
}
