import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { StoreUnavailableError } from "@/utils/errors";
import { createNotification } from "./notification";
import { FileNotificationStore, replayJournal } from "./persistentStore";

const payload = (title: string) => ({ title, body: `${title} body` });

describe("replayJournal", () => {
  it("should apply appends, updates and removals in order", () => {
    const first = createNotification(payload("first"), 1);
    const second = createNotification(payload("second"), 2);
    const content = [
      JSON.stringify({ op: "append", notification: first }),
      JSON.stringify({ op: "append", notification: second }),
      JSON.stringify({ op: "update", id: first.id, attempts: 2, nextEligibleAt: 50 }),
      JSON.stringify({ op: "remove", id: second.id }),
      "",
    ].join("\n");

    const replay = replayJournal(content);

    expect(replay.notifications).toEqual([{ ...first, attempts: 2, nextEligibleAt: 50 }]);
    expect(replay.totalLines).toBe(4);
    expect(replay.skippedLines).toEqual([]);
  });

  it("should skip unreadable lines and report their line numbers", () => {
    const kept = createNotification(payload("kept"), 1);
    const content = [
      "{not json",
      JSON.stringify({ op: "append", notification: kept }),
      JSON.stringify({ op: "rename", id: kept.id }),
      '{"op":"append","notification":{"id":"x"',
    ].join("\n");

    const replay = replayJournal(content);

    expect(replay.notifications).toEqual([kept]);
    expect(replay.skippedLines).toEqual([1, 3, 4]);
  });

  it("should ignore repeated appends and operations on unknown ids", () => {
    const notification = createNotification(payload("once"), 1);
    const content = [
      JSON.stringify({ op: "append", notification }),
      JSON.stringify({ op: "append", notification: { ...notification, attempts: 3 } }),
      JSON.stringify({ op: "update", id: "missing", attempts: 1, nextEligibleAt: 1 }),
      JSON.stringify({ op: "remove", id: "missing" }),
    ].join("\n");

    expect(replayJournal(content).notifications).toEqual([notification]);
  });
});

describe("FileNotificationStore", () => {
  let directory: string;
  let journalPath: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "notice-store-"));
    journalPath = join(directory, "nested", "pending.jsonl");
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("should return nothing when the journal does not exist", async () => {
    const store = new FileNotificationStore(journalPath);

    await expect(store.loadAll()).resolves.toEqual([]);
  });

  it("should return a persisted notification exactly once after a restart", async () => {
    const notification = createNotification(payload("round started"), 1_000);
    await new FileNotificationStore(journalPath).append(notification);

    const restored = await new FileNotificationStore(journalPath).loadAll();

    expect(restored).toEqual([notification]);
  });

  it("should not return a removed notification after a restart", async () => {
    const store = new FileNotificationStore(journalPath);
    const notification = createNotification(payload("delivered"), 1_000);
    await store.append(notification);
    await store.remove(notification.id);

    await expect(new FileNotificationStore(journalPath).loadAll()).resolves.toEqual([]);
  });

  it("should keep insertion order when records are updated", async () => {
    const store = new FileNotificationStore(journalPath);
    const first = createNotification(payload("first"), 1);
    const second = createNotification(payload("second"), 2);
    await store.append(first);
    await store.append(second);
    await store.update({ ...first, attempts: 1, nextEligibleAt: 2_001 });

    const restored = await new FileNotificationStore(journalPath).loadAll();

    expect(restored.map((notification) => notification.id)).toEqual([first.id, second.id]);
    expect(restored[0]).toMatchObject({ attempts: 1, nextEligibleAt: 2_001 });
  });

  it("should start a fresh line after a torn tail", async () => {
    const survivor = createNotification(payload("survivor"), 1);
    const next = createNotification(payload("next"), 2);
    await new FileNotificationStore(journalPath).append(survivor);
    const intact = await readFile(journalPath, "utf8");
    await writeFile(journalPath, `${intact}{"op":"append","notif`, "utf8");

    const store = new FileNotificationStore(journalPath);
    await expect(store.loadAll()).resolves.toEqual([survivor]);
    await store.append(next);

    const restored = await new FileNotificationStore(journalPath).loadAll();
    expect(restored).toEqual([survivor, next]);
  });

  it("should compact the journal to one line per live record", async () => {
    const store = new FileNotificationStore(journalPath);
    const kept = createNotification(payload("kept"), 1);
    const removed = createNotification(payload("removed"), 2);
    await store.append(kept);
    await store.append(removed);
    await store.update({ ...kept, attempts: 2, nextEligibleAt: 9_000 });
    await store.remove(removed.id);

    const result = await store.compact();

    expect(result).toEqual({ kept: 1, discardedLines: 3 });
    const lines = (await readFile(journalPath, "utf8")).split("\n").filter((line) => line.length > 0);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual({ op: "append", notification: { ...kept, attempts: 2, nextEligibleAt: 9_000 } });
  });

  it("should report nothing to compact when the journal is missing", async () => {
    await expect(new FileNotificationStore(journalPath).compact()).resolves.toEqual({ kept: 0, discardedLines: 0 });
  });

  it("should reject with StoreUnavailableError when the journal cannot be written", async () => {
    const store = new FileNotificationStore(directory);

    const error = await store.append(createNotification(payload("lost"), 1)).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({ operation: "append", code: "STORE_UNAVAILABLE" });
  });
});
