import { describe, expect, it, vi } from "vitest";

import {
  classifyTelegramError,
  renderTelegramHtml,
  resolvePeer,
  TelegramTransport,
  type TelegramMessageSender,
} from "./telegram.transport";

class FakeRpcError extends Error {
  constructor(
    public readonly errorMessage: string,
    message: string,
    public readonly seconds?: number,
  ) {
    super(message);
  }
}

const options = {
  apiId: 12345,
  apiHash: "test-hash",
  botToken: "test-token",
  chatId: "-1001234567890",
};

describe("classifyTelegramError", () => {
  it("should honour the flood wait carried by the error", () => {
    expect(classifyTelegramError(new FakeRpcError("FLOOD", "A wait is required", 12))).toEqual({
      ok: false,
      failure: { kind: "transient", detail: "Telegram flood wait of 12s", retryAfterMs: 12_000 },
    });
  });

  it("should read the flood wait from the message", () => {
    expect(classifyTelegramError(new Error("FLOOD_WAIT_7 (caused by messages.SendMessage)"))).toEqual({
      ok: false,
      failure: { kind: "transient", detail: "Telegram flood wait of 7s", retryAfterMs: 7_000 },
    });
  });

  it("should treat a forbidden chat as permanent", () => {
    expect(classifyTelegramError(new Error("400: CHAT_WRITE_FORBIDDEN (caused by messages.SendMessage)"))).toEqual({
      ok: false,
      failure: { kind: "permanent", detail: "Telegram rejected the message: CHAT_WRITE_FORBIDDEN" },
    });
  });

  it("should treat anything else as transient", () => {
    expect(classifyTelegramError(new Error("Timeout"))).toEqual({
      ok: false,
      failure: { kind: "transient", detail: "Telegram send failed: Timeout" },
    });
    expect(classifyTelegramError("connection lost")).toEqual({
      ok: false,
      failure: { kind: "transient", detail: "Telegram send failed: connection lost" },
    });
  });
});

describe("renderTelegramHtml", () => {
  it("should escape every part of the payload", () => {
    const html = renderTelegramHtml({
      title: "A <b>",
      body: "x & y",
      fields: [{ name: "Team", value: "r00t" }],
      url: "https://ctf.example.test/?a=1&b=2",
      footer: "Match 3",
    });

    expect(html).toBe(
      [
        "<b>A &lt;b&gt;</b>",
        "x &amp; y",
        "<b>Team:</b> r00t",
        '<a href="https://ctf.example.test/?a=1&amp;b=2">Open in browser</a>',
        "<i>Match 3</i>",
      ].join("\n"),
    );
  });

  it("should truncate the title before escaping it", () => {
    const html = renderTelegramHtml({ title: "&".repeat(300), body: "b" });

    expect(html.split("\n")[0]).toBe(`<b>${"&amp;".repeat(255)}…</b>`);
  });

  it("should shorten the body so the closing lines stay intact", () => {
    const html = renderTelegramHtml({
      title: "T",
      body: "x".repeat(10_000),
      fields: Array.from({ length: 12 }, () => ({ name: "n", value: "v".repeat(300) })),
      url: "https://ctf.example.test/notices",
      footer: "Match 3",
    });
    const lines = html.split("\n");

    expect(lines).toHaveLength(14);
    expect(lines[1]).toBe(`${"x".repeat(1469)}…`);
    expect(lines[2]).toBe(`<b>n:</b> ${"v".repeat(255)}…`);
    expect(lines.slice(-2)).toEqual(['<a href="https://ctf.example.test/notices">Open in browser</a>', "<i>Match 3</i>"]);
  });
});

describe("resolvePeer", () => {
  it("should turn numeric chat ids into big integers", () => {
    expect(String(resolvePeer("-1001234567890"))).toBe("-1001234567890");
    expect(typeof resolvePeer("-1001234567890")).toBe("object");
  });

  it("should pass usernames through", () => {
    expect(resolvePeer("@ctf_notices")).toBe("@ctf_notices");
  });
});

describe("TelegramTransport", () => {
  it("should send the rendered message through the client", async () => {
    const sendMessage = vi.fn<TelegramMessageSender["sendMessage"]>().mockResolvedValue({});
    const transport = new TelegramTransport({ ...options, chatId: "@ctf_notices" }, { sendMessage });
    await transport.connect();

    const result = await transport.send({ title: "New Hint", body: "check it" }, new AbortController().signal);

    expect(result).toEqual({ ok: true });
    expect(sendMessage).toHaveBeenCalledWith("@ctf_notices", {
      message: "<b>New Hint</b>\ncheck it",
      parseMode: "html",
      linkPreview: false,
    });
  });

  it("should classify a failed send", async () => {
    const sendMessage = vi
      .fn<TelegramMessageSender["sendMessage"]>()
      .mockRejectedValue(new Error("CHAT_ADMIN_REQUIRED (caused by messages.SendMessage)"));
    const transport = new TelegramTransport(options, { sendMessage });

    await expect(transport.send({ title: "t", body: "b" }, new AbortController().signal)).resolves.toEqual({
      ok: false,
      failure: { kind: "permanent", detail: "Telegram rejected the message: CHAT_ADMIN_REQUIRED" },
    });
  });

  it("should report a transient failure before connecting", async () => {
    const transport = new TelegramTransport(options);

    await expect(transport.send({ title: "t", body: "b" }, new AbortController().signal)).resolves.toEqual({
      ok: false,
      failure: { kind: "transient", detail: "Telegram client is not connected" },
    });
  });

  it("should not start a send whose signal already aborted", async () => {
    const sendMessage = vi.fn<TelegramMessageSender["sendMessage"]>();
    const transport = new TelegramTransport(options, { sendMessage });
    const controller = new AbortController();
    controller.abort();

    await expect(transport.send({ title: "t", body: "b" }, controller.signal)).resolves.toEqual({
      ok: false,
      failure: { kind: "transient", detail: "Telegram send aborted before start" },
    });
    expect(sendMessage).not.toHaveBeenCalled();
  });
});
