import bigInt from "big-integer";
import { TelegramClient } from "telegram";
import type { EntityLike } from "telegram/define";
import { StringSession } from "telegram/sessions";

import { delivered, permanentFailure, transientFailure } from "@/queue/deliveryResult";
import { truncate, type NotificationTransport } from "@/services/transport/transport";
import type { DeliveryResult } from "@/types/delivery";
import type { NotificationPayload } from "@/types/notification";
import { logger } from "@/utils/logger";

const MAX_MESSAGE_LENGTH = 4096;
const MAX_BODY_LENGTH = 3000;
const MAX_TITLE_LENGTH = 256;
const MAX_FIELDS = 10;
const MAX_FIELD_NAME_LENGTH = 64;
const MAX_FIELD_VALUE_LENGTH = 256;
const MAX_FOOTER_LENGTH = 256;
const LINK_TEXT = "Open in browser";
const DEFAULT_FLOOD_WAIT_SECONDS = 30;

// RPC errors that retrying the same message cannot fix.
const PERMANENT_ERRORS = [
  "PEER_ID_INVALID",
  "CHAT_WRITE_FORBIDDEN",
  "CHANNEL_PRIVATE",
  "CHAT_ADMIN_REQUIRED",
  "USER_IS_BOT",
  "MESSAGE_TOO_LONG",
  "ENTITY_BOUNDS_INVALID",
] as const;

/** The part of gramjs' client the transport needs. */
export interface TelegramMessageSender {
  sendMessage(
    entity: EntityLike,
    params: { message: string; parseMode: "html"; linkPreview: boolean },
  ): Promise<unknown>;
}

export interface TelegramTransportOptions {
  apiId: number;
  apiHash: string;
  botToken: string;
  chatId: string;
  session?: string;
}

function readErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    if ("errorMessage" in error && typeof error.errorMessage === "string") {
      return `${error.errorMessage} ${error.message}`;
    }
    return error.message;
  }
  return String(error);
}

function readFloodWaitSeconds(error: unknown, message: string): number {
  if (error instanceof Error && "seconds" in error && typeof error.seconds === "number") {
    return error.seconds;
  }

  const match = message.match(/FLOOD_WAIT_(\d+)/) ?? message.match(/wait of (\d+) seconds/i);
  return match ? Number.parseInt(match[1], 10) : DEFAULT_FLOOD_WAIT_SECONDS;
}

/** Maps a gramjs RPC error onto the retry taxonomy. */
export function classifyTelegramError(error: unknown): DeliveryResult {
  const message = readErrorMessage(error);

  if (message.includes("FLOOD")) {
    const seconds = readFloodWaitSeconds(error, message);
    return transientFailure(`Telegram flood wait of ${seconds}s`, seconds * 1000);
  }

  const type = PERMANENT_ERRORS.find((candidate) => message.includes(candidate));
  if (type) {
    return permanentFailure(`Telegram rejected the message: ${type}`);
  }

  return transientFailure(`Telegram send failed: ${message}`);
}

function escapeHtml(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

/** Renders a payload with the HTML subset Telegram accepts. */
/**
 * Telegram counts the 4096-character limit on the text left after HTML parsing,
 * so parts are cut before escaping and the body gets what the other parts leave.
 */
export function renderTelegramHtml(payload: NotificationPayload): string {
  const title = truncate(payload.title, MAX_TITLE_LENGTH);
  const fields = (payload.fields ?? []).slice(0, MAX_FIELDS).map((field) => ({
    name: truncate(field.name, MAX_FIELD_NAME_LENGTH),
    value: truncate(field.value, MAX_FIELD_VALUE_LENGTH),
  }));
  const footer = payload.footer ? truncate(payload.footer, MAX_FOOTER_LENGTH) : undefined;

  const tail: Array<{ html: string; visible: number }> = fields.map((field) => ({
    html: `<b>${escapeHtml(field.name)}:</b> ${escapeHtml(field.value)}`,
    visible: field.name.length + 2 + field.value.length,
  }));

  if (payload.url) {
    tail.push({ html: `<a href="${escapeHtml(payload.url)}">${LINK_TEXT}</a>`, visible: LINK_TEXT.length });
  }

  if (footer) {
    tail.push({ html: `<i>${escapeHtml(footer)}</i>`, visible: footer.length });
  }

  // One newline between every pair of lines.
  const reserved = tail.reduce((total, line) => total + line.visible + 1, title.length + 1);
  const body = truncate(payload.body, Math.max(1, Math.min(MAX_BODY_LENGTH, MAX_MESSAGE_LENGTH - reserved)));

  return [`<b>${escapeHtml(title)}</b>`, escapeHtml(body), ...tail.map((line) => line.html)].join("\n");
}

/** Numeric ids (including `-100…` channel ids) become marked peer ids; anything else is a username. */
export function resolvePeer(chatId: string): EntityLike {
  return /^-?\d+$/.test(chatId) ? bigInt(chatId) : chatId;
}

/** Sends notifications as a Telegram bot through an MTProto client. */
export class TelegramTransport implements NotificationTransport {
  readonly name = "telegram";

  private client: TelegramClient | null = null;
  private sender: TelegramMessageSender | null;

  constructor(
    private readonly options: TelegramTransportOptions,
    sender?: TelegramMessageSender,
  ) {
    this.sender = sender ?? null;
  }

  async connect(): Promise<void> {
    if (this.sender) {
      return;
    }

    const session = new StringSession(this.options.session ?? "");
    const client = new TelegramClient(session, this.options.apiId, this.options.apiHash, {
      connectionRetries: 5,
    });

    await client.start({ botAuthToken: this.options.botToken });
    this.client = client;
    this.sender = client;
    logger.info("Telegram transport connected", { chatId: this.options.chatId });
  }

  async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }

    await this.client.disconnect();
    this.client = null;
    this.sender = null;
    logger.info("Telegram transport disconnected");
  }

  async send(payload: NotificationPayload, signal: AbortSignal): Promise<DeliveryResult> {
    const sender = this.sender;
    if (!sender) {
      return transientFailure("Telegram client is not connected");
    }

    if (signal.aborted) {
      return transientFailure("Telegram send aborted before start");
    }

    try {
      await sender.sendMessage(resolvePeer(this.options.chatId), {
        message: renderTelegramHtml(payload),
        parseMode: "html",
        linkPreview: false,
      });
      return delivered();
    } catch (error) {
      const result = classifyTelegramError(error);
      logger.debug("Telegram send failed", { chatId: this.options.chatId, result });
      return result;
    }
  }
}
