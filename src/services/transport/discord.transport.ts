import { z } from "zod";

import { delivered, permanentFailure, transientFailure } from "@/queue/deliveryResult";
import { truncate, type NotificationTransport } from "@/services/transport/transport";
import type { DeliveryResult } from "@/types/delivery";
import type { NotificationPayload } from "@/types/notification";
import { describeErrorCause } from "@/utils/errors";
import { logger } from "@/utils/logger";

const DISCORD_API_BASE = "https://discord.com/api/v10";

// Embed limits from the Discord API reference.
const MAX_TITLE_LENGTH = 256;
const MAX_DESCRIPTION_LENGTH = 4096;
const MAX_FIELD_NAME_LENGTH = 256;
const MAX_FIELD_VALUE_LENGTH = 1024;
const MAX_FIELDS = 25;
const MAX_FOOTER_LENGTH = 2048;

const rateLimitBodySchema = z.object({
  retry_after: z.number().nonnegative(),
  global: z.boolean().optional(),
});

export interface DiscordEmbed {
  title: string;
  description: string;
  url?: string;
  color?: number;
  timestamp?: string;
  footer?: { text: string };
  fields?: Array<{ name: string; value: string; inline?: boolean }>;
}

export interface DiscordTransportOptions {
  botToken: string;
  channelId: string;
  apiBaseUrl?: string;
  fetchImpl?: typeof fetch;
}

export function toDiscordEmbed(payload: NotificationPayload): DiscordEmbed {
  const embed: DiscordEmbed = {
    title: truncate(payload.title, MAX_TITLE_LENGTH),
    description: truncate(payload.body, MAX_DESCRIPTION_LENGTH),
  };

  if (payload.url) embed.url = payload.url;
  if (payload.color !== undefined) embed.color = payload.color;
  if (payload.timestamp) embed.timestamp = payload.timestamp;
  if (payload.footer) embed.footer = { text: truncate(payload.footer, MAX_FOOTER_LENGTH) };

  if (payload.fields && payload.fields.length > 0) {
    embed.fields = payload.fields.slice(0, MAX_FIELDS).map((field) => ({
      name: truncate(field.name, MAX_FIELD_NAME_LENGTH),
      value: truncate(field.value, MAX_FIELD_VALUE_LENGTH),
      inline: field.inline ?? false,
    }));
  }

  return embed;
}

function readRetryAfterBody(body: string): number | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return undefined;
  }

  const parsed = rateLimitBodySchema.safeParse(raw);
  return parsed.success ? Math.ceil(parsed.data.retry_after * 1000) : undefined;
}

function parseRetryAfterMs(body: string, retryAfterHeader: string | null): number | undefined {
  const fromBody = readRetryAfterBody(body);
  if (fromBody !== undefined) {
    return fromBody;
  }

  const seconds = retryAfterHeader === null ? Number.NaN : Number.parseFloat(retryAfterHeader);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.ceil(seconds * 1000) : undefined;
}

/** Maps a non-2xx Discord response onto the retry taxonomy. */
export function classifyDiscordResponse(status: number, body: string, retryAfterHeader: string | null): DeliveryResult {
  if (status === 429) {
    return transientFailure("Discord rate limit reached", parseRetryAfterMs(body, retryAfterHeader));
  }

  if (status === 408 || status >= 500) {
    return transientFailure(`Discord responded with HTTP ${status}`);
  }

  return permanentFailure(`Discord rejected the message with HTTP ${status}: ${truncate(body, 200)}`);
}

/** Posts one embed per notification to a guild text channel through the REST API. */
export class DiscordTransport implements NotificationTransport {
  readonly name = "discord";

  private readonly apiBaseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: DiscordTransportOptions) {
    this.apiBaseUrl = options.apiBaseUrl ?? DISCORD_API_BASE;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async connect(): Promise<void> {
    logger.info("Discord transport ready", { channelId: this.options.channelId });
  }

  async disconnect(): Promise<void> {
    logger.debug("Discord transport closed", { channelId: this.options.channelId });
  }

  async send(payload: NotificationPayload, signal: AbortSignal): Promise<DeliveryResult> {
    let response: Response;

    try {
      response = await this.fetchImpl(`${this.apiBaseUrl}/channels/${this.options.channelId}/messages`, {
        method: "POST",
        headers: {
          Authorization: `Bot ${this.options.botToken}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ embeds: [toDiscordEmbed(payload)] }),
        signal,
      });
    } catch (error) {
      return transientFailure(`Discord request failed: ${describeErrorCause(error)}`);
    }

    if (response.ok) {
      try {
        await response.body?.cancel();
      } catch (error) {
        logger.debug("Failed to discard Discord response body", { status: response.status, error });
      }
      return delivered();
    }

    let body = "";
    try {
      body = await response.text();
    } catch (error) {
      logger.debug("Failed to read Discord error body", { status: response.status, error });
    }

    return classifyDiscordResponse(response.status, body, response.headers.get("retry-after"));
  }
}
