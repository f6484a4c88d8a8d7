import { validateEnv } from "@/config/validateEnv";
import { ConfigurationError } from "@/utils/errors";

export interface MatchConfig {
  id: number;
  name?: string;
}

/**
 * Parses the `GZCTF_MATCHES` list. Entries are comma separated and take the
 * form `id` or `id:display name`.
 */
export function parseMatches(value: string): MatchConfig[] {
  const matches: MatchConfig[] = [];

  for (const rawEntry of value.split(",")) {
    const entry = rawEntry.trim();
    if (entry.length === 0) continue;

    const separator = entry.indexOf(":");
    const rawId = separator >= 0 ? entry.slice(0, separator).trim() : entry;
    const name = separator >= 0 ? entry.slice(separator + 1).trim() : "";

    if (!/^\d+$/.test(rawId)) {
      throw new ConfigurationError(`Invalid match id "${rawId}" in GZCTF_MATCHES`, { entry });
    }

    const id = Number.parseInt(rawId, 10);
    if (matches.some((match) => match.id === id)) {
      continue;
    }

    matches.push(name.length > 0 ? { id, name } : { id });
  }

  return matches;
}

const rawEnv = validateEnv();

const defaultLogLevel = rawEnv.NODE_ENV === "production" ? "info" : "debug";

export const config = {
  nodeEnv: rawEnv.NODE_ENV,
  logLevel: rawEnv.LOG_LEVEL ?? defaultLogLevel,
  server: {
    enabled: rawEnv.STATUS_SERVER_ENABLED,
    host: rawEnv.HOST,
    port: rawEnv.PORT,
    requestIdHeader: "x-request-id",
  },
  gzctf: {
    url: rawEnv.GZCTF_URL,
    matches: parseMatches(rawEnv.GZCTF_MATCHES),
    pollIntervalMs: rawEnv.POLL_INTERVAL_SECONDS * 1000,
    timeoutMs: rawEnv.UPSTREAM_TIMEOUT_MS,
  },
  queue: {
    storePath: rawEnv.STORE_PATH,
    maxAttempts: rawEnv.MAX_DELIVERY_ATTEMPTS,
    backoff: {
      baseMs: rawEnv.BACKOFF_BASE_MS,
      factor: rawEnv.BACKOFF_FACTOR,
      maxMs: rawEnv.BACKOFF_MAX_MS,
    },
    transportTimeoutMs: rawEnv.TRANSPORT_TIMEOUT_MS,
    idleTickMs: rawEnv.WORKER_IDLE_TICK_MS,
    compactionSchedule: rawEnv.STORE_COMPACTION_CRON,
  },
  chat: {
    platform: rawEnv.CHAT_PLATFORM,
    discord: {
      botToken: rawEnv.DISCORD_BOT_TOKEN,
      channelId: rawEnv.DISCORD_CHANNEL_ID,
    },
    telegram: {
      apiId: rawEnv.TELEGRAM_API_ID,
      apiHash: rawEnv.TELEGRAM_API_HASH,
      botToken: rawEnv.TELEGRAM_BOT_TOKEN,
      chatId: rawEnv.TELEGRAM_CHAT_ID,
      session: rawEnv.TELEGRAM_SESSION,
    },
  },
} as const;

export type AppConfig = typeof config;
export type ChatConfig = AppConfig["chat"];
