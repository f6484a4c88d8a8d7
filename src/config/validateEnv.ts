import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).optional(),
  CHAT_PLATFORM: z.enum(["discord", "telegram"]).default("discord"),
  DISCORD_BOT_TOKEN: z.string().optional(),
  DISCORD_CHANNEL_ID: z.string().regex(/^\d+$/, "must be a numeric channel id").optional(),
  TELEGRAM_API_ID: z.coerce.number().int().positive().optional(),
  TELEGRAM_API_HASH: z.string().optional(),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  TELEGRAM_SESSION: z.string().default(""),
  GZCTF_URL: z.string().url().optional(),
  GZCTF_MATCHES: z.string().default(""),
  POLL_INTERVAL_SECONDS: z.coerce.number().int().positive().default(30),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  MAX_DELIVERY_ATTEMPTS: z.coerce.number().int().min(1).default(5),
  BACKOFF_BASE_MS: z.coerce.number().int().positive().default(2_000),
  BACKOFF_FACTOR: z.coerce.number().min(1).default(2),
  BACKOFF_MAX_MS: z.coerce.number().int().positive().default(300_000),
  TRANSPORT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  WORKER_IDLE_TICK_MS: z.coerce.number().int().positive().default(1_000),
  STORE_PATH: z.string().min(1).default("data/pending-notifications.jsonl"),
  STORE_COMPACTION_CRON: z.string().default("0 * * * *"),
  STATUS_SERVER_ENABLED: booleanFlag.default("true"),
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().default(3000),
});

export type EnvSchema = z.infer<typeof envSchema>;

export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvSchema {
  return envSchema.parse(env);
}
