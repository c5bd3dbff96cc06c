import { z } from "zod";
import { TIMESTAMP_FORMATS } from "./message-format";

export const BRIDGE_SETTINGS_FILE_NAME = "settings.bridge.json";
export const DEFAULT_BATCH_DELAY_SECONDS = 2.5;
export const DEFAULT_MAX_BATCH_SIZE = 20;
export const DEFAULT_INTER_REQUEST_DELAY_SECONDS = 0.5;
export const DEFAULT_MAX_REQUESTS_PER_CYCLE = 1;
export const DEFAULT_MAX_QUEUE_SIZE = 500;
export const DEFAULT_MAX_RETRY_BACKLOG = 200;
export const DEFAULT_SAFE_BATCH_CHARS = 1900;
export const DEFAULT_DISCORD_MAX_CHARS = 2000;
export const DEFAULT_STATS_LOG_INTERVAL_SECONDS = 300;

const displaySchema = z
  .object({
    timestamp_format: z.enum(TIMESTAMP_FORMATS).default("T"),
    show_character_name: z.boolean().default(true),
    show_radius: z.boolean().default(true),
    show_location: z.boolean().default(false),
    show_channel: z.boolean().default(true),
  })
  .strict();

const bridgeSettingsSchema = z
  .object({
    port: z.number().int().min(1).max(65_535).default(3000),
    bot_name: z.string().min(1).max(80).default("Chat Bridge"),
    bot_avatar_url: z.string().url().optional(),
    batch_delay_seconds: z.number().min(0.1).max(60).default(DEFAULT_BATCH_DELAY_SECONDS),
    max_batch_size: z.number().int().min(1).max(500).default(DEFAULT_MAX_BATCH_SIZE),
    inter_request_delay_seconds: z
      .number()
      .min(0)
      .max(10)
      .default(DEFAULT_INTER_REQUEST_DELAY_SECONDS),
    max_requests_per_cycle: z.number().int().min(0).max(50).default(DEFAULT_MAX_REQUESTS_PER_CYCLE),
    max_queue_size: z.number().int().min(1).max(100_000).default(DEFAULT_MAX_QUEUE_SIZE),
    max_retry_backlog: z.number().int().min(0).max(100_000).default(DEFAULT_MAX_RETRY_BACKLOG),
    safe_batch_chars: z.number().int().min(100).max(2000).default(DEFAULT_SAFE_BATCH_CHARS),
    discord_max_chars: z.number().int().min(100).max(2000).default(DEFAULT_DISCORD_MAX_CHARS),
    request_timeout_seconds: z.number().int().min(1).max(60).default(10),
    stats_log_interval_seconds: z
      .number()
      .int()
      .min(10)
      .max(86_400)
      .default(DEFAULT_STATS_LOG_INTERVAL_SECONDS),
    max_event_age_seconds: z.number().int().min(0).max(86_400).default(0),
    allowed_channels: z.array(z.string().min(1)).default([]),
    display: displaySchema.default({}),
  })
  .strict()
  .refine((settings) => settings.safe_batch_chars < settings.discord_max_chars, {
    message: "safe_batch_chars must be lower than discord_max_chars",
    path: ["safe_batch_chars"],
  });

export type BridgeSettings = z.infer<typeof bridgeSettingsSchema>;

export function parseBridgeSettings(input: string): BridgeSettings {
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(input);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${BRIDGE_SETTINGS_FILE_NAME}: ${message}`);
  }

  const result = bridgeSettingsSchema.safeParse(parsedJson);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid ${BRIDGE_SETTINGS_FILE_NAME}: ${details}`);
  }

  return result.data;
}
