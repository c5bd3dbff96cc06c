import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as dotenvConfig } from "dotenv";
import {
  BRIDGE_SETTINGS_FILE_NAME,
  type BridgeSettings,
  DEFAULT_BATCH_DELAY_SECONDS,
  DEFAULT_DISCORD_MAX_CHARS,
  DEFAULT_INTER_REQUEST_DELAY_SECONDS,
  DEFAULT_MAX_BATCH_SIZE,
  DEFAULT_MAX_QUEUE_SIZE,
  DEFAULT_MAX_REQUESTS_PER_CYCLE,
  DEFAULT_MAX_RETRY_BACKLOG,
  DEFAULT_SAFE_BATCH_CHARS,
  DEFAULT_STATS_LOG_INTERVAL_SECONDS,
  parseBridgeSettings,
} from "../core/bridge-settings";
import { DEFAULT_DISPLAY_OPTIONS, type DisplayOptions } from "../core/message-format";

// src/adapters -> src -> project root
const PROJECT_ROOT = fileURLToPath(new URL("../..", import.meta.url));
const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

// Load .env from project root
dotenvConfig({ path: path.join(PROJECT_ROOT, ".env") });

const WEBHOOK_URL_PATTERN =
  /^https:\/\/(?:(?:canary|ptb)\.)?discord(?:app)?\.com\/api\/(?:v\d+\/)?webhooks\/\d+\/[\w-]+\/?$/;

export interface Config {
  webhookUrl: string;
  projectRoot: string;
  settingsFile: string;
  port: number;
  botName: string;
  botAvatarUrl: string | null;
  batchDelayMs: number;
  maxBatchSize: number;
  interRequestDelayMs: number;
  maxRequestsPerCycle: number;
  maxQueueSize: number;
  maxRetryBacklog: number;
  safeBatchChars: number;
  discordMaxChars: number;
  requestTimeoutMs: number;
  statsLogIntervalSeconds: number;
  maxEventAgeMs: number;
  allowedChannels: string[];
  display: DisplayOptions;
}

export function loadConfig(): Config {
  const webhookUrl = process.env.DISCORD_WEBHOOK_URL?.trim();
  if (!webhookUrl) {
    throw new Error("DISCORD_WEBHOOK_URL is not set in .env");
  }
  if (!WEBHOOK_URL_PATTERN.test(webhookUrl)) {
    throw new Error("DISCORD_WEBHOOK_URL is not a Discord webhook URL");
  }

  const settingsFile = process.env.BRIDGE_SETTINGS_FILE
    ? path.resolve(PROJECT_ROOT, process.env.BRIDGE_SETTINGS_FILE)
    : path.join(PROJECT_ROOT, BRIDGE_SETTINGS_FILE_NAME);

  return {
    webhookUrl,
    projectRoot: PROJECT_ROOT,
    settingsFile,
    port: 3000,
    botName: "Chat Bridge",
    botAvatarUrl: null,
    batchDelayMs: DEFAULT_BATCH_DELAY_SECONDS * 1000,
    maxBatchSize: DEFAULT_MAX_BATCH_SIZE,
    interRequestDelayMs: DEFAULT_INTER_REQUEST_DELAY_SECONDS * 1000,
    maxRequestsPerCycle: DEFAULT_MAX_REQUESTS_PER_CYCLE,
    maxQueueSize: DEFAULT_MAX_QUEUE_SIZE,
    maxRetryBacklog: DEFAULT_MAX_RETRY_BACKLOG,
    safeBatchChars: DEFAULT_SAFE_BATCH_CHARS,
    discordMaxChars: DEFAULT_DISCORD_MAX_CHARS,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    statsLogIntervalSeconds: DEFAULT_STATS_LOG_INTERVAL_SECONDS,
    maxEventAgeMs: 0,
    allowedChannels: [],
    display: { ...DEFAULT_DISPLAY_OPTIONS },
  };
}

export async function loadBridgeSettings(config: Config): Promise<BridgeSettings> {
  const content = await readFile(config.settingsFile, "utf-8");
  return parseBridgeSettings(content);
}

export function applyBridgeSettingsToConfig(config: Config, settings: BridgeSettings): void {
  config.port = settings.port;
  config.botName = settings.bot_name;
  config.botAvatarUrl = settings.bot_avatar_url ?? null;
  config.batchDelayMs = Math.round(settings.batch_delay_seconds * 1000);
  config.maxBatchSize = settings.max_batch_size;
  config.interRequestDelayMs = Math.round(settings.inter_request_delay_seconds * 1000);
  config.maxRequestsPerCycle = settings.max_requests_per_cycle;
  config.maxQueueSize = settings.max_queue_size;
  config.maxRetryBacklog = settings.max_retry_backlog;
  config.safeBatchChars = settings.safe_batch_chars;
  config.discordMaxChars = settings.discord_max_chars;
  config.requestTimeoutMs = settings.request_timeout_seconds * 1000;
  config.statsLogIntervalSeconds = settings.stats_log_interval_seconds;
  config.maxEventAgeMs = settings.max_event_age_seconds * 1000;
  config.allowedChannels = settings.allowed_channels;
  config.display = {
    timestampFormat: settings.display.timestamp_format,
    showCharacterName: settings.display.show_character_name,
    showRadius: settings.display.show_radius,
    showLocation: settings.display.show_location,
    showChannel: settings.display.show_channel,
  };
}
