import { buildStatusSnapshot, formatStatsSummary, type StatusSnapshot } from "../core/bridge-health";
import { BridgeStats } from "../core/bridge-stats";
import type { ChatEvent } from "../core/chat-events";
import { createDispatchWorker, type DispatchWorker } from "../core/dispatch-worker";
import { EventQueue } from "../core/event-queue";
import { createIntake, type Intake } from "../core/intake";
import { formatChatEvent } from "../core/message-format";
import { createWebhookSender, type WebhookTransport } from "../core/webhook-sender";
import type { Config } from "./config-adapter";
import { type StatsSummarySchedule, startStatsSummarySchedule } from "./scheduler-adapter";

type Logger = Pick<typeof console, "error" | "log" | "warn">;

export interface BridgeRuntimeInput {
  config: Config;
  transport: WebhookTransport;
  logger?: Logger;
}

export interface BridgeRuntime {
  intake: Intake;
  stats: BridgeStats;
  queue: EventQueue<ChatEvent>;
  worker: DispatchWorker;
  snapshot(): StatusSnapshot;
  start(): void;
  /** Resolves with the number of events abandoned on the way out. */
  stop(): Promise<number>;
}

export function createBridgeRuntime(input: BridgeRuntimeInput): BridgeRuntime {
  const { config } = input;
  const logger = input.logger ?? console;
  const stats = new BridgeStats();
  const queue = new EventQueue<ChatEvent>();

  const intake = createIntake({
    queue,
    stats,
    maxQueueSize: config.maxQueueSize,
    allowedChannels: config.allowedChannels,
    logger,
  });

  const sender = createWebhookSender({
    transport: input.transport,
    stats,
    hardCharLimit: config.discordMaxChars,
    logger,
  });

  const worker = createDispatchWorker({
    queue,
    stats,
    sender,
    format: (event) => formatChatEvent(event, config.display),
    batchDelayMs: config.batchDelayMs,
    maxBatchSize: config.maxBatchSize,
    interRequestDelayMs: config.interRequestDelayMs,
    maxRequestsPerCycle: config.maxRequestsPerCycle,
    maxRetryBacklog: config.maxRetryBacklog,
    safeCharLimit: config.safeBatchChars,
    hardCharLimit: config.discordMaxChars,
    maxEventAgeMs: config.maxEventAgeMs,
    logger,
  });

  let summarySchedule: StatsSummarySchedule | null = null;

  function snapshot(): StatusSnapshot {
    return buildStatusSnapshot(stats, queue.size(), config);
  }

  function start(): void {
    worker.start();
    if (!summarySchedule) {
      summarySchedule = startStatsSummarySchedule(
        config.statsLogIntervalSeconds,
        () => formatStatsSummary(stats, queue.size(), config.maxQueueSize),
        logger,
      );
    }
  }

  async function stop(): Promise<number> {
    summarySchedule?.stop();
    summarySchedule = null;
    const abandoned = await worker.stop();
    logger.log(formatStatsSummary(stats, queue.size(), config.maxQueueSize));
    return abandoned;
  }

  return {
    intake,
    stats,
    queue,
    worker,
    snapshot,
    start,
    stop,
  };
}
