import { planBatches } from "./batch-splitter";
import type { BridgeStats } from "./bridge-stats";
import type { Batch, ChatEvent } from "./chat-events";
import type { EventQueue } from "./event-queue";
import type { WebhookSender } from "./webhook-sender";

export const BACKOFF_POLL_CEILING_MS = 500;
export const IDLE_POLL_MS = 100;
export const CYCLE_ERROR_PAUSE_MS = 1000;

type Logger = Pick<typeof console, "error" | "log" | "warn">;

export type DispatchPhase = "idle" | "collecting" | "backoff" | "sending";

export interface DispatchWorkerState {
  running: boolean;
  phase: DispatchPhase;
  backoffUntil: number | null;
  backlogSize: number;
}

export interface DispatchWorkerOptions {
  queue: EventQueue<ChatEvent>;
  stats: BridgeStats;
  sender: WebhookSender;
  format: (event: ChatEvent) => string | null;
  batchDelayMs: number;
  maxBatchSize: number;
  interRequestDelayMs: number;
  /** 0 means no cap. */
  maxRequestsPerCycle: number;
  maxRetryBacklog: number;
  safeCharLimit: number;
  hardCharLimit: number;
  /** 0 disables the age cap. */
  maxEventAgeMs?: number;
  logger?: Logger;
}

export interface DispatchWorker {
  start(): void;
  /** Finishes the current cycle, then drops whatever is still pending. Resolves with that count. */
  stop(): Promise<number>;
  runCycle(): Promise<void>;
  getState(): DispatchWorkerState;
}

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createDispatchWorker(options: DispatchWorkerOptions): DispatchWorker {
  const logger = options.logger ?? console;
  const { queue, stats, sender } = options;
  const maxEventAgeMs = options.maxEventAgeMs ?? 0;

  let running = false;
  let loopPromise: Promise<void> | null = null;
  let phase: DispatchPhase = "idle";
  let backlog: ChatEvent[] = [];
  let backoffUntil: number | null = null;
  let lastRequestAt: number | null = null;
  const inFlight = new Set<ChatEvent>();

  function getState(): DispatchWorkerState {
    return {
      running,
      phase,
      backoffUntil,
      backlogSize: backlog.length,
    };
  }

  async function collect(): Promise<ChatEvent[]> {
    phase = "collecting";
    const events = backlog;
    backlog = [];

    const deadline = Date.now() + options.batchDelayMs;
    while (events.length < options.maxBatchSize) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        break;
      }
      const next = await queue.dequeue(remaining);
      if (next === null) {
        break;
      }
      events.push(next);
    }

    stats.updateQueuePeak(queue.size());
    return dropExpired(events);
  }

  function dropExpired(events: ChatEvent[]): ChatEvent[] {
    if (maxEventAgeMs <= 0) {
      return events;
    }
    const cutoff = Date.now() - maxEventAgeMs;
    const kept = events.filter((event) => event.receivedAt >= cutoff);
    const expired = events.length - kept.length;
    if (expired > 0) {
      stats.recordDropped(expired);
      logger.warn(`[dispatch] event=expired dropped=${expired} max_age_ms=${maxEventAgeMs}`);
    }
    return kept;
  }

  function trimBacklog(): void {
    const excess = backlog.length - options.maxRetryBacklog;
    if (excess <= 0) {
      return;
    }
    backlog = backlog.slice(excess);
    stats.recordDropped(excess);
    logger.warn(
      `[dispatch] event=backlog_overflow dropped=${excess} max=${options.maxRetryBacklog}`,
    );
  }

  function carryOver(events: ChatEvent[]): void {
    for (const event of events) {
      inFlight.delete(event);
    }
    backlog.push(...events);
  }

  function settle(batch: Batch): void {
    for (const event of batch.events) {
      inFlight.delete(event);
    }
  }

  async function paceRequest(): Promise<void> {
    if (lastRequestAt === null || options.interRequestDelayMs <= 0) {
      return;
    }
    const remaining = lastRequestAt + options.interRequestDelayMs - Date.now();
    if (remaining > 0) {
      await wait(remaining);
    }
  }

  function recordDelivered(batch: Batch, requestNumber: number): void {
    const now = Date.now();
    stats.recordSent(batch.events.length);
    for (const event of batch.events) {
      stats.recordLatency(now - event.receivedAt);
    }
    logger.log(
      `[dispatch] event=sent messages=${batch.events.length} request=${requestNumber} queue=${queue.size()}`,
    );
  }

  async function sendEvents(events: ChatEvent[]): Promise<void> {
    phase = "sending";
    const plan = planBatches(events, options.format, {
      safeCharLimit: options.safeCharLimit,
      hardCharLimit: options.hardCharLimit,
      maxRequestsPerCycle: options.maxRequestsPerCycle,
    });

    for (let index = 0; index < plan.batches.length; index += 1) {
      const batch = plan.batches[index];
      await paceRequest();
      const outcome = await sender.send(batch);
      lastRequestAt = Date.now();

      switch (outcome.kind) {
        case "success":
          settle(batch);
          recordDelivered(batch, index + 1);
          break;
        case "permanent_reject":
          settle(batch);
          stats.recordFailed(batch.events.length);
          logger.error(
            `[dispatch] event=abandoned messages=${batch.events.length} reason=${outcome.reason} status=${outcome.status ?? "none"}`,
          );
          break;
        case "rate_limited":
        case "transient_failure": {
          if (outcome.kind === "rate_limited") {
            stats.recordRateLimit(outcome.scope);
          } else {
            // Counted as a user-scope rate limit too, so it shows in health.
            stats.recordRateLimit("user");
            stats.recordTransientFailure();
          }
          const unsent = plan.batches.slice(index).flatMap((pending) => pending.events);
          carryOver([...unsent, ...plan.deferred]);
          backoffUntil = lastRequestAt + outcome.retryAfterMs;
          logger.warn(
            `[dispatch] event=backoff reason=${outcome.kind} resume_in_ms=${outcome.retryAfterMs} carried=${unsent.length + plan.deferred.length} queue=${queue.size()}`,
          );
          return;
        }
      }
    }

    if (plan.deferred.length > 0) {
      carryOver(plan.deferred);
      logger.log(
        `[dispatch] event=deferred messages=${plan.deferred.length} max_requests_per_cycle=${options.maxRequestsPerCycle}`,
      );
    }
  }

  async function runCycle(): Promise<void> {
    const events = await collect();
    for (const event of events) {
      inFlight.add(event);
    }

    const now = Date.now();
    if (backoffUntil !== null && now < backoffUntil) {
      phase = "backoff";
      carryOver(events);
      trimBacklog();
      await wait(Math.min(BACKOFF_POLL_CEILING_MS, backoffUntil - now));
      return;
    }
    backoffUntil = null;

    if (events.length > 0) {
      await sendEvents(events);
    }
    // Anything left here had nothing to render.
    inFlight.clear();
    trimBacklog();

    if (events.length === 0 && backlog.length === 0) {
      await wait(IDLE_POLL_MS);
    }
  }

  async function runLoop(): Promise<void> {
    while (running) {
      try {
        await runCycle();
      } catch (error) {
        if (inFlight.size > 0) {
          stats.recordFailed(inFlight.size);
          inFlight.clear();
        }
        logger.error(`[dispatch] event=cycle_failed message=${toErrorMessage(error)}`);
        await wait(CYCLE_ERROR_PAUSE_MS);
      }
    }
    phase = "idle";
  }

  function start(): void {
    if (running) {
      return;
    }
    running = true;
    logger.log(
      `[dispatch] event=started batch_delay_ms=${options.batchDelayMs} max_batch_size=${options.maxBatchSize} max_requests_per_cycle=${options.maxRequestsPerCycle}`,
    );
    loopPromise = runLoop();
  }

  async function stop(): Promise<number> {
    running = false;
    if (loopPromise) {
      await loopPromise;
      loopPromise = null;
    }

    const abandoned = backlog.length + queue.drain().length;
    backlog = [];
    if (abandoned > 0) {
      stats.recordDropped(abandoned);
      logger.warn(`[dispatch] event=stopped abandoned=${abandoned}`);
    } else {
      logger.log("[dispatch] event=stopped abandoned=0");
    }
    return abandoned;
  }

  return {
    start,
    stop,
    runCycle,
    getState,
  };
}
