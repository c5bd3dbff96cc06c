import { z } from "zod";
import type { BridgeStats } from "./bridge-stats";
import type { ChatEvent } from "./chat-events";
import type { EventQueue } from "./event-queue";

type Logger = Pick<typeof console, "log" | "warn">;

export type IntakeResult =
  | { status: "ok"; queued: boolean }
  | { status: "ignored"; channel: string }
  | { status: "queue_full"; max: number }
  | { status: "invalid"; error: string };

export interface IntakeOptions {
  queue: EventQueue<ChatEvent>;
  stats: BridgeStats;
  maxQueueSize: number;
  /** Empty accepts every channel. */
  allowedChannels: string[];
  logger?: Logger;
}

export interface Intake {
  submit(params: Record<string, unknown>): IntakeResult;
}

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

// Unknown keys are stripped; they never reach the queue.
const intakeParamsSchema = z.object({
  message: z.string().default(""),
  sender: z
    .string()
    .optional()
    .transform((value) => value || "Unknown"),
  character: optionalText,
  radius: z
    .string()
    .optional()
    .transform((value) => value || "say"),
  location: optionalText,
  channel: optionalText,
});

function preview(text: string, length: number): string {
  return text ? text.slice(0, length) : "(empty)";
}

export function createIntake(options: IntakeOptions): Intake {
  const logger = options.logger ?? console;
  const allowed = new Set(options.allowedChannels);

  function submit(params: Record<string, unknown>): IntakeResult {
    const receivedAt = Date.now();

    const parsed = intakeParamsSchema.safeParse(params);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      return { status: "invalid", error: details };
    }

    const event: ChatEvent = { ...parsed.data, receivedAt };
    const channel = event.channel ?? "";

    if (allowed.size > 0 && !allowed.has(channel)) {
      logger.log(
        `[intake] event=ignored channel=${channel || "(none)"} sender=${event.sender} message=${preview(event.message, 50)}`,
      );
      return { status: "ignored", channel };
    }

    options.stats.recordReceived();
    const currentSize = options.queue.size();
    options.stats.updateQueuePeak(currentSize);
    logger.log(`[intake] [${event.radius}] ${event.sender}: ${preview(event.message, 80)}`);

    if (currentSize >= options.maxQueueSize) {
      options.stats.recordDropped();
      logger.warn(`[intake] event=queue_full max=${options.maxQueueSize} action=dropped`);
      return { status: "queue_full", max: options.maxQueueSize };
    }

    if (event.message.trim().length === 0) {
      return { status: "ok", queued: false };
    }

    options.queue.enqueue(event);
    return { status: "ok", queued: true };
  }

  return { submit };
}
