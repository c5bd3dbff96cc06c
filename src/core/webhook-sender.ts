import type { BridgeStats } from "./bridge-stats";
import type { Batch, DispatchOutcome } from "./chat-events";
import { classifyDeliveryError } from "./discord-errors";
import { DISCORD_MAX_LENGTH, truncateToLimit } from "./message-format";

type Logger = Pick<typeof console, "error" | "log" | "warn">;

/** One webhook POST. Must throw on anything but a delivered message. */
export interface WebhookTransport {
  send(content: string): Promise<void>;
}

export interface WebhookSender {
  send(batch: Batch): Promise<DispatchOutcome>;
}

export interface WebhookSenderOptions {
  transport: WebhookTransport;
  stats: BridgeStats;
  hardCharLimit?: number;
  logger?: Logger;
}

function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createWebhookSender(options: WebhookSenderOptions): WebhookSender {
  const logger = options.logger ?? console;
  const hardCharLimit = options.hardCharLimit ?? DISCORD_MAX_LENGTH;

  function logOutcome(outcome: DispatchOutcome, error: unknown): void {
    switch (outcome.kind) {
      case "success":
        return;
      case "rate_limited": {
        const seconds = (outcome.retryAfterMs / 1000).toFixed(1);
        if (outcome.scope === "global") {
          logger.error(
            `[webhook] event=rate_limited scope=global retry_after_s=${seconds} action=reduce_traffic`,
          );
        } else if (outcome.scope === "shared") {
          logger.warn(
            `[webhook] event=rate_limited scope=shared retry_after_s=${seconds} note=resource_shared_with_other_clients`,
          );
        } else {
          logger.warn(`[webhook] event=rate_limited scope=user retry_after_s=${seconds}`);
        }
        return;
      }
      case "permanent_reject":
        if (outcome.reason === "invalid_endpoint") {
          logger.error("=".repeat(60));
          logger.error(
            `[webhook] CRITICAL: Discord webhook is invalid or was deleted (status=${outcome.status}).`,
          );
          logger.error("[webhook] Check DISCORD_WEBHOOK_URL in .env.");
          logger.error("=".repeat(60));
        } else {
          logger.error(
            `[webhook] event=rejected status=${outcome.status} message=${toErrorMessage(error)}`,
          );
        }
        return;
      case "transient_failure":
        logger.error(
          `[webhook] event=transient_failure status=${outcome.status ?? "none"} message=${toErrorMessage(error)}`,
        );
        return;
    }
  }

  async function send(batch: Batch): Promise<DispatchOutcome> {
    let content = batch.content;
    if (content.length > hardCharLimit) {
      content = truncateToLimit(content, hardCharLimit);
      logger.warn(`[webhook] event=truncated limit=${hardCharLimit}`);
    }

    options.stats.recordRequest();
    try {
      await options.transport.send(content);
      return { kind: "success" };
    } catch (error) {
      const outcome = classifyDeliveryError(error);
      logOutcome(outcome, error);
      return outcome;
    }
  }

  return { send };
}
