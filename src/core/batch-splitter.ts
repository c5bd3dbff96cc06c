import type { Batch, ChatEvent } from "./chat-events";
import { truncateToLimit } from "./message-format";

export interface BatchPlanOptions {
  /** Budget for a batch of several lines. */
  safeCharLimit: number;
  /** Hard per-message limit; longer single lines are truncated to it. */
  hardCharLimit: number;
  /** 0 means no cap. */
  maxRequestsPerCycle: number;
}

export interface BatchPlan {
  batches: Batch[];
  /** Events past the request cap, in their original order. */
  deferred: ChatEvent[];
}

/**
 * Groups events into Discord-sized batches without reordering them and
 * without splitting one event across two batches.
 */
export function planBatches(
  events: ChatEvent[],
  format: (event: ChatEvent) => string | null,
  options: BatchPlanOptions,
): BatchPlan {
  const batches: Batch[] = [];
  let currentEvents: ChatEvent[] = [];
  let currentLines: string[] = [];
  let currentLength = 0;

  function flush(): void {
    if (currentLines.length === 0) {
      return;
    }
    batches.push({ events: currentEvents, content: currentLines.join("\n") });
    currentEvents = [];
    currentLines = [];
    currentLength = 0;
  }

  for (const event of events) {
    const formatted = format(event);
    if (formatted === null) {
      continue;
    }

    const line = truncateToLimit(formatted, options.hardCharLimit);
    // +1 for the newline joining it to the previous line
    const lineLength = line.length + 1;
    if (currentLines.length > 0 && currentLength + lineLength > options.safeCharLimit) {
      flush();
    }
    currentEvents.push(event);
    currentLines.push(line);
    currentLength += lineLength;
  }
  flush();

  if (options.maxRequestsPerCycle > 0 && batches.length > options.maxRequestsPerCycle) {
    const deferred = batches
      .slice(options.maxRequestsPerCycle)
      .flatMap((batch) => batch.events);
    return { batches: batches.slice(0, options.maxRequestsPerCycle), deferred };
  }

  return { batches, deferred: [] };
}
