import { Cron } from "croner";

type Logger = Pick<typeof console, "error" | "log">;

// Fires every second, throttled by croner's `interval` option.
const EVERY_SECOND = "* * * * * *";

export interface StatsSummarySchedule {
  stop(): void;
}

export function startStatsSummarySchedule(
  intervalSeconds: number,
  emitSummary: () => string,
  logger: Logger = console,
): StatsSummarySchedule {
  const job = new Cron(EVERY_SECOND, { interval: intervalSeconds, protect: true }, () => {
    try {
      logger.log(emitSummary());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`[scheduler] event=stats_summary_failed message=${message}`);
    }
  });

  logger.log(`[scheduler] Registered stats summary (interval=${intervalSeconds}s)`);

  return {
    stop: () => {
      job.stop();
    },
  };
}
