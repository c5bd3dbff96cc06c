import type { BridgeStats } from "./bridge-stats";

export const CRITICAL_QUEUE_PERCENT = 80;
export const WARNING_QUEUE_PERCENT = 50;
export const RATE_LIMITED_PERCENT = 10;

export type HealthStatus = "OK" | "WARNING" | "CRITICAL" | "RATE_LIMITED";

export interface HealthInput {
  queueSize: number;
  maxQueueSize: number;
  totalRateLimits: number;
  totalSent: number;
}

export function queuePercent(queueSize: number, maxQueueSize: number): number {
  if (maxQueueSize <= 0) {
    return 0;
  }
  return (queueSize / maxQueueSize) * 100;
}

export function evaluateHealth(input: HealthInput): HealthStatus {
  const percent = queuePercent(input.queueSize, input.maxQueueSize);
  if (percent > CRITICAL_QUEUE_PERCENT) {
    return "CRITICAL";
  }
  if (percent > WARNING_QUEUE_PERCENT) {
    return "WARNING";
  }
  if (input.totalRateLimits > 0 && input.totalSent > 0) {
    const rateLimitPercent = (input.totalRateLimits / input.totalSent) * 100;
    if (rateLimitPercent > RATE_LIMITED_PERCENT) {
      return "RATE_LIMITED";
    }
  }
  return "OK";
}

export interface SnapshotSettings {
  maxQueueSize: number;
  batchDelayMs: number;
  maxBatchSize: number;
  interRequestDelayMs: number;
  maxRequestsPerCycle: number;
}

export interface StatusSnapshot {
  status: HealthStatus;
  uptime: string;
  uptimeSeconds: number;
  queue: {
    current: number;
    max: number;
    percent: number;
    peak: number;
    peakAt: string | null;
  };
  messages: {
    totalReceived: number;
    totalSent: number;
    totalDropped: number;
    totalFailed: number;
    receivedPerMinute: number;
    sentPerMinute: number;
    peakPerMinute: number;
  };
  performance: {
    totalRequests: number;
    requestsPerMinute: number;
    rateLimits: number;
    rateLimitsGlobal: number;
    rateLimitsShared: number;
    rateLimitsUser: number;
    transientFailures: number;
    averageLatencyMs: number;
  };
  config: {
    batchDelaySeconds: number;
    maxBatchSize: number;
    interRequestDelaySeconds: number;
    maxRequestsPerCycle: number;
    theoreticalCapacity: number;
  };
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

/** Messages per minute the worker can move when every cycle is full. */
export function theoreticalCapacity(batchDelayMs: number, maxBatchSize: number): number {
  if (batchDelayMs <= 0) {
    return 0;
  }
  return Math.floor((60_000 / batchDelayMs) * maxBatchSize);
}

export function buildStatusSnapshot(
  stats: BridgeStats,
  queueSize: number,
  settings: SnapshotSettings,
): StatusSnapshot {
  const throughput = stats.getMessagesPerMinute();
  const totals = stats.toSnapshot();

  return {
    status: evaluateHealth({
      queueSize,
      maxQueueSize: settings.maxQueueSize,
      totalRateLimits: totals.totalRateLimits,
      totalSent: totals.totalSent,
    }),
    uptime: stats.formatUptime(),
    uptimeSeconds: stats.getUptimeSeconds(),
    queue: {
      current: queueSize,
      max: settings.maxQueueSize,
      percent: round1(queuePercent(queueSize, settings.maxQueueSize)),
      peak: totals.peakQueueSize,
      peakAt: totals.peakQueueAt === null ? null : new Date(totals.peakQueueAt).toISOString(),
    },
    messages: {
      totalReceived: totals.totalReceived,
      totalSent: totals.totalSent,
      totalDropped: totals.totalDropped,
      totalFailed: totals.totalFailed,
      receivedPerMinute: round1(throughput.received),
      sentPerMinute: round1(throughput.sent),
      peakPerMinute: round1(totals.peakMessagesPerMinute),
    },
    performance: {
      totalRequests: totals.totalRequests,
      requestsPerMinute: round1(stats.getRequestsPerMinute()),
      rateLimits: totals.totalRateLimits,
      rateLimitsGlobal: totals.rateLimitsGlobal,
      rateLimitsShared: totals.rateLimitsShared,
      rateLimitsUser: totals.rateLimitsUser,
      transientFailures: totals.totalTransientFailures,
      averageLatencyMs: round1(stats.getAverageLatencyMs()),
    },
    config: {
      batchDelaySeconds: settings.batchDelayMs / 1000,
      maxBatchSize: settings.maxBatchSize,
      interRequestDelaySeconds: settings.interRequestDelayMs / 1000,
      maxRequestsPerCycle: settings.maxRequestsPerCycle,
      theoreticalCapacity: theoreticalCapacity(settings.batchDelayMs, settings.maxBatchSize),
    },
  };
}

export function formatStatsSummary(
  stats: BridgeStats,
  queueSize: number,
  maxQueueSize: number,
): string {
  const throughput = stats.getMessagesPerMinute();
  const totals = stats.toSnapshot();
  return [
    "[stats]",
    `received_per_min=${throughput.received.toFixed(1)}`,
    `sent_per_min=${throughput.sent.toFixed(1)}`,
    `requests_per_min=${stats.getRequestsPerMinute().toFixed(1)}`,
    `queue=${queueSize}/${maxQueueSize}`,
    `peak_queue=${totals.peakQueueSize}`,
    `dropped=${totals.totalDropped}`,
    `failed=${totals.totalFailed}`,
    `rate_limits=${totals.totalRateLimits}`,
    `(G:${totals.rateLimitsGlobal}/S:${totals.rateLimitsShared}/U:${totals.rateLimitsUser})`,
  ].join(" ");
}
