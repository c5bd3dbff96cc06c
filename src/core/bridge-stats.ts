import type { RateLimitScope } from "./chat-events";

export const STATS_SLOT_MS = 10_000;
export const STATS_SLOT_CAPACITY = 30;
export const LATENCY_SAMPLE_CAPACITY = 100;

type Clock = () => number;

export interface MessagesPerMinute {
  received: number;
  sent: number;
}

export interface BridgeStatsSnapshot {
  totalReceived: number;
  totalSent: number;
  totalDropped: number;
  totalFailed: number;
  totalRequests: number;
  totalRateLimits: number;
  rateLimitsGlobal: number;
  rateLimitsShared: number;
  rateLimitsUser: number;
  totalTransientFailures: number;
  peakQueueSize: number;
  peakQueueAt: number | null;
  peakMessagesPerMinute: number;
  startedAt: number;
}

/**
 * Process-wide counters for the bridge.
 *
 * Every method runs synchronously, so a slot rotation and the counter update
 * that triggered it always land together.
 */
export class BridgeStats {
  private totalReceived = 0;
  private totalSent = 0;
  private totalDropped = 0;
  private totalFailed = 0;
  private totalRequests = 0;
  private totalTransientFailures = 0;
  private readonly rateLimits: Record<RateLimitScope, number> = {
    global: 0,
    shared: 0,
    user: 0,
  };

  private peakQueueSize = 0;
  private peakQueueAt: number | null = null;
  private peakMessagesPerMinute = 0;

  private receivedHistory: number[] = [];
  private sentHistory: number[] = [];
  private latencies: number[] = [];

  private currentSlot: number;
  private slotReceived = 0;
  private slotSent = 0;

  readonly startedAt: number;

  constructor(private readonly now: Clock = Date.now) {
    this.startedAt = now();
    this.currentSlot = this.slotOf(this.startedAt);
  }

  private slotOf(timestamp: number): number {
    return Math.floor(timestamp / STATS_SLOT_MS);
  }

  private rotateSlot(): void {
    const slot = this.slotOf(this.now());
    if (slot <= this.currentSlot) {
      return;
    }

    // Slots that passed without any activity are archived as zeros.
    const elapsed = Math.min(slot - this.currentSlot, STATS_SLOT_CAPACITY + 1);
    this.receivedHistory.push(this.slotReceived);
    this.sentHistory.push(this.slotSent);
    for (let i = 1; i < elapsed; i += 1) {
      this.receivedHistory.push(0);
      this.sentHistory.push(0);
    }
    this.receivedHistory = this.receivedHistory.slice(-STATS_SLOT_CAPACITY);
    this.sentHistory = this.sentHistory.slice(-STATS_SLOT_CAPACITY);

    this.slotReceived = 0;
    this.slotSent = 0;
    this.currentSlot = slot;
  }

  recordReceived(): void {
    this.rotateSlot();
    this.totalReceived += 1;
    this.slotReceived += 1;
  }

  recordSent(count = 1): void {
    this.rotateSlot();
    this.totalSent += count;
    this.slotSent += count;
  }

  recordDropped(count = 1): void {
    this.totalDropped += count;
  }

  recordFailed(count = 1): void {
    this.totalFailed += count;
  }

  recordRequest(): void {
    this.totalRequests += 1;
  }

  recordRateLimit(scope: RateLimitScope): void {
    this.rateLimits[scope] += 1;
  }

  recordTransientFailure(): void {
    this.totalTransientFailures += 1;
  }

  recordLatency(latencyMs: number): void {
    this.latencies.push(Math.max(0, latencyMs));
    if (this.latencies.length > LATENCY_SAMPLE_CAPACITY) {
      this.latencies.shift();
    }
  }

  updateQueuePeak(size: number): void {
    if (size > this.peakQueueSize) {
      this.peakQueueSize = size;
      this.peakQueueAt = this.now();
    }
  }

  /** Throughput over the archived slots plus the one in progress. */
  getMessagesPerMinute(): MessagesPerMinute {
    this.rotateSlot();

    const receivedSum = sum(this.receivedHistory) + this.slotReceived;
    const sentSum = sum(this.sentHistory) + this.slotSent;
    const minutes = ((this.receivedHistory.length + 1) * STATS_SLOT_MS) / 60_000;

    const received = receivedSum / minutes;
    const sent = sentSum / minutes;
    if (received > this.peakMessagesPerMinute) {
      this.peakMessagesPerMinute = received;
    }
    return { received, sent };
  }

  getAverageLatencyMs(): number {
    if (this.latencies.length === 0) {
      return 0;
    }
    return sum(this.latencies) / this.latencies.length;
  }

  getUptimeSeconds(): number {
    return Math.max(0, Math.floor((this.now() - this.startedAt) / 1000));
  }

  formatUptime(): string {
    const total = this.getUptimeSeconds();
    const hours = Math.floor(total / 3600);
    const minutes = Math.floor((total % 3600) / 60);
    const seconds = total % 60;
    if (hours > 0) {
      return `${hours}h ${minutes}m ${seconds}s`;
    }
    if (minutes > 0) {
      return `${minutes}m ${seconds}s`;
    }
    return `${seconds}s`;
  }

  getRequestsPerMinute(): number {
    const uptimeMs = this.now() - this.startedAt;
    if (uptimeMs <= 0) {
      return 0;
    }
    return (this.totalRequests / uptimeMs) * 60_000;
  }

  getTotalRateLimits(): number {
    return this.rateLimits.global + this.rateLimits.shared + this.rateLimits.user;
  }

  toSnapshot(): BridgeStatsSnapshot {
    return {
      totalReceived: this.totalReceived,
      totalSent: this.totalSent,
      totalDropped: this.totalDropped,
      totalFailed: this.totalFailed,
      totalRequests: this.totalRequests,
      totalRateLimits: this.getTotalRateLimits(),
      rateLimitsGlobal: this.rateLimits.global,
      rateLimitsShared: this.rateLimits.shared,
      rateLimitsUser: this.rateLimits.user,
      totalTransientFailures: this.totalTransientFailures,
      peakQueueSize: this.peakQueueSize,
      peakQueueAt: this.peakQueueAt,
      peakMessagesPerMinute: this.peakMessagesPerMinute,
      startedAt: this.startedAt,
    };
  }
}

function sum(values: number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}
