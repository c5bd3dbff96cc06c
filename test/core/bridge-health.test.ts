import { describe, expect, it } from "vitest";
import {
  buildStatusSnapshot,
  evaluateHealth,
  formatStatsSummary,
  theoreticalCapacity,
} from "../../src/core/bridge-health";
import { BridgeStats } from "../../src/core/bridge-stats";

const START = 1_700_000_000_000;

describe("evaluateHealth", () => {
  const base = { maxQueueSize: 500, totalRateLimits: 0, totalSent: 0 };

  it("is CRITICAL above 80% occupancy", () => {
    expect(evaluateHealth({ ...base, queueSize: 401 })).toBe("CRITICAL");
    expect(evaluateHealth({ ...base, queueSize: 400 })).toBe("WARNING");
  });

  it("is WARNING above 50% occupancy", () => {
    expect(evaluateHealth({ ...base, queueSize: 251 })).toBe("WARNING");
    expect(evaluateHealth({ ...base, queueSize: 250 })).toBe("OK");
  });

  it("is RATE_LIMITED when rate limits exceed 10% of sent messages", () => {
    expect(evaluateHealth({ ...base, queueSize: 0, totalRateLimits: 11, totalSent: 100 })).toBe(
      "RATE_LIMITED",
    );
    expect(evaluateHealth({ ...base, queueSize: 0, totalRateLimits: 10, totalSent: 100 })).toBe(
      "OK",
    );
  });

  it("ignores rate limits before anything was sent", () => {
    expect(evaluateHealth({ ...base, queueSize: 0, totalRateLimits: 5, totalSent: 0 })).toBe("OK");
  });

  it("prefers queue pressure over rate limiting", () => {
    expect(evaluateHealth({ ...base, queueSize: 450, totalRateLimits: 50, totalSent: 10 })).toBe(
      "CRITICAL",
    );
  });

  it("treats a zero maximum as empty", () => {
    expect(evaluateHealth({ ...base, maxQueueSize: 0, queueSize: 10 })).toBe("OK");
  });
});

describe("buildStatusSnapshot", () => {
  it("echoes config and derives capacity", () => {
    const stats = new BridgeStats(() => START);
    stats.recordReceived();
    stats.recordSent(1);
    stats.recordRequest();
    stats.updateQueuePeak(3);

    const snapshot = buildStatusSnapshot(stats, 300, {
      maxQueueSize: 500,
      batchDelayMs: 2500,
      maxBatchSize: 20,
      interRequestDelayMs: 500,
      maxRequestsPerCycle: 1,
    });

    expect(snapshot.status).toBe("WARNING");
    expect(snapshot.uptime).toBe("0s");
    expect(snapshot.queue).toEqual({
      current: 300,
      max: 500,
      percent: 60,
      peak: 3,
      peakAt: new Date(START).toISOString(),
    });
    expect(snapshot.messages.totalReceived).toBe(1);
    expect(snapshot.messages.receivedPerMinute).toBe(6);
    expect(snapshot.performance.totalRequests).toBe(1);
    expect(snapshot.config).toEqual({
      batchDelaySeconds: 2.5,
      maxBatchSize: 20,
      interRequestDelaySeconds: 0.5,
      maxRequestsPerCycle: 1,
      theoreticalCapacity: 480,
    });
  });
});

describe("theoreticalCapacity", () => {
  it("is (60 / window) x batch size", () => {
    expect(theoreticalCapacity(2500, 20)).toBe(480);
    expect(theoreticalCapacity(3000, 10)).toBe(200);
    expect(theoreticalCapacity(0, 10)).toBe(0);
  });
});

describe("formatStatsSummary", () => {
  it("renders one summary line", () => {
    const stats = new BridgeStats(() => START);
    stats.recordDropped(2);
    stats.recordRateLimit("shared");

    expect(formatStatsSummary(stats, 4, 500)).toBe(
      "[stats] received_per_min=0.0 sent_per_min=0.0 requests_per_min=0.0 queue=4/500 peak_queue=0 dropped=2 failed=0 rate_limits=1 (G:0/S:1/U:0)",
    );
  });
});
