import { describe, expect, it } from "vitest";
import { routeRequest } from "../../src/adapters/intake-server";
import { buildStatusSnapshot } from "../../src/core/bridge-health";
import { BridgeStats } from "../../src/core/bridge-stats";
import type { ChatEvent } from "../../src/core/chat-events";
import { EventQueue } from "../../src/core/event-queue";
import { createIntake, type Intake } from "../../src/core/intake";

const quiet = { log: () => {}, warn: () => {}, error: () => {} };

function createRoutes(options: { maxQueueSize?: number; allowedChannels?: string[] } = {}) {
  const queue = new EventQueue<ChatEvent>();
  const stats = new BridgeStats();
  const intake = createIntake({
    queue,
    stats,
    maxQueueSize: options.maxQueueSize ?? 500,
    allowedChannels: options.allowedChannels ?? [],
    logger: quiet,
  });
  const snapshot = () =>
    buildStatusSnapshot(stats, queue.size(), {
      maxQueueSize: options.maxQueueSize ?? 500,
      batchDelayMs: 2500,
      maxBatchSize: 20,
      interRequestDelayMs: 500,
      maxRequestsPerCycle: 1,
    });
  return { queue, routes: { intake, snapshot, logger: quiet } };
}

describe("routeRequest", () => {
  it("queues a message sent as query parameters", () => {
    const { queue, routes } = createRoutes();

    const response = routeRequest(
      "GET",
      "/message?sender=Alice&message=hello%20there&radius=yell",
      routes,
    );

    expect(response).toEqual({ statusCode: 200, body: { status: "ok" } });
    expect(queue.drain().map((event) => [event.sender, event.message, event.radius])).toEqual([
      ["Alice", "hello there", "yell"],
    ]);
  });

  it("accepts POST on the same route", () => {
    const { queue, routes } = createRoutes();

    const response = routeRequest("POST", "/message?message=hi", routes);

    expect(response.statusCode).toBe(200);
    expect(queue.size()).toBe(1);
  });

  it("answers 503 when the queue is full", () => {
    const { routes } = createRoutes({ maxQueueSize: 1 });
    routeRequest("GET", "/message?message=first", routes);

    const response = routeRequest("GET", "/message?message=second", routes);

    expect(response).toEqual({ statusCode: 503, body: { status: "queue_full" } });
  });

  it("answers 200 for filtered channels", () => {
    const { queue, routes } = createRoutes({ allowedChannels: ["Guild"] });

    const response = routeRequest("GET", "/message?message=hi&channel=Local", routes);

    expect(response).toEqual({ statusCode: 200, body: { status: "ignored" } });
    expect(queue.size()).toBe(0);
  });

  it("answers 500 when intake throws", () => {
    const errors: string[] = [];
    const failing: Intake = {
      submit: () => {
        throw new Error("boom");
      },
    };
    const { routes } = createRoutes();

    const response = routeRequest("GET", "/message?message=hi", {
      ...routes,
      intake: failing,
      logger: { log: () => {}, error: (text: string) => errors.push(text) },
    });

    expect(response).toEqual({ statusCode: 500, body: { error: "Internal server error" } });
    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith("[http] event=intake_failed message=Error: boom")).toBe(true);
  });

  it("serves the status snapshot", () => {
    const { routes } = createRoutes();
    routeRequest("GET", "/message?message=hi", routes);

    const response = routeRequest("GET", "/stats", routes);

    expect(response.statusCode).toBe(200);
    expect(response.body).toMatchObject({
      status: "OK",
      queue: { current: 1, max: 500, percent: 0.2 },
      messages: { totalReceived: 1, totalSent: 0 },
      config: { batchDelaySeconds: 2.5, theoreticalCapacity: 480 },
    });
  });

  it("answers 400 for a request target that is not a valid URL", () => {
    const errors: string[] = [];
    const { queue, routes } = createRoutes();

    const response = routeRequest("GET", "//", {
      ...routes,
      logger: { log: () => {}, error: (text: string) => errors.push(text) },
    });

    expect(response).toEqual({ statusCode: 400, body: { error: "Bad request" } });
    expect(errors).toEqual(["[http] event=bad_request_target target=//"]);
    expect(queue.size()).toBe(0);
  });

  it("answers 404 for anything else", () => {
    const { routes } = createRoutes();

    expect(routeRequest("GET", "/", routes)).toEqual({
      statusCode: 404,
      body: { error: "Not found" },
    });
    expect(routeRequest("DELETE", "/stats", routes).statusCode).toBe(404);
  });
});
