import { createServer, type Server } from "node:http";
import type { StatusSnapshot } from "../core/bridge-health";
import type { Intake, IntakeResult } from "../core/intake";

type Logger = Pick<typeof console, "error" | "log">;

export interface RouteResponse {
  statusCode: number;
  body: Record<string, unknown> | StatusSnapshot;
}

export interface IntakeRoutes {
  intake: Intake;
  snapshot: () => StatusSnapshot;
  logger?: Logger;
}

function intakeResponse(result: IntakeResult): RouteResponse {
  switch (result.status) {
    case "ok":
      return { statusCode: 200, body: { status: "ok" } };
    case "ignored":
      return { statusCode: 200, body: { status: "ignored" } };
    case "queue_full":
      return { statusCode: 503, body: { status: "queue_full" } };
    case "invalid":
      return { statusCode: 400, body: { status: "invalid", error: result.error } };
  }
}

function parseRequestUrl(target: string): URL | null {
  try {
    return new URL(target, "http://localhost");
  } catch {
    return null;
  }
}

/** Routes one request. The mod sends its fields as query parameters. */
export function routeRequest(method: string, target: string, routes: IntakeRoutes): RouteResponse {
  const logger = routes.logger ?? console;
  const url = parseRequestUrl(target);
  if (!url) {
    logger.error(`[http] event=bad_request_target target=${target}`);
    return { statusCode: 400, body: { error: "Bad request" } };
  }

  if (url.pathname === "/message" && (method === "GET" || method === "POST")) {
    try {
      return intakeResponse(routes.intake.submit(Object.fromEntries(url.searchParams)));
    } catch (error) {
      const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
      logger.error(`[http] event=intake_failed message=${message}`);
      return { statusCode: 500, body: { error: "Internal server error" } };
    }
  }

  if (url.pathname === "/stats" && method === "GET") {
    return { statusCode: 200, body: routes.snapshot() };
  }

  return { statusCode: 404, body: { error: "Not found" } };
}

export function createIntakeServer(routes: IntakeRoutes): Server {
  return createServer((request, response) => {
    const result = routeRequest(request.method ?? "GET", request.url ?? "/", routes);
    // Request bodies are ignored; drain them so keep-alive connections stay usable.
    request.resume();
    response.writeHead(result.statusCode, { "Content-Type": "application/json; charset=utf-8" });
    response.end(JSON.stringify(result.body));
  });
}

export function listen(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
