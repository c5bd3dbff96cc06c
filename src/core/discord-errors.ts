import { type DispatchOutcome, isRateLimitScope, type RateLimitScope } from "./chat-events";

export const DEFAULT_RATE_LIMIT_RETRY_MS = 2000;
export const TRANSIENT_RETRY_MS = 2000;

const INVALID_ENDPOINT_STATUSES = new Set<number>([401, 404]);

function readField(error: unknown, field: string): unknown {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  return Reflect.get(error, field);
}

function readNumericField(error: unknown, field: "status" | "retryAfter"): number | null {
  const maybeValue = readField(error, field);
  return typeof maybeValue === "number" && Number.isFinite(maybeValue) ? maybeValue : null;
}

export function parseDiscordStatus(error: unknown): number | null {
  return readNumericField(error, "status");
}

/** `retryAfter` as carried by a REST rate-limit rejection, in ms. */
export function parseRetryAfterMs(error: unknown): number | null {
  const retryAfter = readNumericField(error, "retryAfter");
  return retryAfter !== null && retryAfter >= 0 ? retryAfter : null;
}

export function parseRateLimitScope(error: unknown): RateLimitScope {
  const scope = readField(error, "scope");
  return isRateLimitScope(scope) ? scope : "user";
}

export function isRateLimitError(error: unknown): boolean {
  return parseRetryAfterMs(error) !== null || parseDiscordStatus(error) === 429;
}

/**
 * Maps a failed webhook call to an outcome. Errors without an HTTP status
 * (timeouts, aborted or refused connections) are transient.
 */
export function classifyDeliveryError(error: unknown): Exclude<DispatchOutcome, { kind: "success" }> {
  if (isRateLimitError(error)) {
    return {
      kind: "rate_limited",
      retryAfterMs: parseRetryAfterMs(error) ?? DEFAULT_RATE_LIMIT_RETRY_MS,
      scope: parseRateLimitScope(error),
    };
  }

  const status = parseDiscordStatus(error);
  if (status === null || status >= 500) {
    return { kind: "transient_failure", retryAfterMs: TRANSIENT_RETRY_MS, status };
  }
  if (INVALID_ENDPOINT_STATUSES.has(status)) {
    return { kind: "permanent_reject", status, reason: "invalid_endpoint" };
  }
  return { kind: "permanent_reject", status, reason: "rejected" };
}
