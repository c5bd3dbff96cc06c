export const RATE_LIMIT_SCOPES = ["global", "shared", "user"] as const;

export type RateLimitScope = (typeof RATE_LIMIT_SCOPES)[number];

export interface ChatEvent {
  sender: string;
  character?: string;
  message: string;
  radius: string;
  location?: string;
  channel?: string;
  /** Epoch ms, captured once at intake before queueing. */
  receivedAt: number;
}

export interface Batch {
  events: ChatEvent[];
  content: string;
}

export type PermanentRejectReason = "invalid_endpoint" | "rejected";

export type DispatchOutcome =
  | { kind: "success" }
  | { kind: "rate_limited"; retryAfterMs: number; scope: RateLimitScope }
  | { kind: "permanent_reject"; status: number | null; reason: PermanentRejectReason }
  | { kind: "transient_failure"; retryAfterMs: number; status: number | null };

export function isRateLimitScope(value: unknown): value is RateLimitScope {
  return RATE_LIMIT_SCOPES.some((scope) => scope === value);
}
