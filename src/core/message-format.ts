import type { ChatEvent } from "./chat-events";

export const DISCORD_MAX_LENGTH = 2000;
export const TRUNCATION_MARKER = "...";

export const TIMESTAMP_FORMATS = ["t", "T", "d", "D", "f", "F", "R", ""] as const;

export type TimestampFormat = (typeof TIMESTAMP_FORMATS)[number];

export interface DisplayOptions {
  timestampFormat: TimestampFormat;
  showCharacterName: boolean;
  showRadius: boolean;
  showLocation: boolean;
  showChannel: boolean;
}

export const DEFAULT_DISPLAY_OPTIONS: DisplayOptions = {
  timestampFormat: "T",
  showCharacterName: true,
  showRadius: true,
  showLocation: false,
  showChannel: true,
};

export function truncateToLimit(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  let cut = Math.max(0, limit - TRUNCATION_MARKER.length);
  // Never split a surrogate pair.
  if (cut > 0 && isHighSurrogate(text.charCodeAt(cut - 1))) {
    cut -= 1;
  }
  return `${text.slice(0, cut)}${TRUNCATION_MARKER}`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function capitalize(value: string): string {
  if (value.length === 0) {
    return value;
  }
  return `${value[0].toUpperCase()}${value.slice(1).toLowerCase()}`;
}

/**
 * Renders one chat event as a Discord line. The timestamp comes from
 * `receivedAt`, so it shows when the game sent the line rather than when the
 * batch went out. Returns `null` for a blank body.
 */
export function formatChatEvent(
  event: ChatEvent,
  display: DisplayOptions = DEFAULT_DISPLAY_OPTIONS,
): string | null {
  if (event.message.trim().length === 0) {
    return null;
  }

  const timestamp = display.timestampFormat
    ? `<t:${Math.floor(event.receivedAt / 1000)}:${display.timestampFormat}> `
    : "";

  const sender = event.sender || "Unknown";
  const name =
    display.showCharacterName && event.character && event.character !== sender
      ? `**${sender}** (${event.character})`
      : `**${sender}**`;

  const radius = display.showRadius ? ` [${capitalize(event.radius || "say")}]` : "";
  let content = `${timestamp}${name}${radius}: ${event.message}`;

  const footer: string[] = [];
  if (display.showLocation && event.location) {
    footer.push(`Location: ${event.location}`);
  }
  if (display.showChannel && event.channel) {
    footer.push(`Channel: ${event.channel}`);
  }
  if (footer.length > 0) {
    content += `\n-# ${footer.join(" | ")}`;
  }

  return content;
}
