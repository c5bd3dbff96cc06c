import { WebhookClient, type WebhookMessageCreateOptions } from "discord.js";
import type { WebhookTransport } from "../core/webhook-sender";
import type { Config } from "./config-adapter";

export interface DiscordWebhookTransport extends WebhookTransport {
  destroy(): void;
}

/**
 * Webhook transport on discord.js. The REST layer is told never to wait out
 * a rate limit (`rejectOnRateLimit`) and never to retry (`retries: 0`): it
 * throws instead, and the dispatch worker owns every delay.
 */
export function createDiscordWebhookTransport(
  config: Pick<Config, "webhookUrl" | "botName" | "botAvatarUrl" | "requestTimeoutMs">,
): DiscordWebhookTransport {
  const client = new WebhookClient(
    { url: config.webhookUrl },
    {
      allowedMentions: { parse: [] },
      rest: {
        rejectOnRateLimit: () => true,
        retries: 0,
        timeout: config.requestTimeoutMs,
      },
    },
  );

  async function send(content: string): Promise<void> {
    const payload: WebhookMessageCreateOptions = {
      content,
      username: config.botName,
      allowedMentions: { parse: [] },
    };
    if (config.botAvatarUrl) {
      payload.avatarURL = config.botAvatarUrl;
    }
    await client.send(payload);
  }

  function destroy(): void {
    client.destroy();
  }

  return { send, destroy };
}
