import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  applyBridgeSettingsToConfig,
  loadBridgeSettings,
  loadConfig,
} from "../../src/adapters/config-adapter";
import { parseBridgeSettings } from "../../src/core/bridge-settings";

const ORIGINAL_WEBHOOK_URL = process.env.DISCORD_WEBHOOK_URL;
const ORIGINAL_SETTINGS_FILE = process.env.BRIDGE_SETTINGS_FILE;
const TEST_WEBHOOK_URL = "https://discord.com/api/webhooks/123456/test-token";

function restore(name: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

describe("config-adapter", () => {
  beforeEach(() => {
    process.env.DISCORD_WEBHOOK_URL = TEST_WEBHOOK_URL;
    delete process.env.BRIDGE_SETTINGS_FILE;
  });

  afterEach(() => {
    restore("DISCORD_WEBHOOK_URL", ORIGINAL_WEBHOOK_URL);
    restore("BRIDGE_SETTINGS_FILE", ORIGINAL_SETTINGS_FILE);
  });

  it("loads defaults and the settings file beside the project", () => {
    const config = loadConfig();

    expect(config.webhookUrl).toBe(TEST_WEBHOOK_URL);
    expect(config.settingsFile.endsWith("settings.bridge.json")).toBe(true);
    expect(config.batchDelayMs).toBe(2500);
    expect(config.interRequestDelayMs).toBe(500);
    expect(config.maxQueueSize).toBe(500);
    expect(config.requestTimeoutMs).toBe(10_000);
    expect(config.botAvatarUrl).toBeNull();
  });

  it("honours a settings file override", () => {
    process.env.BRIDGE_SETTINGS_FILE = "config/custom.json";

    const config = loadConfig();

    expect(config.settingsFile.endsWith("config/custom.json")).toBe(true);
  });

  it("requires the webhook URL", () => {
    process.env.DISCORD_WEBHOOK_URL = "  ";
    expect(() => loadConfig()).toThrow("DISCORD_WEBHOOK_URL is not set in .env");

    process.env.DISCORD_WEBHOOK_URL = "https://example.com/hook";
    expect(() => loadConfig()).toThrow("DISCORD_WEBHOOK_URL is not a Discord webhook URL");
  });

  it("converts settings seconds to milliseconds", () => {
    const config = loadConfig();
    const settings = parseBridgeSettings(
      JSON.stringify({
        port: 8080,
        bot_name: "Relay",
        bot_avatar_url: "https://example.com/avatar.png",
        batch_delay_seconds: 1.25,
        inter_request_delay_seconds: 0.2,
        request_timeout_seconds: 5,
        max_event_age_seconds: 60,
        allowed_channels: ["Guild"],
        display: { timestamp_format: "R", show_channel: false },
      }),
    );

    applyBridgeSettingsToConfig(config, settings);

    expect(config.port).toBe(8080);
    expect(config.botName).toBe("Relay");
    expect(config.botAvatarUrl).toBe("https://example.com/avatar.png");
    expect(config.batchDelayMs).toBe(1250);
    expect(config.interRequestDelayMs).toBe(200);
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.maxEventAgeMs).toBe(60_000);
    expect(config.allowedChannels).toEqual(["Guild"]);
    expect(config.display).toEqual({
      timestampFormat: "R",
      showCharacterName: true,
      showRadius: true,
      showLocation: false,
      showChannel: false,
    });
  });

  it("reads the checked-in settings file", async () => {
    const config = loadConfig();

    const settings = await loadBridgeSettings(config);

    expect(settings.max_batch_size).toBe(20);
    expect(settings.safe_batch_chars).toBe(1900);
  });
});
