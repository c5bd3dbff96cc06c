import { createBridgeRuntime } from "./adapters/bridge-runtime";
import {
  applyBridgeSettingsToConfig,
  loadBridgeSettings,
  loadConfig,
} from "./adapters/config-adapter";
import { createDiscordWebhookTransport } from "./adapters/discord-webhook-adapter";
import { close, createIntakeServer, listen } from "./adapters/intake-server";
import { theoreticalCapacity } from "./core/bridge-health";

const config = loadConfig();
const settings = await loadBridgeSettings(config);
applyBridgeSettingsToConfig(config, settings);

const transport = createDiscordWebhookTransport(config);
const runtime = createBridgeRuntime({ config, transport });
const server = createIntakeServer({
  intake: runtime.intake,
  snapshot: runtime.snapshot,
});

let shuttingDown = false;

async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  console.log(`Shutting down... (signal=${signal})`);
  try {
    await close(server);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`[http] Failed to close server: ${errorMessage}`);
  }
  const abandoned = await runtime.stop();
  transport.destroy();
  console.log(`Bridge stopped (abandoned=${abandoned})`);
  process.exit(0);
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

runtime.start();
await listen(server, config.port);

console.log("Chat bridge started");
console.log(`Intake: http://localhost:${config.port}/message`);
console.log(`Stats: http://localhost:${config.port}/stats`);
console.log(`Settings file: ${config.settingsFile}`);
console.log(
  `Batching: window=${config.batchDelayMs}ms max_batch=${config.maxBatchSize} inter_request=${config.interRequestDelayMs}ms max_requests_per_cycle=${config.maxRequestsPerCycle || "unlimited"}`,
);
console.log(
  `Limits: queue=${config.maxQueueSize} retry_backlog=${config.maxRetryBacklog} safe_chars=${config.safeBatchChars} max_chars=${config.discordMaxChars}`,
);
console.log(
  `Theoretical capacity: ${theoreticalCapacity(config.batchDelayMs, config.maxBatchSize)} msg/min`,
);
console.log(
  `Allowed channels: ${config.allowedChannels.length > 0 ? config.allowedChannels.join(", ") : "All"}`,
);
