import { CachetClient } from "./cachet/cachetClient";
import { StatusPageBackend } from "./cachet/types";
import { Config } from "./config";
import { errorMessage } from "./errors";
import { WebhookMetrics } from "./metrics";
import { AlertProcessor } from "./processor";
import { loadSettings } from "./settings";
import { BridgeSettings } from "./types";
import { WebhookHandler } from "./webhook/handler";

export interface BridgeApp {
  processor: AlertProcessor;
  handler: WebhookHandler;
  // Resolves once cold-start hydration has finished, successfully or not
  ready: Promise<void>;
}

export interface BridgeAppOptions {
  backend?: StatusPageBackend;
  settings?: BridgeSettings;
  createMetrics?: () => WebhookMetrics;
}

// Wires the engine from configuration and starts hydrating it from the backend
export function createBridgeApp(options: BridgeAppOptions = {}): BridgeApp {
  const config = Config.Instance;
  const settings = options.settings ?? loadSettings(config.settingsFile);
  const backend = options.backend ?? CachetClient.fromConfig(settings.cachet_per_page_param);
  const createMetrics = options.createMetrics ?? (() => new WebhookMetrics());

  const processor = new AlertProcessor(backend, settings);
  const handler = new WebhookHandler(
    processor,
    { username: config.webhookUsername, password: config.webhookPassword },
    createMetrics,
  );

  return { processor, handler, ready: hydrate(processor, createMetrics()) };
}

async function hydrate(processor: AlertProcessor, metrics: WebhookMetrics): Promise<void> {
  try {
    await processor.hydrate(metrics);
  } catch (error) {
    // Start empty; the next deliveries rebuild what is needed
    console.error("Failed to hydrate state from status page, starting empty", { error: errorMessage(error) });
  }
  try {
    await metrics.sendMetrics();
  } catch (error) {
    console.error("Failed to send metrics", { error: errorMessage(error) });
  }
}
