/**
 * Main Entry Point
 * Runs the price watcher until SIGINT/SIGTERM
 */

import "dotenv/config";
import { loadAppConfig } from "./core/config/app-config";
import { startHealthServer } from "./core/services/health";
import { createTracker } from "./core/services/tracker";
import { toError } from "./core/utils/errors";
import { Logger } from "./core/utils/logger";

async function main() {
  const config = loadAppConfig();
  const loop = createTracker(config);
  const controller = new AbortController();

  const server = config.healthPort
    ? startHealthServer(config.healthPort, () => loop.state === "running")
    : null;

  // Graceful shutdown: stop between URLs or during the interval wait
  const shutdown = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    Logger.info("Graceful shutdown initiated", { signal });
    controller.abort();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  Logger.info("🚀 Price watcher starting", {
    count: config.productUrls.length,
    intervalSeconds: config.pollIntervalSeconds,
    dbPath: config.dbPath,
  });
  await loop.run({ signal: controller.signal });

  if (server) {
    if (server.listening) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    Logger.info("Health server closed");
  }
}

main()
  .then(() => process.exit(0))
  .catch((e) => {
    Logger.error("Price watcher failed", toError(e));
    process.exit(1);
  });
