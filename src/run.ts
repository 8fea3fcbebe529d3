/**
 * Process entry: HTTP server plus, in worker and hybrid modes, the daily sync
 * schedule and startup check. SIGTERM/SIGINT stop the schedule, let in-flight
 * listings finish and close the pool.
 */

import { createServer } from "node:http";
import { createApp } from "./app.js";
import { getConfig } from "./core/config/configService.js";
import { errorMessage } from "./core/errors.js";
import { logger } from "./core/logger.js";
import { closePool } from "./db/client.js";
import { createSyncRuntime, startJobs, stopJobs } from "./jobs/index.js";

const config = getConfig();
const { coordinator, store } = createSyncRuntime(config);
const app = createApp({ mode: config.mode, coordinator, store });
const runsJobs = config.mode === "worker" || config.mode === "hybrid";

const server = createServer(app);
server.listen(config.port, "0.0.0.0", () => {
  logger.info({ port: config.port, mode: config.mode, dryRun: config.dryRun }, "Listing metrics sync listening");
  if (runsJobs) {
    startJobs(coordinator, config).catch((err: unknown) => {
      logger.error({ err }, "Startup sync check failed");
    });
  }
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Graceful shutdown started");
  stopJobs();
  await coordinator.shutdown();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  await closePool();
  logger.info("Graceful shutdown complete");
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err: errorMessage(err) }, "Shutdown failed");
        process.exit(1);
      }
    );
  });
}
