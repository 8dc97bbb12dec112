import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { buildServices } from "./container";
import { createLogger, sanitizeError } from "./logging";

// Load environment variables (local development only)
// Production relies on process.env directly
if (process.env.NODE_ENV !== "production") {
  dotenv.config();
}

const log = createLogger({ service: "startup" });

async function startServer() {
  const config = loadConfig();
  log.info("[STARTUP] Configuration loaded", {
    environment: config.nodeEnv,
    port: config.port,
    leadStore: config.leadStore,
    maxRetries: config.retry.maxRetries,
    retryIntervals: config.retry.intervals,
    retryUnit: config.retry.unit,
    emailDryRun: config.email.dryRun,
    whatsappDryRun: config.whatsapp.dryRun,
  });

  const services = buildServices(config);
  await services.start();

  const app = createApp(services);
  const server = app.listen(config.port, "0.0.0.0", () => {
    log.info(`[STARTUP] Server is running on port ${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("[SHUTDOWN] Stopping", { signal });
    server.close();
    services
      .stop()
      .then(() => process.exit(0))
      .catch((error) => {
        log.error("[SHUTDOWN] Failed to stop cleanly", { error: sanitizeError(error) });
        process.exit(1);
      });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

startServer().catch((error) => {
  log.error("[STARTUP] FATAL: Failed to start server", { error: sanitizeError(error) });
  process.exit(1);
});
