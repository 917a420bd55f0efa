import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { buildTokenMap } from "./auth/index.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import {
  getFleetWatchdog,
  getProvisioner,
  getRefreshApi,
  getRefreshDispatcher,
  getRegistry,
  initFleet,
  shutdownFleet,
} from "./fleet/services.js";
import { captureError, initSentry } from "./observability/sentry.js";

const port = config.port;

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), { source: "unhandledRejection" });
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  captureError(err, { source: "uncaughtException", extra: { origin } });
  // The process state is undefined after an uncaught exception.
  process.exit(1);
};

// Only start the server if not imported by tests
if (process.env.NODE_ENV !== "test") {
  process.on("unhandledRejection", unhandledRejectionHandler);
  process.on("uncaughtException", uncaughtExceptionHandler);

  // No-op when SENTRY_DSN is absent
  initSentry(process.env.SENTRY_DSN, config.nodeEnv);

  logger.info(`fleet-orchestrator starting on port ${port}`);

  // Configuration errors are fatal and surface here, before the server listens.
  await initFleet();

  getFleetWatchdog().start();
  if (config.dispatcher.enabled) {
    getRefreshDispatcher().start();
  } else {
    logger.info("Refresh dispatcher disabled");
  }

  const app = createApp({
    registry: getRegistry(),
    refreshApi: getRefreshApi(),
    provisioner: getProvisioner(),
    tokenMap: buildTokenMap(),
  });

  const server = serve({ fetch: app.fetch, port }, () => {
    logger.info(`fleet-orchestrator listening on http://0.0.0.0:${port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      shutdownFleet();
      process.exit(0);
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
