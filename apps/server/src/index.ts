#!/usr/bin/env node
/**
 * Tunnel Server Entry Point
 */

import { TunnelServer } from "./server.js";
import { config } from "./config.js";
import { logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";

const server = new TunnelServer();
let metricsTimer: NodeJS.Timeout | undefined;

async function shutdown(signal: string): Promise<void> {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  if (metricsTimer) clearInterval(metricsTimer);
  await server.stop();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error("Shutdown failed", {
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  });
}

process.on("SIGINT", () => onSignal("SIGINT"));
process.on("SIGTERM", () => onSignal("SIGTERM"));

server
  .start()
  .then(() => {
    if (config.metricsIntervalMs > 0) {
      metricsTimer = setInterval(() => metrics.print(), config.metricsIntervalMs);
    }
  })
  .catch((err: unknown) => {
    logger.error("Failed to start server", {
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  });
