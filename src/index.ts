/**
 * Entry point for the operations dashboard realtime backend.
 *
 * Loads configuration, starts the HTTP and WebSocket listener and logs
 * health until a shutdown signal arrives.
 */

import { logger } from "./utils/logger.js";
import { getConfig } from "./utils/config.js";
import { createApp, type App } from "./app.js";

let app: App | null = null;
let healthInterval: NodeJS.Timeout | null = null;
let shuttingDown = false;

async function main() {
  const config = getConfig();
  logger.setLevel(config.logging.level);
  logger.setFormat(config.logging.format);

  logger.info("Starting operations dashboard realtime backend", {
    port: config.server.port,
    pathPrefix: config.realtime.pathPrefix,
    metricsTtlMs: config.metrics.ttlMs,
    supabase: config.supabase.url !== null,
    ingestAuth: config.ingest.token !== null,
  });

  app = createApp(config);
  await app.apiServer.start();

  healthInterval = setInterval(() => {
    app?.metricsCache.prune();
    logHealth();
  }, 30000); // Every 30 seconds
}

/**
 * Log system health.
 */
function logHealth(): void {
  if (!app) {
    return;
  }
  const stats = app.registry.getStats();

  logger.info("System health", {
    source: app.source.name,
    partitions: stats.partitions,
    connections: stats.connections,
    byChannel: stats.byChannel,
    sessions: app.webSocketAPI.getStats().sessionCount,
    cachedSnapshots: app.metricsCache.size(),
  });
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`Received ${signal}, shutting down gracefully`);

  if (healthInterval) {
    clearInterval(healthInterval);
  }

  // Stop API server (closes every realtime connection first)
  await app?.apiServer.stop();
  app?.metricsCache.clear();

  logger.info("Shutdown complete");
  process.exit(0);
}

// Handle graceful shutdown
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("Error during shutdown", error);
      process.exit(1);
    });
  });
}

// Start the application
main().catch((error: unknown) => {
  logger.error("Fatal error in main", error);
  process.exit(1);
});
