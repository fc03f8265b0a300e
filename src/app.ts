/**
 * Wires the realtime components together from a validated configuration.
 */

import { ConnectionRegistry } from "./store/connection-registry.js";
import { MetricsCache } from "./store/metrics-cache.js";
import { EventPublisher } from "./api/publisher.js";
import { WebSocketAPI } from "./api/websocket.js";
import { ApiServer } from "./api/server.js";
import { EmptySnapshotSource, SupabaseSnapshotSource } from "./connectors/supabase/rest.js";
import { partitionId } from "./types/realtime.js";
import { logger } from "./utils/logger.js";
import type { SnapshotSource } from "./connectors/interface.js";
import type { SystemConfig } from "./utils/config.js";

export interface App {
  registry: ConnectionRegistry;
  metricsCache: MetricsCache;
  publisher: EventPublisher;
  webSocketAPI: WebSocketAPI;
  apiServer: ApiServer;
  source: SnapshotSource;
}

export function createSnapshotSource(config: SystemConfig): SnapshotSource {
  const { url, serviceKey, timeoutMs } = config.supabase;
  if (url === null || serviceKey === null) {
    logger.warn("Supabase not configured, snapshots will be empty");
    return new EmptySnapshotSource();
  }
  return new SupabaseSnapshotSource({ url, serviceKey, timeoutMs });
}

/**
 * Build the application. `source` replaces the configured snapshot source.
 */
export function createApp(config: SystemConfig, source: SnapshotSource = createSnapshotSource(config)): App {
  const registry = new ConnectionRegistry();
  const metricsCache = new MetricsCache(source, {
    ttlMs: config.metrics.ttlMs,
    maxStaleMs: config.metrics.maxStaleMs,
  });
  const publisher = new EventPublisher(registry, metricsCache, {
    invalidateOnEvent: config.realtime.invalidateOnEvent,
  });
  const webSocketAPI = new WebSocketAPI(registry, metricsCache, {
    pathPrefix: config.realtime.pathPrefix,
    idleTimeoutMs: config.realtime.idleTimeoutMs,
    maxQueuedFrames: config.realtime.maxQueuedFrames,
  });
  const apiServer = new ApiServer({
    port: config.server.port,
    host: config.server.host,
    registry,
    metricsCache,
    publisher,
    webSocketAPI,
    ingest: config.ingest,
  });

  registry.on("partitionCreated", (key) => {
    logger.debug("Partition created", { partition: partitionId(key) });
  });
  registry.on("partitionRemoved", (key) => {
    logger.debug("Partition removed", { partition: partitionId(key) });
  });

  return { registry, metricsCache, publisher, webSocketAPI, apiServer, source };
}
