/**
 * WebSocket API Server
 *
 * Accepts realtime connections on one endpoint per channel:
 *
 *   {prefix}/dashboard/:tenantId
 *   {prefix}/kds/:tenantId?station=grill
 *   {prefix}/tables/:tenantId?location_id=...
 *
 * and runs a ConnectionSession for each accepted socket.
 */

import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { EventEmitter } from "eventemitter3";
import { Connection, type FrameSink } from "./connection.js";
import { ConnectionSession } from "./session.js";
import { logger } from "../utils/logger.js";
import { isValidTenantId, type ChannelKind, type PartitionKey } from "../types/realtime.js";
import type { ConnectionRegistry } from "../store/connection-registry.js";
import type { MetricsCache } from "../store/metrics-cache.js";

export interface WebSocketAPIOptions {
  pathPrefix: string;
  idleTimeoutMs: number;
  maxQueuedFrames: number;
}

export interface WebSocketAPIEvents {
  sessionOpened: (session: ConnectionSession) => void;
  sessionClosed: (session: ConnectionSession) => void;
}

const ENDPOINTS: Record<string, { channel: ChannelKind; subKeyParam: string | null }> = {
  dashboard: { channel: "dashboard", subKeyParam: null },
  kds: { channel: "kitchen-display", subKeyParam: "station" },
  tables: { channel: "table-view", subKeyParam: "location_id" },
};

/**
 * Map an upgrade request URL to the partition its connection joins.
 * Returns null for anything that is not a realtime endpoint.
 */
export function resolveEndpoint(pathPrefix: string, requestUrl: string): PartitionKey | null {
  let url: URL;
  try {
    url = new URL(requestUrl, "http://localhost");
  } catch {
    return null;
  }

  const prefix = pathPrefix.replace(/\/+$/, "");
  if (!url.pathname.startsWith(`${prefix}/`)) {
    return null;
  }

  const segments = url.pathname.slice(prefix.length + 1).split("/");
  if (segments.length !== 2) {
    return null;
  }
  const [endpointName, rawTenantId] = segments;
  const endpoint = Object.hasOwn(ENDPOINTS, endpointName) ? ENDPOINTS[endpointName] : undefined;
  if (!endpoint) {
    return null;
  }

  let tenantId: string;
  try {
    tenantId = decodeURIComponent(rawTenantId);
  } catch {
    return null;
  }
  if (!isValidTenantId(tenantId)) {
    return null;
  }

  const subKey = endpoint.subKeyParam ? url.searchParams.get(endpoint.subKeyParam) : null;
  return subKey
    ? { tenantId, channel: endpoint.channel, subKey }
    : { tenantId, channel: endpoint.channel };
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

export class WebSocketAPI extends EventEmitter<WebSocketAPIEvents> {
  private wss: WebSocketServer | null = null;
  private server: Server | null = null;
  private sessions: Map<ConnectionSession, Promise<void>> = new Map();
  private readonly registry: ConnectionRegistry;
  private readonly metricsCache: MetricsCache;
  private readonly options: WebSocketAPIOptions;

  private readonly onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    this.handleUpgrade(req, socket, head);
  };

  constructor(registry: ConnectionRegistry, metricsCache: MetricsCache, options: WebSocketAPIOptions) {
    super();
    this.registry = registry;
    this.metricsCache = metricsCache;
    this.options = options;
  }

  /**
   * Start accepting upgrades on an HTTP server.
   */
  start(server: Server): void {
    if (this.wss) {
      logger.warn("WebSocket server already started");
      return;
    }

    this.wss = new WebSocketServer({ noServer: true });
    this.server = server;
    server.on("upgrade", this.onUpgrade);

    logger.info("WebSocket server started", { pathPrefix: this.options.pathPrefix });
  }

  /**
   * Close every connection and wait for their sessions to finish.
   */
  async stop(): Promise<void> {
    if (!this.wss) {
      return;
    }

    this.server?.off("upgrade", this.onUpgrade);
    this.server = null;

    for (const session of this.sessions.keys()) {
      session.connection.close(1001, "server shutting down");
    }
    await Promise.all(this.sessions.values());

    const wss = this.wss;
    this.wss = null;
    await new Promise<void>((resolve) => wss.close(() => resolve()));

    logger.info("WebSocket server stopped");
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const wss = this.wss;
    const partition = resolveEndpoint(this.options.pathPrefix, req.url ?? "/");

    if (!wss || !partition) {
      logger.debug("Rejected WebSocket upgrade", { url: req.url });
      socket.write("HTTP/1.1 404 Not Found\r\nConnection: close\r\nContent-Length: 0\r\n\r\n");
      socket.destroy();
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      this.handleConnection(ws, partition, req);
    });
  }

  private handleConnection(ws: WebSocket, partition: PartitionKey, req: IncomingMessage): void {
    const sink: FrameSink = {
      get open() {
        return ws.readyState === WebSocket.OPEN;
      },
      write: (data, done) => ws.send(data, done),
      close: (code, reason) => ws.close(code, reason),
    };
    const connection = new Connection(partition, sink, {
      maxQueuedFrames: this.options.maxQueuedFrames,
    });

    ws.on("message", (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        logger.debug("Ignoring binary frame", { connectionId: connection.id });
        return;
      }
      connection.deliver(rawDataToString(data));
    });

    ws.on("close", (code: number, reason: Buffer) => {
      connection.markClosed(code, reason.toString("utf8"));
    });

    ws.on("error", (error: Error) => {
      logger.error("WebSocket error", error, { connectionId: connection.id });
      connection.fail(error);
    });

    const session = new ConnectionSession(connection, this.registry, this.metricsCache, {
      idleTimeoutMs: this.options.idleTimeoutMs,
    });

    const done = session
      .run()
      .catch((error: unknown) => {
        logger.error("Session failed unexpectedly", error, { connectionId: connection.id });
      })
      .finally(() => {
        this.sessions.delete(session);
        this.emit("sessionClosed", session);
      });
    this.sessions.set(session, done);
    this.emit("sessionOpened", session);

    logger.debug("WebSocket client connected", {
      connectionId: connection.id,
      tenantId: partition.tenantId,
      channel: partition.channel,
      subKey: partition.subKey,
      origin: req.headers.origin,
      sessionCount: this.sessions.size,
    });
  }

  getStats(): { sessionCount: number } {
    return { sessionCount: this.sessions.size };
  }
}
