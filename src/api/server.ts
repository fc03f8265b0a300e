/**
 * HTTP API Server
 *
 * Health probes, the realtime metrics snapshot, registry statistics and the
 * event ingest endpoint other services use to push domain events. The
 * WebSocket API is attached to the same listener.
 */

import { createServer, IncomingMessage, ServerResponse } from "http";
import type { AddressInfo } from "net";
import { timingSafeEqual } from "crypto";
import { URL } from "url";
import { PublishRequestSchema } from "./schemas.js";
import { logger } from "../utils/logger.js";
import { isValidTenantId } from "../types/realtime.js";
import type { EventPublisher } from "./publisher.js";
import type { WebSocketAPI } from "./websocket.js";
import type { ConnectionRegistry } from "../store/connection-registry.js";
import type { MetricsCache } from "../store/metrics-cache.js";

interface ApiServerOptions {
  port: number;
  host: string;
  registry: ConnectionRegistry;
  metricsCache: MetricsCache;
  publisher: EventPublisher;
  webSocketAPI?: WebSocketAPI;
  ingest: {
    token: string | null;
    maxBodyBytes: number;
  };
}

const SERVICE_NAME = "ops-dashboard-realtime";
const VERSION = "0.1.0";

class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body, null, 2));
}

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

export class ApiServer {
  private server: ReturnType<typeof createServer> | null = null;
  private readonly options: ApiServerOptions;
  private readonly startedAt = Date.now();
  private ready = false;

  constructor(options: ApiServerOptions) {
    this.options = options;
  }

  /**
   * Start the API server.
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          this.handleError(res, error);
        });
      });
      this.server = server;

      server.once("error", (error: NodeJS.ErrnoException) => {
        if (error.code === "EADDRINUSE") {
          logger.error(`Port ${this.options.port} is already in use`, error);
        } else {
          logger.error("API server error", error);
        }
        reject(error);
      });

      server.listen(this.options.port, this.options.host, () => {
        this.options.webSocketAPI?.start(server);
        this.ready = true;
        logger.info("API server started", { host: this.options.host, port: this.port });
        resolve();
      });
    });
  }

  /**
   * Stop the API server.
   */
  async stop(): Promise<void> {
    this.ready = false;
    await this.options.webSocketAPI?.stop();

    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close(() => {
        logger.info("API server stopped");
        resolve();
      });
    });
  }

  /**
   * Bound port (differs from the configured one when that was 0).
   */
  get port(): number {
    const address: AddressInfo | string | null | undefined = this.server?.address();
    return address !== null && typeof address === "object" ? address.port : this.options.port;
  }

  /**
   * Handle incoming HTTP request.
   */
  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const startTime = Date.now();
    const url = new URL(req.url || "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      const segments = url.pathname.split("/").filter((segment) => segment.length > 0);
      const route = `${method} /${segments.join("/")}`;

      if (route === "GET /") {
        this.handleRoot(res);
      } else if (route === "GET /health") {
        this.handleHealth(res);
      } else if (route === "GET /health/live") {
        sendJson(res, 200, { status: "alive" });
      } else if (route === "GET /health/ready") {
        sendJson(res, this.ready ? 200 : 503, { status: this.ready ? "ready" : "starting" });
      } else if (route === "GET /api/v1/realtime/connections") {
        this.handleConnections(res);
      } else if (method === "GET" && this.matches(segments, ["api", "v1", "analytics", "real-time", "*"])) {
        await this.handleRealtimeMetrics(res, segments[4]);
      } else if (method === "POST" && this.matches(segments, ["api", "v1", "metrics", "*", "invalidate"])) {
        this.handleInvalidate(res, segments[3]);
      } else if (method === "POST" && this.matches(segments, ["api", "v1", "events", "*"])) {
        await this.handlePublish(req, res, segments[3]);
      } else {
        sendJson(res, 404, { error: "Not found" });
      }
    } finally {
      logger.debug("API request", {
        method,
        path: url.pathname,
        durationMs: Date.now() - startTime,
      });
    }
  }

  private matches(segments: string[], pattern: string[]): boolean {
    return (
      segments.length === pattern.length &&
      pattern.every((part, index) => part === "*" || part === segments[index])
    );
  }

  private tenantFrom(segment: string): string {
    let tenantId: string;
    try {
      tenantId = decodeURIComponent(segment);
    } catch {
      throw new HttpError(400, "Invalid tenant id");
    }
    if (!isValidTenantId(tenantId)) {
      throw new HttpError(400, "Invalid tenant id");
    }
    return tenantId;
  }

  /**
   * Root endpoint - API information.
   */
  private handleRoot(res: ServerResponse): void {
    sendJson(res, 200, {
      service: SERVICE_NAME,
      version: VERSION,
      status: "running",
      timestamp: new Date().toISOString(),
      endpoints: {
        health: ["/health", "/health/live", "/health/ready"],
        realtimeMetrics: "/api/v1/analytics/real-time/:tenantId",
        invalidateMetrics: "POST /api/v1/metrics/:tenantId/invalidate",
        publish: "POST /api/v1/events/:tenantId",
        connections: "/api/v1/realtime/connections",
        websocket: ["dashboard/:tenantId", "kds/:tenantId?station=", "tables/:tenantId?location_id="],
      },
    });
  }

  /**
   * Health check endpoint.
   */
  private handleHealth(res: ServerResponse): void {
    sendJson(res, 200, {
      status: "healthy",
      service: SERVICE_NAME,
      timestamp: new Date().toISOString(),
      uptimeMs: Date.now() - this.startedAt,
      realtime: {
        ...this.options.registry.getStats(),
        sessions: this.options.webSocketAPI?.getStats().sessionCount ?? 0,
        cachedSnapshots: this.options.metricsCache.size(),
      },
    });
  }

  private handleConnections(res: ServerResponse): void {
    sendJson(res, 200, {
      stats: this.options.registry.getStats(),
      partitions: this.options.registry.listPartitions().map((key) => ({
        ...key,
        connections: this.options.registry.count(key),
      })),
    });
  }

  private async handleRealtimeMetrics(res: ServerResponse, segment: string): Promise<void> {
    const tenantId = this.tenantFrom(segment);
    const snapshot = await this.options.metricsCache.get(tenantId);
    sendJson(res, 200, snapshot);
  }

  private handleInvalidate(res: ServerResponse, segment: string): void {
    const tenantId = this.tenantFrom(segment);
    this.options.metricsCache.invalidate(tenantId);
    res.writeHead(204);
    res.end();
  }

  /**
   * Ingest a domain event from another service.
   */
  private async handlePublish(req: IncomingMessage, res: ServerResponse, segment: string): Promise<void> {
    const tenantId = this.tenantFrom(segment);
    this.authorizeIngest(req);

    const body = await this.readBody(req);
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new HttpError(400, "Body must be valid JSON");
    }

    const parsed = PublishRequestSchema.safeParse(json);
    if (!parsed.success) {
      sendJson(res, 400, {
        error: "Invalid event",
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      });
      return;
    }

    this.options.publisher.publish(tenantId, parsed.data);
    sendJson(res, 202, { accepted: true, event: parsed.data.event });
  }

  private authorizeIngest(req: IncomingMessage): void {
    const token = this.options.ingest.token;
    if (token === null) {
      return;
    }
    const header = req.headers.authorization ?? "";
    const provided = header.startsWith("Bearer ") ? header.slice("Bearer ".length) : "";
    if (!tokensMatch(token, provided)) {
      throw new HttpError(401, "Unauthorized");
    }
  }

  private readBody(req: IncomingMessage): Promise<string> {
    const limit = this.options.ingest.maxBodyBytes;

    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;

      req.on("data", (chunk: Buffer) => {
        size += chunk.length;
        // Keep draining so the 413 can still be written on this socket.
        if (size <= limit) {
          chunks.push(chunk);
        }
      });
      req.on("end", () => {
        if (size > limit) {
          reject(new HttpError(413, `Body exceeds ${limit} bytes`));
          return;
        }
        resolve(Buffer.concat(chunks).toString("utf8"));
      });
      req.on("error", reject);
    });
  }

  /**
   * Handle errors.
   */
  private handleError(res: ServerResponse, error: unknown): void {
    if (error instanceof HttpError) {
      sendJson(res, error.status, { error: error.message });
      return;
    }

    logger.error("API error", error);
    if (res.headersSent) {
      res.end();
      return;
    }
    sendJson(res, 500, { error: "Internal server error" });
  }
}
