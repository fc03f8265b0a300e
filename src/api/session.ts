/**
 * Connection Session
 *
 * Drives one connection from handshake to close:
 *
 *   connecting → connected → idle ⇄ processing → closed
 *
 * The session registers its connection, sends the `connected` frame with the
 * tenant's snapshot, then waits for client frames or the idle timeout,
 * answering with pong and heartbeat frames. Whatever ends the loop, the
 * connection is deregistered on the way out.
 */

import { EventEmitter } from "eventemitter3";
import { ClientMessageSchema } from "./schemas.js";
import { logger, type Logger } from "../utils/logger.js";
import { isDomainEventKind, type ClientMessage, type DomainEventKind } from "../types/events.js";
import type { Connection } from "./connection.js";
import type { ConnectionRegistry } from "../store/connection-registry.js";
import type { MetricsCache } from "../store/metrics-cache.js";
import type { SessionState } from "../types/realtime.js";

export interface SessionOptions {
  idleTimeoutMs: number;
}

export interface SessionEvents {
  state: (state: SessionState) => void;
}

export class ConnectionSession extends EventEmitter<SessionEvents> {
  readonly connection: Connection;
  private readonly registry: ConnectionRegistry;
  private readonly metricsCache: MetricsCache;
  private readonly idleTimeoutMs: number;
  private readonly log: Logger;

  private currentState: SessionState = "connecting";
  // Accepted from the client but not used to filter delivery.
  private subscriptions: Set<DomainEventKind> = new Set();

  constructor(
    connection: Connection,
    registry: ConnectionRegistry,
    metricsCache: MetricsCache,
    options: SessionOptions
  ) {
    super();
    this.connection = connection;
    this.registry = registry;
    this.metricsCache = metricsCache;
    this.idleTimeoutMs = options.idleTimeoutMs;
    this.log = logger.child({
      connectionId: connection.id,
      tenantId: connection.tenantId,
      channel: connection.channel,
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  get subscribedEvents(): DomainEventKind[] {
    return Array.from(this.subscriptions);
  }

  /**
   * Run the session until the connection closes. Never rejects.
   */
  async run(): Promise<void> {
    const partition = this.connection.partition;

    // Hold broadcasts until the connected frame is at the head of the queue.
    this.connection.pause();
    this.registry.register(this.connection, partition);

    try {
      const snapshot = await this.metricsCache.get(this.connection.tenantId);
      this.connection.prepend({
        event: "connected",
        timestamp: new Date().toISOString(),
        data: snapshot,
      });
      this.connection.resume();
      this.setState("connected");
      this.log.info("Session connected");

      await this.receiveLoop();
    } catch (error) {
      this.log.warn("Session ended with transport error", {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.registry.deregister(this.connection, partition);
      if (!this.connection.isClosed) {
        this.connection.close(1011, "session ended");
      }
      this.setState("closed");
      this.log.info("Session closed", { durationMs: Date.now() - this.connection.connectedAt });
    }
  }

  private async receiveLoop(): Promise<void> {
    for (;;) {
      this.setState("idle");
      const result = await this.connection.receive(this.idleTimeoutMs);

      switch (result.kind) {
        case "closed":
          this.log.debug("Peer closed connection", { code: result.code, reason: result.reason });
          return;

        case "timeout":
          this.connection.send({ type: "heartbeat", timestamp: new Date().toISOString() });
          break;

        case "message":
          this.setState("processing");
          this.handleClientFrame(result.data);
          break;
      }
    }
  }

  private handleClientFrame(raw: string): void {
    const message = parseClientMessage(raw);
    if (!message) {
      this.log.debug("Ignoring malformed client frame", { length: raw.length });
      return;
    }

    switch (message.type) {
      case "ping":
        this.connection.send({ type: "pong", timestamp: new Date().toISOString() });
        break;

      case "subscribe":
        for (const event of message.events) {
          if (isDomainEventKind(event)) {
            this.subscriptions.add(event);
          }
        }
        this.log.debug("Client subscribed", { events: this.subscribedEvents });
        break;
    }
  }

  private setState(state: SessionState): void {
    if (this.currentState === state) {
      return;
    }
    this.currentState = state;
    this.emit("state", state);
  }
}

/**
 * Parse a client frame. Returns null for anything that is not a known message.
 */
export function parseClientMessage(raw: string): ClientMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = ClientMessageSchema.safeParse(json);
  return result.success ? result.data : null;
}
