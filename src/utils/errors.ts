/**
 * Error taxonomy for the realtime layer.
 *
 * Every error carries a stable `code` so log lines and HTTP responses can be
 * matched without parsing messages.
 */

export type RealtimeErrorCode =
  | "CONNECTION_CLOSED"
  | "BACKPRESSURE"
  | "SNAPSHOT_SOURCE"
  | "CONFIG_INVALID";

export class RealtimeError extends Error {
  readonly code: RealtimeErrorCode;

  constructor(code: RealtimeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RealtimeError";
    this.code = code;
  }
}

/**
 * Raised when a frame is sent to a connection whose transport is gone.
 */
export class ConnectionClosedError extends RealtimeError {
  constructor(connectionId: string) {
    super("CONNECTION_CLOSED", `Connection ${connectionId} is closed`);
    this.name = "ConnectionClosedError";
  }
}

/**
 * Raised when a connection's outbound queue is full. The client is reading
 * slower than events are produced.
 */
export class BackpressureError extends RealtimeError {
  readonly queued: number;

  constructor(connectionId: string, queued: number) {
    super("BACKPRESSURE", `Connection ${connectionId} has ${queued} frames queued`);
    this.name = "BackpressureError";
    this.queued = queued;
  }
}

export class SnapshotSourceError extends RealtimeError {
  readonly table: string;

  constructor(table: string, message: string, options?: { cause?: unknown }) {
    super("SNAPSHOT_SOURCE", `Failed to query ${table}: ${message}`, options);
    this.name = "SnapshotSourceError";
    this.table = table;
  }
}

export class ConfigError extends RealtimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_INVALID", message, options);
    this.name = "ConfigError";
  }
}
