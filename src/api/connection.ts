/**
 * One live client connection.
 *
 * The outbound side is a FIFO drained one write at a time, so frames from
 * broadcasts and from the connection's own session never interleave on the
 * socket. The inbound side buffers client frames until the session asks for
 * the next one with `receive()`.
 */

import { ulid } from "ulidx";
import { BackpressureError, ConnectionClosedError } from "../utils/errors.js";
import type { ChannelKind, FrameTarget, PartitionKey } from "../types/realtime.js";
import type { ServerFrame } from "../types/events.js";

/**
 * Transport underneath a connection. The WebSocket server adapts a `ws`
 * socket to this; tests use an in-memory recorder.
 */
export interface FrameSink {
  readonly open: boolean;
  /** Write one frame; `done` is called once the transport has taken it. */
  write(data: string, done: (error?: Error) => void): void;
  close(code: number, reason: string): void;
}

export type ReceiveResult =
  | { kind: "message"; data: string }
  | { kind: "timeout" }
  | { kind: "closed"; code: number; reason: string };

interface PendingReceive {
  resolve: (result: ReceiveResult) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface ConnectionOptions {
  maxQueuedFrames: number;
}

export class Connection implements FrameTarget {
  readonly id: string = ulid();
  readonly partition: PartitionKey;
  readonly connectedAt = Date.now();

  private readonly sink: FrameSink;
  private readonly maxQueuedFrames: number;

  private outbox: string[] = [];
  private writing = false;
  private paused = false;

  private inbox: string[] = [];
  private pending: PendingReceive | null = null;
  private closeInfo: { code: number; reason: string } | null = null;
  private failure: Error | null = null;

  constructor(partition: PartitionKey, sink: FrameSink, options: ConnectionOptions) {
    this.partition = { ...partition };
    this.sink = sink;
    this.maxQueuedFrames = options.maxQueuedFrames;
  }

  get tenantId(): string {
    return this.partition.tenantId;
  }

  get channel(): ChannelKind {
    return this.partition.channel;
  }

  get isClosed(): boolean {
    return this.closeInfo !== null || this.failure !== null || !this.sink.open;
  }

  get queuedFrames(): number {
    return this.outbox.length;
  }

  // ══════════════════════════════════════════════════════════════════════
  // OUTBOUND
  // ══════════════════════════════════════════════════════════════════════

  send(frame: ServerFrame): void {
    this.sendSerialized(JSON.stringify(frame));
  }

  sendSerialized(data: string): void {
    this.assertWritable();
    this.outbox.push(data);
    this.flush();
  }

  /**
   * Queue a frame ahead of everything already waiting.
   */
  prepend(frame: ServerFrame): void {
    this.assertWritable();
    this.outbox.unshift(JSON.stringify(frame));
    this.flush();
  }

  /**
   * Hold outbound frames in the queue until `resume()`.
   */
  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    this.flush();
  }

  private assertWritable(): void {
    if (this.isClosed) {
      throw new ConnectionClosedError(this.id);
    }
    if (this.outbox.length >= this.maxQueuedFrames) {
      // Overflow fails the connection, which ends its session and closes the socket.
      const error = new BackpressureError(this.id, this.outbox.length);
      this.fail(error, "send queue full");
      throw error;
    }
  }

  private flush(): void {
    if (this.writing || this.paused || this.isClosed) {
      return;
    }
    const data = this.outbox.shift();
    if (data === undefined) {
      return;
    }

    this.writing = true;
    this.sink.write(data, (error) => {
      this.writing = false;
      if (error) {
        this.fail(error);
        return;
      }
      this.flush();
    });
  }

  // ══════════════════════════════════════════════════════════════════════
  // INBOUND
  // ══════════════════════════════════════════════════════════════════════

  /**
   * Hand a client frame to the connection.
   */
  deliver(data: string): void {
    if (this.closeInfo || this.failure) {
      return;
    }
    if (this.pending) {
      this.settle({ kind: "message", data });
      return;
    }
    this.inbox.push(data);
  }

  /**
   * Wait for the next client frame, the close, or `timeoutMs` of silence,
   * whichever comes first. Rejects with the transport error if the
   * connection failed.
   */
  receive(timeoutMs: number): Promise<ReceiveResult> {
    const data = this.inbox.shift();
    if (data !== undefined) {
      return Promise.resolve({ kind: "message", data });
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.closeInfo) {
      return Promise.resolve({ kind: "closed", ...this.closeInfo });
    }
    if (this.pending) {
      return Promise.reject(new Error(`Connection ${this.id} already has a pending receive`));
    }

    return new Promise<ReceiveResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settle({ kind: "timeout" });
      }, timeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  private settle(result: ReceiveResult | Error): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    this.pending = null;
    clearTimeout(pending.timer);
    if (result instanceof Error) {
      pending.reject(result);
    } else {
      pending.resolve(result);
    }
  }

  // ══════════════════════════════════════════════════════════════════════
  // LIFECYCLE
  // ══════════════════════════════════════════════════════════════════════

  /**
   * The peer closed the transport.
   */
  markClosed(code: number, reason: string): void {
    if (this.closeInfo || this.failure) {
      return;
    }
    this.closeInfo = { code, reason };
    this.outbox = [];
    this.settle({ kind: "closed", code, reason });
  }

  /**
   * The transport failed. Pending and future receives reject with `error`.
   */
  fail(error: Error, reason = "transport error"): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.outbox = [];
    this.settle(error);
    if (this.sink.open) {
      this.sink.close(1011, reason);
    }
  }

  /**
   * Close from the server side.
   */
  close(code = 1000, reason = ""): void {
    if (this.sink.open) {
      this.sink.close(code, reason);
    }
    this.markClosed(code, reason);
  }
}
