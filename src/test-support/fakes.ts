/**
 * In-process stand-ins shared by the test suites.
 */

import { DEFAULT_CONFIG, type SystemConfig } from "../utils/config.js";
import { emptySnapshot } from "../compute/snapshot.js";
import type { FrameSink } from "../api/connection.js";
import type { FrameTarget } from "../types/realtime.js";
import type { SnapshotSource } from "../connectors/interface.js";
import type { MetricsSnapshot } from "../types/metrics.js";

/**
 * Records frames written to it. With `autoAck` off, writes stay pending
 * until `ack()` is called.
 */
export class RecordingSink implements FrameSink {
  open = true;
  frames: string[] = [];
  closedWith: { code: number; reason: string } | null = null;
  private pendingDone: Array<(error?: Error) => void> = [];

  constructor(private readonly autoAck = true) {}

  write(data: string, done: (error?: Error) => void): void {
    this.frames.push(data);
    if (this.autoAck) {
      done();
    } else {
      this.pendingDone.push(done);
    }
  }

  close(code: number, reason: string): void {
    this.open = false;
    this.closedWith = { code, reason };
  }

  ack(error?: Error): void {
    const done = this.pendingDone.shift();
    done?.(error);
  }

  parsed(): unknown[] {
    return this.frames.map((frame) => JSON.parse(frame));
  }
}

/**
 * Minimal registry member.
 */
export class FakeTarget implements FrameTarget {
  readonly received: string[] = [];
  failWith: Error | null = null;

  constructor(readonly id: string) {}

  sendSerialized(data: string): void {
    if (this.failWith) {
      throw this.failWith;
    }
    this.received.push(data);
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Snapshot source driven by the test. Defaults to the zeroed snapshot.
 */
export class StubSource implements SnapshotSource {
  readonly name = "stub";
  calls: string[] = [];
  handler: (tenantId: string) => Promise<MetricsSnapshot> = (tenantId) =>
    Promise.resolve(emptySnapshot(tenantId));

  computeSnapshot(tenantId: string): Promise<MetricsSnapshot> {
    this.calls.push(tenantId);
    return this.handler(tenantId);
  }
}

export function snapshotWith(tenantId: string, activeOrders: number): MetricsSnapshot {
  const snapshot = emptySnapshot(tenantId, new Date("2026-01-01T00:00:00.000Z"));
  snapshot.orders.active = activeOrders;
  return snapshot;
}

/**
 * Default configuration bound to loopback on an ephemeral port.
 */
export function testConfig(): SystemConfig {
  const config = structuredClone(DEFAULT_CONFIG);
  config.server.host = "127.0.0.1";
  config.server.port = 0;
  return config;
}

/**
 * Let pending promise callbacks run.
 */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
