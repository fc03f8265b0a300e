/**
 * Metrics Cache
 *
 * Short-TTL cache of per-tenant snapshots. Bursts of connects for one tenant
 * share a single computation, and a failing source degrades to the last good
 * snapshot (or the zeroed one) instead of failing the handshake.
 */

import { emptySnapshot } from "../compute/snapshot.js";
import { logger } from "../utils/logger.js";
import type { SnapshotSource } from "../connectors/interface.js";
import type { MetricsSnapshot } from "../types/metrics.js";

interface CacheEntry {
  snapshot: MetricsSnapshot;
  storedAt: number;
  // Cleared by invalidate(); the snapshot then only serves as a fallback.
  fresh: boolean;
}

export interface MetricsCacheOptions {
  ttlMs: number;
  /** How long a snapshot may serve as the fallback for a failing source */
  maxStaleMs?: number;
}

const DEFAULT_MAX_STALE_MS = 10 * 60 * 1000;

export class MetricsCache {
  private readonly source: SnapshotSource;
  private readonly ttlMs: number;
  private readonly maxStaleMs: number;

  private entries: Map<string, CacheEntry> = new Map();
  private inFlight: Map<string, Promise<MetricsSnapshot>> = new Map();

  constructor(source: SnapshotSource, options: MetricsCacheOptions) {
    this.source = source;
    this.ttlMs = options.ttlMs;
    this.maxStaleMs = Math.max(options.maxStaleMs ?? DEFAULT_MAX_STALE_MS, options.ttlMs);
  }

  /**
   * Snapshot for a tenant, at most `ttlMs` old unless the source is failing.
   * Never rejects.
   */
  get(tenantId: string): Promise<MetricsSnapshot> {
    const entry = this.entries.get(tenantId);
    if (entry && entry.fresh && Date.now() - entry.storedAt < this.ttlMs) {
      return Promise.resolve(entry.snapshot);
    }

    const pending = this.inFlight.get(tenantId);
    if (pending) {
      return pending;
    }

    // invalidate() detaches the promise, so a refresh only stores its result
    // while it is still the tenant's in-flight computation.
    const promise: Promise<MetricsSnapshot> = this.refresh(tenantId, () => this.inFlight.get(tenantId) === promise)
      .finally(() => {
        if (this.inFlight.get(tenantId) === promise) {
          this.inFlight.delete(tenantId);
        }
      });
    this.inFlight.set(tenantId, promise);
    return promise;
  }

  /**
   * Drop the cached snapshot so the next `get` recomputes. Tenants with
   * nothing cached are left without any state.
   */
  invalidate(tenantId: string): void {
    const entry = this.entries.get(tenantId);
    if (entry) {
      entry.fresh = false;
    }
    this.inFlight.delete(tenantId);
  }

  /**
   * Forget snapshots too old to serve even as a fallback.
   * Returns the number of tenants removed.
   */
  prune(): number {
    const now = Date.now();
    let removed = 0;
    for (const [tenantId, entry] of this.entries) {
      if (now - entry.storedAt >= this.maxStaleMs) {
        this.entries.delete(tenantId);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug("Pruned metrics snapshots", { removed, remaining: this.entries.size });
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
  }

  /**
   * Number of tenants with a cached snapshot, fresh or not.
   */
  size(): number {
    return this.entries.size;
  }

  private async refresh(tenantId: string, isCurrent: () => boolean): Promise<MetricsSnapshot> {
    const startTime = Date.now();

    try {
      const snapshot = await this.source.computeSnapshot(tenantId);

      if (isCurrent()) {
        this.entries.set(tenantId, { snapshot, storedAt: Date.now(), fresh: true });
      }

      logger.debug("Computed metrics snapshot", {
        tenantId,
        source: this.source.name,
        durationMs: Date.now() - startTime,
      });
      return snapshot;
    } catch (error) {
      const entry = this.entries.get(tenantId);
      const fallback = entry && Date.now() - entry.storedAt < this.maxStaleMs ? entry.snapshot : undefined;
      logger.warn("Snapshot source failed, serving fallback", {
        tenantId,
        source: this.source.name,
        fallback: fallback ? "stale" : "empty",
        error: error instanceof Error ? error.message : String(error),
      });
      return fallback ?? emptySnapshot(tenantId);
    }
  }
}
