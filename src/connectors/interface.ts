/**
 * Interface the metrics cache uses to reach the backing store.
 */

import type { MetricsSnapshot } from "../types/metrics.js";

// ══════════════════════════════════════════════════════════════════════
// AGGREGATION SOURCE
// ══════════════════════════════════════════════════════════════════════

export interface SnapshotSource {
  /** Human-readable name for logs */
  readonly name: string;

  /**
   * Compute a fresh snapshot for one tenant. May reject; must be safe to
   * call concurrently for different tenants.
   */
  computeSnapshot(tenantId: string): Promise<MetricsSnapshot>;
}
