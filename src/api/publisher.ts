/**
 * Event Publisher
 *
 * Typed entry points for domain code. Each call stamps the event, resolves
 * the partitions it belongs to and broadcasts once per partition. Delivery is
 * best effort; nothing is returned to the caller.
 */

import { logger } from "../utils/logger.js";
import type { ConnectionRegistry } from "../store/connection-registry.js";
import type { MetricsCache } from "../store/metrics-cache.js";
import type { PartitionKey } from "../types/realtime.js";
import type {
  DomainEvent,
  DomainEventKind,
  EventInput,
  InventoryAlert,
  KdsUpdate,
  OrderUpdate,
  RevenueUpdate,
  StaffUpdate,
  TableUpdate,
} from "../types/events.js";

export interface EventPublisherOptions {
  /** Invalidate the tenant's cached snapshot after events that change it */
  invalidateOnEvent: boolean;
}

/**
 * Partitions an event is delivered to.
 */
export function resolvePartitions(tenantId: string, event: EventInput): PartitionKey[] {
  const dashboard: PartitionKey = { tenantId, channel: "dashboard" };

  switch (event.event) {
    case "order_update":
    case "inventory_alert":
    case "staff_update":
    case "revenue_update":
      return [dashboard];

    case "table_update": {
      const partitions: PartitionKey[] = [dashboard, { tenantId, channel: "table-view" }];
      const locationId = event.data.table.locationId;
      if (locationId) {
        partitions.push({ tenantId, channel: "table-view", subKey: locationId });
      }
      return partitions;
    }

    case "kds_update": {
      const partitions: PartitionKey[] = [{ tenantId, channel: "kitchen-display" }];
      const station = event.data.order.station;
      if (station) {
        partitions.push({ tenantId, channel: "kitchen-display", subKey: station });
      }
      return partitions;
    }

    default: {
      const unreachable: never = event;
      throw new Error(`Unhandled event kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Whether an event kind changes figures in the metrics snapshot.
 */
export function affectsSnapshot(kind: DomainEventKind): boolean {
  return kind !== "inventory_alert";
}

export class EventPublisher {
  private readonly registry: ConnectionRegistry;
  private readonly metricsCache: MetricsCache;
  private readonly invalidateOnEvent: boolean;

  constructor(registry: ConnectionRegistry, metricsCache: MetricsCache, options: EventPublisherOptions) {
    this.registry = registry;
    this.metricsCache = metricsCache;
    this.invalidateOnEvent = options.invalidateOnEvent;
  }

  publishOrderUpdate(tenantId: string, data: OrderUpdate): void {
    this.publish(tenantId, { event: "order_update", data });
  }

  publishTableUpdate(tenantId: string, data: TableUpdate): void {
    this.publish(tenantId, { event: "table_update", data });
  }

  publishKdsUpdate(tenantId: string, data: KdsUpdate): void {
    this.publish(tenantId, { event: "kds_update", data });
  }

  publishInventoryAlert(tenantId: string, data: InventoryAlert): void {
    this.publish(tenantId, { event: "inventory_alert", data });
  }

  publishStaffUpdate(tenantId: string, data: StaffUpdate): void {
    this.publish(tenantId, { event: "staff_update", data });
  }

  publishRevenueUpdate(tenantId: string, data: RevenueUpdate): void {
    this.publish(tenantId, { event: "revenue_update", data });
  }

  /**
   * Publish any domain event.
   */
  publish(tenantId: string, input: EventInput): void {
    if (this.invalidateOnEvent && affectsSnapshot(input.event)) {
      this.metricsCache.invalidate(tenantId);
    }

    const frame: DomainEvent = { ...input, timestamp: new Date().toISOString() };

    let recipients = 0;
    for (const partition of resolvePartitions(tenantId, input)) {
      recipients += this.registry.broadcast(partition, frame);
    }

    logger.debug("Published event", { tenantId, event: input.event, recipients });
  }
}
