/**
 * Event and wire frame types for the realtime API.
 */

import type { z } from "zod";
import type {
  ClientMessageSchema,
  InventoryAlertSchema,
  KdsUpdateSchema,
  KitchenTicketSchema,
  OrderUpdateSchema,
  RevenueUpdateSchema,
  StaffUpdateSchema,
  TableRecordSchema,
  TableUpdateSchema,
} from "../api/schemas.js";
import type { MetricsSnapshot } from "./metrics.js";

export type OrderUpdate = z.infer<typeof OrderUpdateSchema>;
export type TableRecord = z.infer<typeof TableRecordSchema>;
export type TableUpdate = z.infer<typeof TableUpdateSchema>;
export type KitchenTicket = z.infer<typeof KitchenTicketSchema>;
export type KdsUpdate = z.infer<typeof KdsUpdateSchema>;
export type InventoryAlert = z.infer<typeof InventoryAlertSchema>;
export type StaffUpdate = z.infer<typeof StaffUpdateSchema>;
export type RevenueUpdate = z.infer<typeof RevenueUpdateSchema>;

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// ══════════════════════════════════════════════════════════════════════
// DOMAIN EVENTS
// ══════════════════════════════════════════════════════════════════════

/**
 * Payload type per domain event kind.
 */
export interface EventPayloads {
  order_update: OrderUpdate;
  table_update: TableUpdate;
  kds_update: KdsUpdate;
  inventory_alert: InventoryAlert;
  staff_update: StaffUpdate;
  revenue_update: RevenueUpdate;
}

export type DomainEventKind = keyof EventPayloads;

export const DOMAIN_EVENT_KINDS: readonly DomainEventKind[] = [
  "order_update",
  "table_update",
  "kds_update",
  "inventory_alert",
  "staff_update",
  "revenue_update",
];

export function isDomainEventKind(value: string): value is DomainEventKind {
  return DOMAIN_EVENT_KINDS.some((kind) => kind === value);
}

/**
 * A domain event as it goes over the wire. Distributes over K, so
 * `DomainEvent` alone is the tagged union of every kind.
 */
export type DomainEvent<K extends DomainEventKind = DomainEventKind> = {
  [P in K]: {
    event: P;
    timestamp: string; // ISO-8601
    data: EventPayloads[P];
  };
}[K];

/**
 * A domain event before it is stamped.
 */
export type EventInput = {
  [P in DomainEventKind]: { event: P; data: EventPayloads[P] };
}[DomainEventKind];

export interface ConnectedEvent {
  event: "connected";
  timestamp: string;
  data: MetricsSnapshot;
}

export interface ProtocolFrame {
  type: "pong" | "heartbeat";
  timestamp: string;
}

/**
 * Everything the server ever writes to a client.
 */
export type ServerFrame = DomainEvent | ConnectedEvent | ProtocolFrame;
