/**
 * Runtime schemas for everything that crosses the process boundary:
 * client frames on the socket and event payloads on the ingest endpoint.
 *
 * Records use passthrough() so store columns we do not model survive the
 * round trip to the dashboard unchanged.
 */

import { z } from "zod";

// ══════════════════════════════════════════════════════════════════════
// DOMAIN RECORDS
// ══════════════════════════════════════════════════════════════════════

export const OrderRecordSchema = z
  .object({
    id: z.string().min(1),
    status: z.string().min(1),
    orderNumber: z.string().optional(),
    tableId: z.string().nullable().optional(),
    totalAmount: z.number().optional(),
  })
  .passthrough();

export const TableRecordSchema = z
  .object({
    id: z.string().min(1),
    status: z.enum(["available", "occupied", "reserved", "cleaning", "maintenance"]),
    tableNumber: z.string().optional(),
    locationId: z.string().min(1).nullable().optional(),
  })
  .passthrough();

export const KitchenTicketSchema = z
  .object({
    id: z.string().min(1),
    orderId: z.string().min(1),
    status: z.enum(["pending", "preparing", "ready", "served", "cancelled"]),
    station: z.string().min(1).nullable().optional(),
    priority: z.number().int().optional(),
  })
  .passthrough();

export const InventoryItemSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    currentStock: z.number(),
    reorderPoint: z.number().optional(),
    unit: z.string().optional(),
  })
  .passthrough();

export const StaffShiftSchema = z
  .object({
    id: z.string().min(1),
    staffId: z.string().min(1),
    name: z.string().optional(),
    clockIn: z.string().optional(),
    clockOut: z.string().nullable().optional(),
  })
  .passthrough();

// ══════════════════════════════════════════════════════════════════════
// EVENT PAYLOADS
// ══════════════════════════════════════════════════════════════════════

export const OrderUpdateSchema = z.object({
  type: z.enum(["new_order", "order_updated", "status_changed", "order_cancelled"]),
  order: OrderRecordSchema,
});

export const TableUpdateSchema = z.object({
  type: z.enum(["table_created", "table_updated", "table_assigned", "table_released"]),
  table: TableRecordSchema,
});

export const KdsUpdateSchema = z.object({
  type: z.enum(["new_order", "order_status_updated", "order_priority", "order_late"]),
  order: KitchenTicketSchema,
});

export const InventoryAlertSchema = z.object({
  type: z.enum(["low_stock", "out_of_stock", "expiring"]),
  item: InventoryItemSchema,
});

export const StaffUpdateSchema = z.object({
  type: z.enum(["clock_in", "clock_out", "break_start", "break_end"]),
  staff: StaffShiftSchema,
});

export const RevenueUpdateSchema = z.object({
  today: z.number(),
  thisHour: z.number(),
  orderCount: z.number().int().nonnegative().optional(),
  currency: z.string().length(3).optional(),
});

/**
 * Body of POST /api/v1/events/:tenantId.
 */
export const PublishRequestSchema = z.discriminatedUnion("event", [
  z.object({ event: z.literal("order_update"), data: OrderUpdateSchema }),
  z.object({ event: z.literal("table_update"), data: TableUpdateSchema }),
  z.object({ event: z.literal("kds_update"), data: KdsUpdateSchema }),
  z.object({ event: z.literal("inventory_alert"), data: InventoryAlertSchema }),
  z.object({ event: z.literal("staff_update"), data: StaffUpdateSchema }),
  z.object({ event: z.literal("revenue_update"), data: RevenueUpdateSchema }),
]);

// ══════════════════════════════════════════════════════════════════════
// CLIENT FRAMES
// ══════════════════════════════════════════════════════════════════════

export const ClientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("ping") }),
  z.object({ type: z.literal("subscribe"), events: z.array(z.string()) }),
]);
