/**
 * Snapshot aggregation.
 *
 * Pure functions that fold rows from the operational store into a
 * MetricsSnapshot. Kept apart from the HTTP client so the counting rules can
 * be tested without a store.
 */

import type { MetricsSnapshot } from "../types/metrics.js";

export interface OrderRow {
  status: string;
  total_amount: number | string | null;
  created_at: string;
}

export interface KitchenTicketRow {
  status: string;
}

export interface TableRow {
  status: string;
}

export interface TimeClockRow {
  clock_out: string | null;
  break_start: string | null;
  break_end: string | null;
}

export interface SnapshotRows {
  orders: OrderRow[];          // today's orders
  kitchenTickets: KitchenTicketRow[];
  tables: TableRow[];
  timeClock: TimeClockRow[];   // open shifts
}

const ACTIVE_ORDER_STATUSES = new Set(["pending", "active", "preparing"]);
const PENDING_KITCHEN_STATUSES = new Set(["pending", "preparing"]);

/**
 * The zeroed snapshot served when nothing better is available.
 */
export function emptySnapshot(tenantId: string, now: Date = new Date()): MetricsSnapshot {
  return {
    tenantId,
    orders: { active: 0, completedToday: 0, pendingKitchen: 0 },
    revenue: { today: 0, thisHour: 0 },
    tables: { available: 0, occupied: 0, reserved: 0 },
    staff: { clockedIn: 0, onBreak: 0 },
    generatedAt: now.toISOString(),
  };
}

/**
 * Start of the current UTC day, the boundary for "today" figures.
 */
export function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

function toAmount(value: number | string | null): number {
  if (value === null) {
    return 0;
  }
  const amount = typeof value === "number" ? value : Number.parseFloat(value);
  return Number.isFinite(amount) ? amount : 0;
}

function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

export function aggregateSnapshot(tenantId: string, rows: SnapshotRows, now: Date = new Date()): MetricsSnapshot {
  const snapshot = emptySnapshot(tenantId, now);
  const hourStart = now.getTime() - (now.getTime() % 3_600_000);

  let revenueToday = 0;
  let revenueThisHour = 0;

  for (const order of rows.orders) {
    if (ACTIVE_ORDER_STATUSES.has(order.status)) {
      snapshot.orders.active++;
    } else if (order.status === "completed") {
      snapshot.orders.completedToday++;
    }

    // Cancelled orders never count as revenue
    if (order.status === "cancelled") {
      continue;
    }
    const amount = toAmount(order.total_amount);
    revenueToday += amount;
    if (Date.parse(order.created_at) >= hourStart) {
      revenueThisHour += amount;
    }
  }

  snapshot.revenue.today = roundCurrency(revenueToday);
  snapshot.revenue.thisHour = roundCurrency(revenueThisHour);

  snapshot.orders.pendingKitchen = rows.kitchenTickets.filter((ticket) =>
    PENDING_KITCHEN_STATUSES.has(ticket.status)
  ).length;

  for (const table of rows.tables) {
    if (table.status === "available") {
      snapshot.tables.available++;
    } else if (table.status === "occupied") {
      snapshot.tables.occupied++;
    } else if (table.status === "reserved") {
      snapshot.tables.reserved++;
    }
  }

  for (const shift of rows.timeClock) {
    if (shift.clock_out !== null) {
      continue;
    }
    snapshot.staff.clockedIn++;
    if (shift.break_start !== null && shift.break_end === null) {
      snapshot.staff.onBreak++;
    }
  }

  return snapshot;
}
