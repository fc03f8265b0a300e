import { describe, it, expect } from "vitest";
import { aggregateSnapshot, emptySnapshot, startOfUtcDay, type SnapshotRows } from "./snapshot.js";

const now = new Date("2026-03-10T14:30:00.000Z");

const rows: SnapshotRows = {
  orders: [
    { status: "pending", total_amount: 10, created_at: "2026-03-10T14:05:00.000Z" },
    { status: "preparing", total_amount: "12.50", created_at: "2026-03-10T09:00:00.000Z" },
    { status: "completed", total_amount: 20.1, created_at: "2026-03-10T14:10:00.000Z" },
    { status: "cancelled", total_amount: 100, created_at: "2026-03-10T14:20:00.000Z" },
    { status: "completed", total_amount: null, created_at: "2026-03-10T11:00:00.000Z" },
  ],
  kitchenTickets: [{ status: "pending" }, { status: "preparing" }, { status: "ready" }],
  tables: [
    { status: "available" },
    { status: "available" },
    { status: "occupied" },
    { status: "reserved" },
    { status: "cleaning" },
  ],
  timeClock: [
    { clock_out: null, break_start: null, break_end: null },
    { clock_out: null, break_start: "2026-03-10T13:00:00.000Z", break_end: null },
    { clock_out: null, break_start: "2026-03-10T12:00:00.000Z", break_end: "2026-03-10T12:30:00.000Z" },
    { clock_out: "2026-03-10T10:00:00.000Z", break_start: null, break_end: null },
  ],
};

describe("aggregateSnapshot", () => {
  it("folds store rows into the snapshot", () => {
    expect(aggregateSnapshot("t1", rows, now)).toEqual({
      tenantId: "t1",
      orders: { active: 2, completedToday: 2, pendingKitchen: 2 },
      revenue: { today: 42.6, thisHour: 30.1 },
      tables: { available: 2, occupied: 1, reserved: 1 },
      staff: { clockedIn: 3, onBreak: 1 },
      generatedAt: "2026-03-10T14:30:00.000Z",
    });
  });

  it("treats unparseable amounts as zero", () => {
    const snapshot = aggregateSnapshot(
      "t1",
      {
        orders: [{ status: "completed", total_amount: "n/a", created_at: "2026-03-10T14:00:00.000Z" }],
        kitchenTickets: [],
        tables: [],
        timeClock: [],
      },
      now
    );

    expect(snapshot.revenue).toEqual({ today: 0, thisHour: 0 });
    expect(snapshot.orders.completedToday).toBe(1);
  });

  it("matches the empty snapshot when there are no rows", () => {
    const empty: SnapshotRows = { orders: [], kitchenTickets: [], tables: [], timeClock: [] };
    expect(aggregateSnapshot("t1", empty, now)).toEqual(emptySnapshot("t1", now));
  });
});

describe("startOfUtcDay", () => {
  it("truncates to midnight UTC", () => {
    expect(startOfUtcDay(now).toISOString()).toBe("2026-03-10T00:00:00.000Z");
  });
});
