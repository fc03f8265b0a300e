import { describe, it, expect, vi, afterEach } from "vitest";
import { MetricsCache } from "./metrics-cache.js";
import { deferred, snapshotWith, StubSource, type Deferred } from "../test-support/fakes.js";
import type { MetricsSnapshot } from "../types/metrics.js";

describe("MetricsCache", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("serves the cached snapshot until the TTL runs out", async () => {
    vi.useFakeTimers();
    const source = new StubSource();
    source.handler = (tenantId) => Promise.resolve(snapshotWith(tenantId, source.calls.length));
    const cache = new MetricsCache(source, { ttlMs: 5000 });

    const first = await cache.get("t1");
    await vi.advanceTimersByTimeAsync(4999);
    expect(await cache.get("t1")).toBe(first);
    expect(source.calls).toEqual(["t1"]);

    await vi.advanceTimersByTimeAsync(1);
    const second = await cache.get("t1");
    expect(second.orders.active).toBe(2);
    expect(source.calls).toEqual(["t1", "t1"]);
  });

  it("shares one computation between concurrent callers", async () => {
    const source = new StubSource();
    const pending = deferred<MetricsSnapshot>();
    source.handler = () => pending.promise;
    const cache = new MetricsCache(source, { ttlMs: 5000 });

    const a = cache.get("t1");
    const b = cache.get("t1");
    pending.resolve(snapshotWith("t1", 3));

    const [snapshotA, snapshotB] = await Promise.all([a, b]);
    expect(snapshotA).toBe(snapshotB);
    expect(source.calls).toEqual(["t1"]);
  });

  it("computes each tenant separately", async () => {
    const source = new StubSource();
    const cache = new MetricsCache(source, { ttlMs: 5000 });

    const [t1, t2] = await Promise.all([cache.get("t1"), cache.get("t2")]);

    expect(t1.tenantId).toBe("t1");
    expect(t2.tenantId).toBe("t2");
    expect(source.calls).toEqual(["t1", "t2"]);
    expect(cache.size()).toBe(2);
  });

  it("recomputes after invalidate", async () => {
    const source = new StubSource();
    const cache = new MetricsCache(source, { ttlMs: 60000 });

    await cache.get("t1");
    cache.invalidate("t1");
    await cache.get("t1");

    expect(source.calls).toEqual(["t1", "t1"]);
  });

  it("does not cache a result computed before an invalidate", async () => {
    const source = new StubSource();
    const computations: Deferred<MetricsSnapshot>[] = [];
    source.handler = () => {
      const next = deferred<MetricsSnapshot>();
      computations.push(next);
      return next.promise;
    };
    const cache = new MetricsCache(source, { ttlMs: 60000 });

    const stale = cache.get("t1");
    cache.invalidate("t1");
    computations[0].resolve(snapshotWith("t1", 1));
    expect((await stale).orders.active).toBe(1);

    const fresh = cache.get("t1");
    expect(source.calls).toHaveLength(2);
    computations[1].resolve(snapshotWith("t1", 2));
    expect((await fresh).orders.active).toBe(2);
  });

  it("falls back to the last good snapshot when the source fails", async () => {
    vi.useFakeTimers();
    const source = new StubSource();
    const cache = new MetricsCache(source, { ttlMs: 1000 });
    source.handler = (tenantId) => Promise.resolve(snapshotWith(tenantId, 7));
    const good = await cache.get("t1");

    await vi.advanceTimersByTimeAsync(1000);
    source.handler = () => Promise.reject(new Error("store unavailable"));

    expect(await cache.get("t1")).toBe(good);
    expect(source.calls).toHaveLength(2);
  });

  it("leaves no state behind when invalidating a tenant it never computed", () => {
    const cache = new MetricsCache(new StubSource(), { ttlMs: 5000 });

    for (let i = 0; i < 1000; i++) {
      cache.invalidate(`idle-${i}`);
    }

    expect(cache.size()).toBe(0);
  });

  it("keeps an invalidated snapshot only as a fallback", async () => {
    const source = new StubSource();
    source.handler = (tenantId) => Promise.resolve(snapshotWith(tenantId, 7));
    const cache = new MetricsCache(source, { ttlMs: 60000 });
    const good = await cache.get("t1");

    cache.invalidate("t1");
    expect(cache.size()).toBe(1);
    source.handler = () => Promise.reject(new Error("store unavailable"));

    expect(await cache.get("t1")).toBe(good);
    expect(source.calls).toHaveLength(2);
  });

  it("stops serving a fallback older than maxStaleMs", async () => {
    vi.useFakeTimers();
    const source = new StubSource();
    source.handler = (tenantId) => Promise.resolve(snapshotWith(tenantId, 7));
    const cache = new MetricsCache(source, { ttlMs: 1000, maxStaleMs: 10000 });
    await cache.get("t1");

    await vi.advanceTimersByTimeAsync(10000);
    source.handler = () => Promise.reject(new Error("store unavailable"));

    expect((await cache.get("t1")).orders.active).toBe(0);
  });

  it("prunes snapshots older than maxStaleMs", async () => {
    vi.useFakeTimers();
    const source = new StubSource();
    const cache = new MetricsCache(source, { ttlMs: 1000, maxStaleMs: 10000 });
    await cache.get("t1");
    await vi.advanceTimersByTimeAsync(5000);
    await cache.get("t2");

    await vi.advanceTimersByTimeAsync(5000);
    expect(cache.prune()).toBe(1);
    expect(cache.size()).toBe(1);

    await vi.advanceTimersByTimeAsync(5000);
    expect(cache.prune()).toBe(1);
    expect(cache.size()).toBe(0);
  });

  it("falls back to the empty snapshot when nothing was ever computed", async () => {
    const source = new StubSource();
    source.handler = () => Promise.reject(new Error("store unavailable"));
    const cache = new MetricsCache(source, { ttlMs: 1000 });

    const snapshot = await cache.get("t1");

    expect(snapshot).toMatchObject({
      tenantId: "t1",
      orders: { active: 0, completedToday: 0, pendingKitchen: 0 },
      revenue: { today: 0, thisHour: 0 },
      tables: { available: 0, occupied: 0, reserved: 0 },
      staff: { clockedIn: 0, onBreak: 0 },
    });
    expect(cache.size()).toBe(0);
  });

  it("survives a source that throws synchronously", async () => {
    const source = new StubSource();
    source.handler = () => {
      throw new Error("boom");
    };
    const cache = new MetricsCache(source, { ttlMs: 1000 });

    expect((await cache.get("t1")).tenantId).toBe("t1");

    source.handler = (tenantId) => Promise.resolve(snapshotWith(tenantId, 4));
    expect((await cache.get("t1")).orders.active).toBe(4);
  });

  it("forgets everything on clear", async () => {
    const source = new StubSource();
    const cache = new MetricsCache(source, { ttlMs: 60000 });
    await cache.get("t1");

    cache.clear();
    expect(cache.size()).toBe(0);

    await cache.get("t1");
    expect(source.calls).toEqual(["t1", "t1"]);
  });
});
