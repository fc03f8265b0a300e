import { describe, it, expect, afterEach } from "vitest";
import { WebSocket, type RawData } from "ws";
import { resolveEndpoint } from "./websocket.js";
import { createApp, type App } from "../app.js";
import { snapshotWith, StubSource, testConfig } from "../test-support/fakes.js";

describe("resolveEndpoint", () => {
  const prefix = "/api/v1/ws";

  it("maps each endpoint to its channel", () => {
    expect(resolveEndpoint(prefix, "/api/v1/ws/dashboard/t1")).toEqual({ tenantId: "t1", channel: "dashboard" });
    expect(resolveEndpoint(prefix, "/api/v1/ws/kds/t1")).toEqual({ tenantId: "t1", channel: "kitchen-display" });
    expect(resolveEndpoint(prefix, "/api/v1/ws/tables/t1")).toEqual({ tenantId: "t1", channel: "table-view" });
  });

  it("reads the sub-key from the endpoint's query parameter", () => {
    expect(resolveEndpoint(prefix, "/api/v1/ws/kds/t1?station=grill")).toEqual({
      tenantId: "t1",
      channel: "kitchen-display",
      subKey: "grill",
    });
    expect(resolveEndpoint(prefix, "/api/v1/ws/tables/t1?location_id=patio")).toEqual({
      tenantId: "t1",
      channel: "table-view",
      subKey: "patio",
    });
    expect(resolveEndpoint(prefix, "/api/v1/ws/dashboard/t1?station=grill")).toEqual({
      tenantId: "t1",
      channel: "dashboard",
    });
    expect(resolveEndpoint(prefix, "/api/v1/ws/kds/t1?station=")).toEqual({
      tenantId: "t1",
      channel: "kitchen-display",
    });
  });

  it("accepts a prefix with a trailing slash", () => {
    expect(resolveEndpoint("/ws/", "/ws/dashboard/t1")).toEqual({ tenantId: "t1", channel: "dashboard" });
  });

  it("rejects unknown paths and invalid tenant ids", () => {
    expect(resolveEndpoint(prefix, "/api/v1/ws/reports/t1")).toBeNull();
    expect(resolveEndpoint(prefix, "/api/v1/ws/dashboard")).toBeNull();
    expect(resolveEndpoint(prefix, "/api/v1/ws/dashboard/t1/extra")).toBeNull();
    expect(resolveEndpoint(prefix, "/other/dashboard/t1")).toBeNull();
    expect(resolveEndpoint(prefix, "/api/v1/ws/dashboard/bad%20id")).toBeNull();
    expect(resolveEndpoint(prefix, "/api/v1/ws/dashboard/%E0%A4%A")).toBeNull();
    expect(resolveEndpoint(prefix, "/api/v1/ws/toString/t1")).toBeNull();
  });
});

/**
 * Collects incoming frames so tests can await them in order.
 */
function frameReader(ws: WebSocket) {
  const frames: unknown[] = [];
  const waiters: Array<(frame: unknown) => void> = [];

  ws.on("message", (data: RawData) => {
    const frame: unknown = JSON.parse(data.toString());
    const waiter = waiters.shift();
    if (waiter) {
      waiter(frame);
    } else {
      frames.push(frame);
    }
  });

  return {
    next(): Promise<unknown> {
      if (frames.length > 0) {
        return Promise.resolve(frames.shift());
      }
      return new Promise((resolve) => waiters.push(resolve));
    },
  };
}

function waitForClose(ws: WebSocket): Promise<number> {
  return new Promise((resolve) => ws.once("close", (code: number) => resolve(code)));
}

describe("WebSocketAPI", () => {
  let app: App | null = null;
  const sockets: WebSocket[] = [];

  afterEach(async () => {
    for (const ws of sockets.splice(0)) {
      ws.terminate();
    }
    await app?.apiServer.stop();
    app = null;
  });

  async function startApp(): Promise<{ app: App; url: (path: string) => string }> {
    const source = new StubSource();
    source.handler = (tenantId) => Promise.resolve(snapshotWith(tenantId, 2));
    const started = createApp(testConfig(), source);
    await started.apiServer.start();
    app = started;
    return { app: started, url: (path) => `ws://127.0.0.1:${started.apiServer.port}/api/v1/ws${path}` };
  }

  function connect(url: string): WebSocket {
    const ws = new WebSocket(url);
    sockets.push(ws);
    return ws;
  }

  it("greets with the snapshot and relays published events", async () => {
    const { app, url } = await startApp();
    const ws = connect(url("/dashboard/t1"));
    const reader = frameReader(ws);

    expect(await reader.next()).toMatchObject({ event: "connected", data: snapshotWith("t1", 2) });
    expect(app.registry.count({ tenantId: "t1", channel: "dashboard" })).toBe(1);

    app.publisher.publishRevenueUpdate("t1", { today: 99.5, thisHour: 10 });
    expect(await reader.next()).toMatchObject({ event: "revenue_update", data: { today: 99.5, thisHour: 10 } });

    ws.send(JSON.stringify({ type: "ping" }));
    expect(await reader.next()).toMatchObject({ type: "pong" });
  });

  it("routes kitchen tickets by station", async () => {
    const { app, url } = await startApp();
    const grill = connect(url("/kds/t1?station=grill"));
    const fry = connect(url("/kds/t1?station=fry"));
    const grillReader = frameReader(grill);
    const fryReader = frameReader(fry);
    await grillReader.next();
    await fryReader.next();

    app.publisher.publishKdsUpdate("t1", {
      type: "new_order",
      order: { id: "k-1", orderId: "o-1", status: "pending", station: "fry" },
    });
    app.publisher.publishRevenueUpdate("t1", { today: 1, thisHour: 1 });
    app.publisher.publishKdsUpdate("t1", {
      type: "order_late",
      order: { id: "k-2", orderId: "o-2", status: "preparing", station: "grill" },
    });

    expect(await fryReader.next()).toMatchObject({ event: "kds_update", data: { order: { id: "k-1" } } });
    expect(await grillReader.next()).toMatchObject({ event: "kds_update", data: { order: { id: "k-2" } } });
  });

  it("deregisters a connection when the client goes away", async () => {
    const { app, url } = await startApp();
    const ws = connect(url("/tables/t1?location_id=patio"));
    await frameReader(ws).next();
    const key = { tenantId: "t1", channel: "table-view" as const, subKey: "patio" };
    expect(app.registry.count(key)).toBe(1);

    const closed = new Promise<void>((resolve) => app.webSocketAPI.once("sessionClosed", () => resolve()));
    ws.close(1000, "bye");
    await closed;

    expect(app.registry.count(key)).toBe(0);
    expect(app.webSocketAPI.getStats().sessionCount).toBe(0);
  });

  it("refuses upgrades on unknown paths", async () => {
    const { url } = await startApp();
    const ws = connect(url("/reports/t1"));

    const error = await new Promise<Error>((resolve) => ws.once("error", resolve));
    expect(error.message).toBe("Unexpected server response: 404");
  });

  it("closes open connections on shutdown", async () => {
    const { app, url } = await startApp();
    const ws = connect(url("/dashboard/t1"));
    await frameReader(ws).next();

    const code = waitForClose(ws);
    await app.apiServer.stop();

    expect(await code).toBe(1001);
    expect(app.registry.getStats().connections).toBe(0);
  });
});
