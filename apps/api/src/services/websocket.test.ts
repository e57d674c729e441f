import { createServer, type Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocket, type WebSocketServer } from "ws";

import { insertReading, openDb, upsertDailyPrediction, type Db } from "../lib/sqlite.js";
import { broadcastLatestReading, createWebSocketServer } from "./websocket.js";

function nextMessages(ws: WebSocket, count: number): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    const received: unknown[] = [];
    ws.on("message", (data) => {
      received.push(JSON.parse(data.toString()));
      if (received.length === count) resolve(received);
    });
    ws.on("error", reject);
  });
}

describe("live feed", () => {
  let db: Db;
  let server: Server;
  let wss: WebSocketServer;
  let url: string;

  beforeEach(async () => {
    db = openDb(":memory:");
    vi.spyOn(console, "log").mockImplementation(() => {});
    server = createServer();
    wss = createWebSocketServer(server, db);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server is not listening on a TCP port");
    url = `ws://127.0.0.1:${address.port}/ws`;
  });

  afterEach(async () => {
    for (const client of wss.clients) client.terminate();
    wss.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    db.close();
    vi.restoreAllMocks();
  });

  it("sends the latest reading and prediction on connect", async () => {
    const reading = insertReading(db, { ph: 7.1, tds: 300, turbidity: 2, temperature: 24, ts: 5_000 });
    const prediction = upsertDailyPrediction(db, {
      date: "2024-01-03",
      aggregate: { avgPh: 7.1, avgTds: 300, avgTurbidity: 2, avgTemperature: 24, readingCount: 1 },
      label: "Safe",
      confidence: 0.91,
      computedAt: 6_000,
    });

    const ws = new WebSocket(url);
    const messages = await nextMessages(ws, 2);
    ws.close();

    expect(messages).toEqual([
      { type: "latest", data: reading },
      { type: "prediction", data: prediction },
    ]);
  });

  it("broadcasts new readings to connected clients", async () => {
    const ws = new WebSocket(url);
    await new Promise<void>((resolve) => ws.once("open", () => resolve()));
    const pending = nextMessages(ws, 1);

    const reading = insertReading(db, { ph: 6.8, tds: 280, turbidity: 1, temperature: 21, ts: 7_000 });
    broadcastLatestReading(reading);

    expect(await pending).toEqual([{ type: "latest", data: reading }]);
    ws.close();
  });
});
