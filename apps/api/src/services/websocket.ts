import { WebSocketServer, WebSocket } from "ws";
import type { Server } from "http";

import { getLatestPrediction, getLatestReading, type Db } from "../lib/sqlite.js";
import type { DailyPrediction, SensorReading } from "../types/sensor.js";

export type LiveMessage =
  | { type: "latest"; data: SensorReading }
  | { type: "prediction"; data: DailyPrediction };

const clients = new Set<WebSocket>();

export function createWebSocketServer(server: Server, db: Db): WebSocketServer {
  const wss = new WebSocketServer({ server, path: "/ws" });

  wss.on("connection", (ws: WebSocket) => {
    console.log("WebSocket client connected");
    clients.add(ws);

    // Send current state so dashboards render without waiting for the next update
    try {
      const reading = getLatestReading(db);
      if (reading) send(ws, { type: "latest", data: reading });

      const prediction = getLatestPrediction(db);
      if (prediction) send(ws, { type: "prediction", data: prediction });
    } catch (error) {
      console.error("Error fetching initial state for WebSocket:", error);
    }

    ws.on("close", () => {
      console.log("WebSocket client disconnected");
      clients.delete(ws);
    });

    ws.on("error", (error) => {
      console.error("WebSocket error:", error);
      clients.delete(ws);
    });
  });

  wss.on("close", () => {
    clients.clear();
  });

  return wss;
}

function send(ws: WebSocket, message: LiveMessage): void {
  ws.send(JSON.stringify(message));
}

function broadcast(message: LiveMessage): void {
  const payload = JSON.stringify(message);
  clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) {
      client.send(payload);
    }
  });
}

export function broadcastLatestReading(reading: SensorReading): void {
  broadcast({ type: "latest", data: reading });
}

export function broadcastPrediction(prediction: DailyPrediction): void {
  broadcast({ type: "prediction", data: prediction });
}
