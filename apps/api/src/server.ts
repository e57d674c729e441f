import { createServer } from "http";

import { config } from "./config/index.js";
import { createApp } from "./app.js";
import { openDb } from "./lib/sqlite.js";
import { ForestClassifier } from "./services/classifier.js";
import { createDailyPredictionJob } from "./services/dailyPredictionJob.js";
import { initMqttTelemetry } from "./services/mqttTelemetry.js";
import { startPredictionScheduler } from "./services/predictionScheduler.js";
import { broadcastLatestReading, broadcastPrediction, createWebSocketServer } from "./services/websocket.js";

const db = openDb(config.sqlitePath, { journalMode: config.sqliteJournalMode, verbose: true });

const classifier = new ForestClassifier(config.modelPath);
try {
  await classifier.load();
} catch (err) {
  // Ingestion and queries keep working; every prediction run ends failed until restart.
  console.error("Classifier unavailable, predictions disabled:", err);
}

const job = createDailyPredictionJob({ db, classifier, onCompleted: broadcastPrediction });
const scheduler = startPredictionScheduler(job, config.schedule);

const mqttClient = config.mqttEnabled
  ? initMqttTelemetry(
      {
        url: config.mqttUrl,
        username: config.mqtt.username,
        password: config.mqtt.password,
        reconnectPeriod: config.mqtt.reconnectPeriod,
        topicPrefix: config.topicPrefix,
      },
      { db, onReading: broadcastLatestReading }
    )
  : null;

const app = createApp({ db, job, onReading: broadcastLatestReading });
const server = createServer(app);

const wss = createWebSocketServer(server, db);

server.listen(config.PORT, () => {
  console.log(`Server listening on http://localhost:${config.PORT}`);
  console.log(`WebSocket server available at ws://localhost:${config.PORT}/ws`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down`);
  scheduler.stop();
  mqttClient?.end();
  wss.close();
  server.close(() => {
    db.close();
    console.log("Shutdown complete");
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
