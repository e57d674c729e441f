import "dotenv/config";

const PORT = Number(process.env.PORT ?? 3000);

const SQLITE_PATH = process.env.SQLITE_PATH ?? "./data/water_quality.sqlite";
const SQLITE_JOURNAL_MODE = process.env.SQLITE_JOURNAL_MODE ?? "WAL";

const MODEL_PATH = process.env.MODEL_PATH ?? "./ml_artifacts/water_quality_model.json";

const PREDICTION_HOUR_UTC = Number(process.env.PREDICTION_HOUR_UTC ?? 0);
const PREDICTION_MINUTE_UTC = Number(process.env.PREDICTION_MINUTE_UTC ?? 0);

const MQTT_ENABLED = process.env.MQTT_ENABLED === "true";
const MQTT_URL = process.env.MQTT_URL;
const MQTT_HOST = process.env.MQTT_HOST ?? "localhost";
const MQTT_PORT = Number(process.env.MQTT_PORT ?? 1883);
const MQTT_USERNAME = process.env.MQTT_USERNAME;
const MQTT_PASSWORD = process.env.MQTT_PASSWORD;
const MQTT_TOPIC_PREFIX = process.env.MQTT_TOPIC_PREFIX ?? "/device";

const mqttUrl = MQTT_URL ?? `mqtt://${MQTT_HOST}:${MQTT_PORT}`;

if (!Number.isInteger(PREDICTION_HOUR_UTC) || PREDICTION_HOUR_UTC < 0 || PREDICTION_HOUR_UTC > 23) {
  throw new Error(`PREDICTION_HOUR_UTC must be an integer between 0 and 23, got ${process.env.PREDICTION_HOUR_UTC}`);
}
if (!Number.isInteger(PREDICTION_MINUTE_UTC) || PREDICTION_MINUTE_UTC < 0 || PREDICTION_MINUTE_UTC > 59) {
  throw new Error(`PREDICTION_MINUTE_UTC must be an integer between 0 and 59, got ${process.env.PREDICTION_MINUTE_UTC}`);
}

export const config = {
  PORT,
  sqlitePath: SQLITE_PATH,
  sqliteJournalMode: SQLITE_JOURNAL_MODE,
  modelPath: MODEL_PATH,
  schedule: {
    hourUtc: PREDICTION_HOUR_UTC,
    minuteUtc: PREDICTION_MINUTE_UTC,
  },
  mqttEnabled: MQTT_ENABLED,
  mqttUrl,
  mqtt: {
    username: MQTT_USERNAME,
    password: MQTT_PASSWORD,
    reconnectPeriod: 1000,
  },
  topicPrefix: MQTT_TOPIC_PREFIX,
} as const;
