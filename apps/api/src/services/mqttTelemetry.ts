import mqtt, { type MqttClient } from "mqtt";

import { ValidationError } from "../lib/errors.js";
import { insertReading, type Db } from "../lib/sqlite.js";
import { parseDeviceTelemetry } from "../lib/telemetry.js";
import type { SensorReading } from "../types/sensor.js";

export type TelemetryHandlerDeps = {
  db: Db;
  onReading?: (reading: SensorReading) => void;
};

export type MqttTelemetryOptions = {
  url: string;
  username?: string;
  password?: string;
  reconnectPeriod: number;
  topicPrefix: string;
};

/**
 * Handles one message from `<prefix>/<deviceId>/telemetry`. Returns the stored
 * reading, or null when the message was dropped.
 */
export function handleTelemetryMessage(deps: TelemetryHandlerDeps, topic: string, message: Buffer): SensorReading | null {
  let json: unknown;
  try {
    json = JSON.parse(message.toString("utf8"));
  } catch (e) {
    console.error(`[MQTT] Unparseable payload on ${topic}`, e);
    return null;
  }

  let reading: SensorReading;
  try {
    const input = parseDeviceTelemetry(json, topic);
    reading = insertReading(deps.db, input);
  } catch (e) {
    if (e instanceof ValidationError) {
      console.warn(`[MQTT] Dropping invalid telemetry on ${topic}:`, e.issues.map((i) => `${i.path}: ${i.message}`).join("; "));
    } else {
      console.error(`[MQTT] Failed to store telemetry from ${topic}`, e);
    }
    return null;
  }

  deps.onReading?.(reading);
  return reading;
}

export function initMqttTelemetry(options: MqttTelemetryOptions, deps: TelemetryHandlerDeps): MqttClient {
  const client = mqtt.connect(options.url, {
    username: options.username,
    password: options.password,
    reconnectPeriod: options.reconnectPeriod,
  });

  const topic = `${options.topicPrefix}/+/telemetry`;

  client.on("connect", () => {
    client.subscribe(topic, { qos: 0 }, (err) => {
      if (err) {
        console.error("MQTT subscribe error", err);
        return;
      }
      console.log(`MQTT connected: ${options.url}`);
      console.log(`  Subscribed to: ${topic}`);
    });
  });

  client.on("message", (messageTopic, message) => {
    handleTelemetryMessage(deps, messageTopic, message);
  });

  client.on("error", (err) => {
    console.error("MQTT error", err);
  });

  return client;
}
