import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

import { PersistenceError } from "./errors.js";
import type { DailyAggregate, DailyPrediction, NewReading, SensorReading } from "../types/sensor.js";

export type Db = Database.Database;

export type OpenDbOptions = {
  journalMode?: string;
  verbose?: boolean;
};

const JOURNAL_MODES = new Set(["DELETE", "TRUNCATE", "PERSIST", "MEMORY", "WAL", "OFF"]);

export function openDb(dbPath: string, options: OpenDbOptions = {}): Db {
  const inMemory = dbPath === ":memory:";
  const journalMode = (options.journalMode ?? "WAL").toUpperCase();
  if (!JOURNAL_MODES.has(journalMode)) {
    throw new Error(`Unsupported SQLite journal_mode: ${options.journalMode}`);
  }

  let db: Db;
  if (inMemory) {
    db = new Database(":memory:");
  } else {
    const resolved = path.resolve(dbPath);
    if (options.verbose) {
      console.log(`SQLite DB path: ${resolved}`);
      console.log(`SQLite journal_mode: ${journalMode}`);
    }
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    db = new Database(resolved);
    db.pragma(`journal_mode = ${journalMode}`);
  }
  db.pragma("synchronous = NORMAL");

  db.exec(`
    CREATE TABLE IF NOT EXISTS sensor_readings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      ts INTEGER NOT NULL,
      ph REAL NOT NULL,
      tds REAL NOT NULL,
      turbidity REAL NOT NULL,
      temperature REAL NOT NULL,
      source TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_sensor_readings_ts ON sensor_readings(ts);

    CREATE TABLE IF NOT EXISTS daily_predictions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      date TEXT NOT NULL UNIQUE,
      avg_ph REAL NOT NULL,
      avg_tds REAL NOT NULL,
      avg_turbidity REAL NOT NULL,
      avg_temperature REAL NOT NULL,
      prediction TEXT NOT NULL,
      confidence REAL CHECK (confidence IS NULL OR (confidence >= 0 AND confidence <= 1)),
      reading_count INTEGER NOT NULL,
      computed_at INTEGER NOT NULL
    );
  `);

  return db;
}

// Readings (append-only)

const READING_COLUMNS = "id, ts, ph, tds, turbidity, temperature, source";

export function insertReading(db: Db, reading: NewReading, nowMs: number = Date.now()): SensorReading {
  try {
    const stmt = db.prepare<[number, number, number, number, number, string | null], SensorReading>(
      `INSERT INTO sensor_readings (ts, ph, tds, turbidity, temperature, source)
       VALUES (?, ?, ?, ?, ?, ?)
       RETURNING ${READING_COLUMNS}`
    );
    const row = stmt.get(
      reading.ts ?? nowMs,
      reading.ph,
      reading.tds,
      reading.turbidity,
      reading.temperature,
      reading.source ?? null
    );
    if (!row) throw new Error("insert returned no row");
    return row;
  } catch (err) {
    throw new PersistenceError("insertReading", err);
  }
}

export function getLatestReading(db: Db): SensorReading | null {
  try {
    const stmt = db.prepare<[], SensorReading>(
      `SELECT ${READING_COLUMNS} FROM sensor_readings ORDER BY ts DESC, id DESC LIMIT 1`
    );
    return stmt.get() ?? null;
  } catch (err) {
    throw new PersistenceError("getLatestReading", err);
  }
}

export function queryReadingsInRange(db: Db, args: { sinceMs: number; untilMs: number }): SensorReading[] {
  try {
    const stmt = db.prepare<[number, number], SensorReading>(
      `SELECT ${READING_COLUMNS} FROM sensor_readings WHERE ts >= ? AND ts <= ? ORDER BY ts ASC, id ASC`
    );
    return stmt.all(args.sinceMs, args.untilMs);
  } catch (err) {
    throw new PersistenceError("queryReadingsInRange", err);
  }
}

// Daily predictions (one row per date)

const PREDICTION_COLUMNS = `
  id,
  date,
  avg_ph AS avgPh,
  avg_tds AS avgTds,
  avg_turbidity AS avgTurbidity,
  avg_temperature AS avgTemperature,
  prediction,
  confidence,
  reading_count AS readingCount,
  computed_at AS computedAt
`;

export type UpsertPredictionArgs = {
  date: string;
  aggregate: DailyAggregate;
  label: string;
  confidence: number | null;
  computedAt: number;
};

/**
 * Inserts the prediction for `date`, or overwrites the existing one in place.
 * The UNIQUE(date) constraint makes this a single atomic statement, so
 * concurrent callers converge on one row (last write wins) and the row id is
 * preserved across updates.
 */
export function upsertDailyPrediction(db: Db, args: UpsertPredictionArgs): DailyPrediction {
  try {
    const stmt = db.prepare<
      [string, number, number, number, number, string, number | null, number, number],
      DailyPrediction
    >(`
      INSERT INTO daily_predictions (
        date, avg_ph, avg_tds, avg_turbidity, avg_temperature,
        prediction, confidence, reading_count, computed_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(date) DO UPDATE SET
        avg_ph = excluded.avg_ph,
        avg_tds = excluded.avg_tds,
        avg_turbidity = excluded.avg_turbidity,
        avg_temperature = excluded.avg_temperature,
        prediction = excluded.prediction,
        confidence = excluded.confidence,
        reading_count = excluded.reading_count,
        computed_at = excluded.computed_at
      RETURNING ${PREDICTION_COLUMNS}
    `);
    const row = stmt.get(
      args.date,
      args.aggregate.avgPh,
      args.aggregate.avgTds,
      args.aggregate.avgTurbidity,
      args.aggregate.avgTemperature,
      args.label,
      args.confidence,
      args.aggregate.readingCount,
      args.computedAt
    );
    if (!row) throw new Error("upsert returned no row");
    return row;
  } catch (err) {
    throw new PersistenceError("upsertDailyPrediction", err);
  }
}

export function getLatestPrediction(db: Db): DailyPrediction | null {
  try {
    const stmt = db.prepare<[], DailyPrediction>(
      `SELECT ${PREDICTION_COLUMNS} FROM daily_predictions ORDER BY date DESC LIMIT 1`
    );
    return stmt.get() ?? null;
  } catch (err) {
    throw new PersistenceError("getLatestPrediction", err);
  }
}

export function getPredictionByDate(db: Db, date: string): DailyPrediction | null {
  try {
    const stmt = db.prepare<[string], DailyPrediction>(
      `SELECT ${PREDICTION_COLUMNS} FROM daily_predictions WHERE date = ?`
    );
    return stmt.get(date) ?? null;
  } catch (err) {
    throw new PersistenceError("getPredictionByDate", err);
  }
}

export function listPredictions(db: Db, args: { limit: number }): DailyPrediction[] {
  try {
    const stmt = db.prepare<[number], DailyPrediction>(
      `SELECT ${PREDICTION_COLUMNS} FROM daily_predictions ORDER BY date DESC LIMIT ?`
    );
    return stmt.all(args.limit);
  } catch (err) {
    throw new PersistenceError("listPredictions", err);
  }
}

export function countPredictionsForDate(db: Db, date: string): number {
  try {
    const stmt = db.prepare<[string], { count: number }>(
      "SELECT COUNT(1) AS count FROM daily_predictions WHERE date = ?"
    );
    return stmt.get(date)?.count ?? 0;
  } catch (err) {
    throw new PersistenceError("countPredictionsForDate", err);
  }
}
