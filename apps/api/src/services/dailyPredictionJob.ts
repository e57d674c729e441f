import { aggregateReadings } from "../lib/aggregate.js";
import { dayWindow, isValidDate } from "../lib/dates.js";
import { ArtifactNotLoadedError, errorMessage } from "../lib/errors.js";
import { queryReadingsInRange, upsertDailyPrediction, type Db } from "../lib/sqlite.js";
import type { DailyPrediction, SensorReading } from "../types/sensor.js";
import type { Classification, ClassifierPort } from "./classifier.js";

export type JobState = "idle" | "running";

export type JobFailureReason = "invalid_date" | "artifact_not_loaded" | "classification" | "persistence";

export type JobRunResult =
  | { status: "completed"; date: string; prediction: DailyPrediction }
  | { status: "skipped_no_data"; date: string }
  | { status: "failed"; date: string; reason: JobFailureReason; error: string }
  | { status: "rejected"; date: string; error: string };

export type DailyPredictionJob = {
  /** Never rejects; every outcome is reported in the result. */
  run(date: string): Promise<JobRunResult>;
  getState(date: string): JobState;
  getLastResult(): JobRunResult | null;
};

export type DailyPredictionJobDeps = {
  db: Db;
  classifier: ClassifierPort;
  now?: () => number;
  onCompleted?: (prediction: DailyPrediction) => void;
};

export function createDailyPredictionJob(deps: DailyPredictionJobDeps): DailyPredictionJob {
  const now = deps.now ?? Date.now;
  const inFlight = new Set<string>();
  let lastResult: JobRunResult | null = null;

  async function execute(date: string): Promise<JobRunResult> {
    const window = dayWindow(date);

    let readings: SensorReading[];
    try {
      readings = queryReadingsInRange(deps.db, { sinceMs: window.startMs, untilMs: window.endMs });
    } catch (err) {
      return { status: "failed", date, reason: "persistence", error: errorMessage(err) };
    }

    const aggregate = aggregateReadings(readings, window);
    if (!aggregate) {
      console.warn(`[Job] No sensor data for ${date}, skipping prediction`);
      return { status: "skipped_no_data", date };
    }
    console.log(
      `[Job] Aggregated ${aggregate.readingCount} readings for ${date}: ph=${aggregate.avgPh} tds=${aggregate.avgTds} turbidity=${aggregate.avgTurbidity} temperature=${aggregate.avgTemperature}`
    );

    let classification: Classification;
    try {
      classification = await deps.classifier.classify({
        ph: aggregate.avgPh,
        tds: aggregate.avgTds,
        turbidity: aggregate.avgTurbidity,
        temperature: aggregate.avgTemperature,
      });
    } catch (err) {
      const reason: JobFailureReason = err instanceof ArtifactNotLoadedError ? "artifact_not_loaded" : "classification";
      console.error(`[Job] Classification failed for ${date} (${aggregate.readingCount} readings):`, err);
      return { status: "failed", date, reason, error: errorMessage(err) };
    }

    const { label, confidence } = classification;
    if (confidence !== null && !(confidence >= 0 && confidence <= 1)) {
      console.error(`[Job] Classifier returned confidence ${confidence} outside [0,1] for ${date}`);
      return { status: "failed", date, reason: "classification", error: `confidence ${confidence} out of range` };
    }

    try {
      const prediction = upsertDailyPrediction(deps.db, {
        date,
        aggregate,
        label,
        confidence,
        computedAt: now(),
      });
      return { status: "completed", date, prediction };
    } catch (err) {
      console.error(`[Job] Failed to store prediction for ${date}:`, err);
      return { status: "failed", date, reason: "persistence", error: errorMessage(err) };
    }
  }

  async function run(date: string): Promise<JobRunResult> {
    if (!isValidDate(date)) {
      const result: JobRunResult = { status: "failed", date, reason: "invalid_date", error: `Invalid date "${date}"` };
      lastResult = result;
      logResult(result);
      return result;
    }
    if (inFlight.has(date)) {
      console.warn(`[Job] Run for ${date} already in progress, rejecting trigger`);
      return { status: "rejected", date, error: `A prediction run for ${date} is already in progress` };
    }

    inFlight.add(date);
    console.log(`[Job] Starting daily prediction for ${date}`);
    let result: JobRunResult;
    try {
      result = await execute(date);
    } finally {
      inFlight.delete(date);
    }

    lastResult = result;
    logResult(result);

    if (result.status === "completed" && deps.onCompleted) {
      try {
        deps.onCompleted(result.prediction);
      } catch (err) {
        console.error("[Job] onCompleted hook failed:", err);
      }
    }

    return result;
  }

  return {
    run,
    getState: (date) => (inFlight.has(date) ? "running" : "idle"),
    getLastResult: () => lastResult,
  };
}

function logResult(result: JobRunResult): void {
  switch (result.status) {
    case "completed": {
      const { prediction } = result;
      const confidence = prediction.confidence === null ? "n/a" : `${(prediction.confidence * 100).toFixed(2)}%`;
      console.log(
        `[Job] Completed ${result.date}: ${prediction.prediction} (confidence: ${confidence}, ${prediction.readingCount} readings)`
      );
      break;
    }
    case "skipped_no_data":
      console.log(`[Job] Skipped ${result.date}: no data`);
      break;
    case "failed":
      console.error(`[Job] Failed ${result.date} (${result.reason}): ${result.error}`);
      break;
    case "rejected":
      break;
  }
}
