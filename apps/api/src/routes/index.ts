import { Router } from "express";

import type { Db } from "../lib/sqlite.js";
import type { DailyPredictionJob } from "../services/dailyPredictionJob.js";
import type { SensorReading } from "../types/sensor.js";
import { createDashboardRouter } from "./dashboard.js";
import { createPredictionsRouter } from "./predictions.js";
import { createReadingsRouter } from "./readings.js";

export type ApiDeps = {
  db: Db;
  job: DailyPredictionJob;
  now?: () => number;
  onReading?: (reading: SensorReading) => void;
};

export function createApiRouter(deps: ApiDeps): Router {
  const router = Router();

  // Readings routes: /api/readings, /api/readings/latest
  router.use("/readings", createReadingsRouter({ db: deps.db, onReading: deps.onReading }));

  // Prediction routes: /api/predictions, /api/predictions/latest, /api/predictions/trigger
  router.use("/predictions", createPredictionsRouter({ db: deps.db, job: deps.job, now: deps.now }));

  // Combined view: /api/dashboard
  router.use("/dashboard", createDashboardRouter(deps.db));

  return router;
}
