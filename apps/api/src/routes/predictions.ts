import { Router, type Request, type Response } from "express";

import { isValidDate, yesterdayUtc } from "../lib/dates.js";
import { getLatestPrediction, getPredictionByDate, listPredictions, type Db } from "../lib/sqlite.js";
import type { DailyPredictionJob, JobRunResult } from "../services/dailyPredictionJob.js";

export type PredictionsRouterDeps = {
  db: Db;
  job: DailyPredictionJob;
  now?: () => number;
};

const DEFAULT_LIST_LIMIT = 30;
const MAX_LIST_LIMIT = 365;

function statusFor(result: JobRunResult): number {
  switch (result.status) {
    case "completed":
    case "skipped_no_data":
      return 200;
    case "rejected":
      return 409;
    case "failed":
      if (result.reason === "invalid_date") return 400;
      if (result.reason === "artifact_not_loaded") return 503;
      return 500;
  }
}

export function createPredictionsRouter(deps: PredictionsRouterDeps): Router {
  const router = Router();
  const now = deps.now ?? Date.now;

  router.get("/", (req: Request, res: Response) => {
    const limit = req.query.limit === undefined ? DEFAULT_LIST_LIMIT : Number(req.query.limit);
    if (!Number.isInteger(limit) || limit <= 0 || limit > MAX_LIST_LIMIT) {
      res.status(400).json({ ok: false, error: `limit must be an integer between 1 and ${MAX_LIST_LIMIT}` });
      return;
    }

    try {
      res.json({ ok: true, predictions: listPredictions(deps.db, { limit }) });
    } catch (err) {
      console.error("Error listing predictions", err);
      res.status(500).json({ ok: false, error: "Failed to list predictions" });
    }
  });

  router.get("/latest", (_req: Request, res: Response) => {
    try {
      const prediction = getLatestPrediction(deps.db);
      if (!prediction) {
        res.status(404).json({ ok: false, error: "No predictions found" });
        return;
      }
      res.json({ ok: true, prediction });
    } catch (err) {
      console.error("Error fetching latest prediction", err);
      res.status(500).json({ ok: false, error: "Failed to fetch latest prediction" });
    }
  });

  // Manual trigger; shares the scheduler's job, so a run already in flight for the date is rejected.
  router.post("/trigger", async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const requested = body && typeof body === "object" && "date" in body ? body.date : undefined;

    let date: string;
    if (requested === undefined) {
      date = yesterdayUtc(now());
    } else if (typeof requested === "string" && isValidDate(requested)) {
      date = requested;
    } else {
      res.status(400).json({ ok: false, error: "date must be a valid YYYY-MM-DD string" });
      return;
    }

    const result = await deps.job.run(date);
    const status = statusFor(result);
    res.status(status).json({ ok: status === 200, result });
  });

  router.get("/:date", (req: Request, res: Response) => {
    const { date } = req.params;
    if (!isValidDate(date)) {
      res.status(400).json({ ok: false, error: "date must be a valid YYYY-MM-DD string" });
      return;
    }

    try {
      const prediction = getPredictionByDate(deps.db, date);
      if (!prediction) {
        res.status(404).json({ ok: false, error: `No prediction for ${date}` });
        return;
      }
      res.json({ ok: true, prediction });
    } catch (err) {
      console.error("Error fetching prediction", err);
      res.status(500).json({ ok: false, error: "Failed to fetch prediction" });
    }
  });

  return router;
}
