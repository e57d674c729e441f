import { Router, type Request, type Response } from "express";

import { getLatestPrediction, getLatestReading, type Db } from "../lib/sqlite.js";

export function createDashboardRouter(db: Db): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    try {
      res.json({
        ok: true,
        latestReading: getLatestReading(db),
        latestPrediction: getLatestPrediction(db),
      });
    } catch (err) {
      console.error("Error building dashboard", err);
      res.status(500).json({ ok: false, error: "Failed to load dashboard" });
    }
  });

  return router;
}
