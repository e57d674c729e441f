import { Router, type Request, type Response } from "express";

import { ValidationError } from "../lib/errors.js";
import { getLatestReading, insertReading, type Db } from "../lib/sqlite.js";
import { parseReadingInput } from "../lib/telemetry.js";
import type { SensorReading } from "../types/sensor.js";

export type ReadingsRouterDeps = {
  db: Db;
  onReading?: (reading: SensorReading) => void;
};

export function createReadingsRouter(deps: ReadingsRouterDeps): Router {
  const router = Router();

  router.post("/", (req: Request, res: Response) => {
    let reading: SensorReading;
    try {
      const input = parseReadingInput(req.body, req.ip ?? null);
      reading = insertReading(deps.db, input);
    } catch (err) {
      if (err instanceof ValidationError) {
        res.status(400).json({ ok: false, error: err.message, issues: err.issues });
        return;
      }
      console.error("Error saving sensor reading", err);
      res.status(500).json({ ok: false, error: "Failed to save sensor reading" });
      return;
    }

    console.log(`Stored sensor reading ${reading.id}`);
    deps.onReading?.(reading);
    res.status(201).json({ ok: true, reading });
  });

  router.get("/latest", (_req: Request, res: Response) => {
    try {
      const reading = getLatestReading(deps.db);
      if (!reading) {
        res.status(404).json({ ok: false, error: "No sensor readings found" });
        return;
      }
      res.json({ ok: true, reading });
    } catch (err) {
      console.error("Error fetching latest reading", err);
      res.status(500).json({ ok: false, error: "Failed to fetch latest reading" });
    }
  });

  return router;
}
