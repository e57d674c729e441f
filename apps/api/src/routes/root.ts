import { Router, type Request, type Response } from "express";

export function createRootRouter(): Router {
  const router = Router();

  router.get("/", (_req: Request, res: Response) => {
    res.json({
      ok: true,
      service: "Water Quality Monitoring API",
      endpoints: {
        submitReading: "POST /api/readings",
        latestReading: "GET /api/readings/latest",
        latestPrediction: "GET /api/predictions/latest",
        predictionHistory: "GET /api/predictions",
        predictionByDate: "GET /api/predictions/:date",
        triggerPrediction: "POST /api/predictions/trigger",
        dashboard: "GET /api/dashboard",
        live: "WS /ws",
      },
    });
  });

  return router;
}
