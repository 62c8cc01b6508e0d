import { Router, type NextFunction, type Request, type Response } from "express";
import { logger } from "@shared";
import { RequestError } from "./errors";
import type { MapQueryApi } from "./handlers";

const log = logger.scoped("http");

export function createMapRouter(api: MapQueryApi): Router {
  const router = Router();

  router.get("/stats", (_req, res) => {
    res.json(api.getStats());
  });

  // Fixed lane paths go before /lanes/:id
  router.get("/lanes/closest", (req, res) => {
    res.json(api.getClosestLane(req.query));
  });
  router.get("/lanes/nearby", (req, res) => {
    res.json(api.getNearbyLanes(req.query));
  });
  router.get("/lanes/:id", (req, res) => {
    res.json(api.getLane(req.params.id));
  });
  router.get("/lanes/:id/traffic-lights", (req, res) => {
    res.json(api.getLaneTrafficLights(req.params.id));
  });
  router.get("/lanes/:id/traffic-signs", (req, res) => {
    res.json(api.getLaneTrafficSigns(req.params.id));
  });

  router.get("/traffic-lights/:id", (req, res) => {
    res.json(api.getTrafficLight(req.params.id));
  });
  router.get("/traffic-signs/:id", (req, res) => {
    res.json(api.getTrafficSign(req.params.id));
  });

  router.get("/query/region", (req, res) => {
    res.json(api.queryRegion(req.query));
  });
  router.get("/query/radius", (req, res) => {
    res.json(api.queryRadius(req.query));
  });

  router.post("/map/load", (req, res) => {
    res.json(api.loadMap(req.body));
  });
  router.post("/map/clear", (_req, res) => {
    res.json(api.clearMap());
  });

  return router;
}

/** Turn thrown errors into JSON responses */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof RequestError) {
    res.status(err.status).json({ error: err.message });
    return;
  }

  log.error(`${req.method} ${req.originalUrl} failed`, err);
  res.status(500).json({ error: "Internal server error" });
}
