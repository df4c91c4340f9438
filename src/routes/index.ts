import { Router } from "express";
import type { HealthService } from "../services/health/HealthService";

export function createRouter(health: HealthService): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ message: "Voice Model Service is running" });
  });

  router.get("/health", async (_req, res, next) => {
    try {
      res.json(await health.check());
    } catch (error) {
      next(error);
    }
  });

  return router;
}
