import express from "express";
import cors from "cors";
import type { Express } from "express";
import { createRouter } from "./routes";
import { HealthService } from "./services/health/HealthService";
import { errorHandler, notFoundHandler } from "./middleware/error/errorHandler";
import { requestLogger } from "./middleware/logging/requestLogger";
import type { AppConfig } from "./config";

export function createApp(config: AppConfig): Express {
  const app = express();

  app.use(
    cors({
      origin: config.frontendUrl,
      credentials: config.frontendUrl !== "*",
    })
  );
  app.use(express.json());
  app.use(requestLogger);

  app.use(createRouter(new HealthService(config.orderDataPath)));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
