import type { Request, Response, NextFunction } from "express";
import { LoggingService, LogLevel } from "../../services/logging/LoggingService";

export const requestLogger = (
  req: Pick<Request, "method" | "originalUrl">,
  res: Pick<Response, "statusCode"> & { on(event: "finish", listener: () => void): unknown },
  next: NextFunction
): void => {
  const logger = LoggingService.getInstance();
  const start = Date.now();

  logger.log(LogLevel.DEBUG, `Incoming ${req.method} request to ${req.originalUrl}`, "HTTP", {
    method: req.method,
    url: req.originalUrl,
  });

  res.on("finish", () => {
    logger.log(LogLevel.INFO, `Outgoing response for ${req.method} ${req.originalUrl}`, "HTTP", {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      responseTime: `${Date.now() - start}ms`,
    });
  });

  next();
};
