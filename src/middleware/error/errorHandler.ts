import type { Request, Response, NextFunction } from "express";
import { LoggingService, LogLevel } from "../../services/logging/LoggingService";

export class AppError extends Error {
  constructor(
    public message: string,
    public statusCode: number,
    public code: string
  ) {
    super(message);
    this.name = "AppError";
  }
}

type ErrorRequest = Pick<Request, "method" | "originalUrl">;

interface ErrorResponse {
  status(code: number): { json(body: unknown): unknown };
}

export const notFoundHandler = (req: ErrorRequest, _res: unknown, next: NextFunction): void => {
  next(new AppError(`Cannot ${req.method} ${req.originalUrl}`, 404, "NOT_FOUND"));
};

export const errorHandler = (
  error: Error,
  req: ErrorRequest,
  res: ErrorResponse,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
): void => {
  LoggingService.getInstance().log(LogLevel.ERROR, error.message, "ErrorHandler", {
    name: error.name,
    method: req.method,
    url: req.originalUrl,
  });

  if (error instanceof AppError) {
    res.status(error.statusCode).json({
      error: {
        message: error.message,
        code: error.code,
      },
    });
    return;
  }

  res.status(500).json({
    error: {
      message: "Internal server error",
      code: "INTERNAL_SERVER_ERROR",
    },
  });
};
