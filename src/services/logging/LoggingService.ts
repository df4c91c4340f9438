import winston from "winston";
import { VoiceAgentError } from "../../utils/error";

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
  const scope = typeof component === "string" ? ` [${component}]` : "";
  const metaString = Object.keys(metadata).length
    ? ` | ${JSON.stringify(metadata)}`
    : "";

  return `${String(timestamp)} ${level}${scope}: ${String(message)}${metaString}`;
});

export class LoggingService {
  private static instance: LoggingService;
  private readonly logger: winston.Logger;

  private constructor() {
    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || LogLevel.INFO,
      silent: process.env.NODE_ENV === "test",
      format: combine(timestamp(), colorize(), logFormat),
      transports: [new winston.transports.Console()],
    });
  }

  static getInstance(): LoggingService {
    if (!LoggingService.instance) {
      LoggingService.instance = new LoggingService();
    }
    return LoggingService.instance;
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  log(
    level: LogLevel,
    message: string,
    component?: string,
    metadata?: Record<string, unknown>
  ): void {
    this.logger.log({ ...metadata, level, message, component });
  }

  error(error: VoiceAgentError, component?: string): void {
    const { component: origin, ...metadata } = error.metadata;
    this.log(LogLevel.ERROR, error.message, component ?? origin, {
      code: error.code,
      severity: error.severity,
      ...metadata,
    });
  }
}
