import winston, { format } from "winston";
import type { IntakeError } from "../../utils/error";

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

export interface LoggingOptions {
  level?: LogLevel | `${LogLevel}`;
  file?: string;
  silent?: boolean;
}

const { combine, timestamp, printf } = format;

const logFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
  const scope = typeof component === "string" ? ` [${component}]` : "";
  const metaString = Object.keys(metadata).length
    ? ` | ${JSON.stringify(metadata)}`
    : "";

  return `[${timestamp}] ${level.toUpperCase()}${scope}: ${message}${metaString}`;
});

export class LoggingService {
  private static instance: LoggingService;
  private logger: winston.Logger;

  constructor(options: LoggingOptions = {}) {
    const transports: winston.transport[] = [new winston.transports.Console()];

    if (options.file) {
      transports.push(
        new winston.transports.File({
          filename: options.file,
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level ?? process.env.LOG_LEVEL ?? LogLevel.INFO,
      format: combine(timestamp(), logFormat),
      transports,
      silent: options.silent ?? false,
    });
  }

  static getInstance(): LoggingService {
    if (!LoggingService.instance) {
      LoggingService.instance = new LoggingService();
    }
    return LoggingService.instance;
  }

  log(
    level: LogLevel,
    message: string,
    component?: string,
    metadata?: Record<string, unknown>
  ): void {
    this.logger.log(level, message, { ...metadata, component });
  }

  /** Logs an IntakeError; an explicit component wins over the one it carries. */
  error(error: IntakeError, component?: string): void {
    const { component: origin, ...metadata } = error.metadata;
    this.log(LogLevel.ERROR, error.message, component ?? origin, {
      code: error.code,
      severity: error.severity,
      ...metadata,
    });
  }

  close(): void {
    this.logger.close();
  }
}
