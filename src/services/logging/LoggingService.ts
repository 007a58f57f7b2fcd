import path from "path";
import winston from "winston";
import { format } from "winston";
import type { SubtitlePipelineError } from "../../utils/error";

const { combine, timestamp, printf } = format;

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

export interface LoggingOptions {
  level?: string;
  logDir?: string;
  silent?: boolean;
}

const logFormat = printf(({ level, message, timestamp, component, ...metadata }) => {
  const metaString = Object.keys(metadata).length
    ? ` | ${JSON.stringify(metadata)}`
    : "";
  const scope = typeof component === "string" ? ` [${component}]` : "";

  return `[${timestamp}] ${level.toUpperCase()}${scope}: ${message}${metaString}`;
});

function createTransports(options: LoggingOptions) {
  const consoleTransport = new winston.transports.Console();
  if (!options.logDir) {
    return [consoleTransport];
  }

  return [
    consoleTransport,
    new winston.transports.File({
      filename: path.join(options.logDir, "error.log"),
      level: "error",
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(options.logDir, "pipeline.log"),
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ];
}

/**
 * Thin wrapper over a winston logger. One instance is created at startup and
 * handed to every component; `child` scopes it to a component name.
 */
export class LoggingService {
  private constructor(
    private readonly logger: winston.Logger,
    private readonly component?: string
  ) {}

  static create(options: LoggingOptions = {}): LoggingService {
    const logger = winston.createLogger({
      level: options.level || "info",
      silent: options.silent ?? false,
      format: combine(timestamp(), logFormat),
      transports: createTransports(options),
    });

    return new LoggingService(logger);
  }

  static silent(): LoggingService {
    return LoggingService.create({ silent: true });
  }

  child(component: string): LoggingService {
    return new LoggingService(this.logger, component);
  }

  log(
    level: LogLevel,
    message: string,
    component?: string,
    metadata?: Record<string, unknown>
  ): void {
    this.logger.log({
      level,
      message,
      component: component ?? this.component,
      ...metadata,
    });
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, undefined, metadata);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, undefined, metadata);
  }

  error(error: SubtitlePipelineError, component?: string): void {
    const { component: origin, ...metadata } = error.metadata;
    this.log(LogLevel.ERROR, error.message, component ?? origin, {
      code: error.code,
      severity: error.severity,
      ...metadata,
    });
  }
}
