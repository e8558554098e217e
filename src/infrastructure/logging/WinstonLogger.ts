import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { Logger, LogMeta } from "../../application/interfaces/Logger";
import { redactSecrets } from "../../domain/value-objects/Destination";
import { AppConfig } from "../config/Config";

export interface WinstonLoggerOptions {
  level: string;
  file?: string;
  datePattern?: string;
  maxSize?: string;
  maxFiles?: string;
  /** Disable to keep test output quiet. */
  console?: boolean;
}

const redactValue = (value: unknown): unknown => {
  if (typeof value === "string") {
    return redactSecrets(value);
  }
  if (Array.isArray(value)) {
    return value.map(redactValue);
  }
  if (value instanceof Error) {
    return redactSecrets(value.message);
  }
  if (value !== null && typeof value === "object") {
    if ("toJSON" in value && typeof value.toJSON === "function") {
      return redactValue(value.toJSON());
    }
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, redactValue(entry)])
    );
  }
  return value;
};

/** Masks stream keys in the message and every metadata field. */
export const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    info[key] = redactValue(info[key]);
  }
  return info;
});

export const consoleLine = winston.format.printf(
  ({ timestamp, level, message, sessionId, pid, ...meta }) => {
    let line = `${timestamp} [${level}]`;
    if (typeof sessionId === "string") line += ` [Session:${sessionId.slice(0, 8)}]`;
    if (pid !== undefined) line += ` [PID:${pid}]`;
    line += `: ${message}`;

    if (Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`;
    }

    return line;
  }
);

export class WinstonLogger implements Logger {
  private readonly logger: winston.Logger;

  constructor(options: WinstonLoggerOptions) {
    const transports: winston.transport[] = [];

    if (options.console !== false) {
      transports.push(
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), consoleLine),
        })
      );
    }

    if (options.file) {
      transports.push(
        new DailyRotateFile({
          filename: options.file.replace(/\.log$/, "") + "-%DATE%.log",
          datePattern: options.datePattern || "YYYY-MM-DD",
          maxSize: options.maxSize || "20m",
          maxFiles: options.maxFiles || "7d",
          format: winston.format.json(),
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level || "info",
      format: winston.format.combine(
        redactFormat(),
        winston.format.timestamp(),
        winston.format.errors({ stack: true })
      ),
      transports,
    });
  }

  public static fromConfig(config: AppConfig["logging"]): WinstonLogger {
    return new WinstonLogger(config);
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta ?? {});
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta ?? {});
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta ?? {});
  }

  public error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta ?? {});
  }

  public setLevel(level: string): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}
