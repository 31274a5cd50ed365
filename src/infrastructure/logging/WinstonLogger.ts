import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import type { LogMeta, Logger } from "../../application/interfaces/Logger";

export interface WinstonLoggerOptions {
  level: string;
  file?: string;
  silent?: boolean;
}

export class WinstonLogger implements Logger {
  private readonly logger: winston.Logger;

  constructor(options: WinstonLoggerOptions) {
    const transports = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, filePath, ...meta }) => {
            let logMessage = `${String(timestamp)} [${level}]`;
            if (typeof filePath === "string") logMessage += ` [File:${filePath}]`;
            logMessage += `: ${String(message)}`;

            if (Object.keys(meta).length > 0) {
              logMessage += ` ${JSON.stringify(meta)}`;
            }

            return logMessage;
          })
        ),
      }),
      // Rotating file transport, only when a log file is configured
      ...(options.file
        ? [
            new DailyRotateFile({
              filename: options.file.replace(".log", "-%DATE%.log"),
              datePattern: "YYYY-MM-DD",
              maxSize: "20m",
              maxFiles: "7d",
              format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
              ),
            }),
          ]
        : []),
    ];

    this.logger = winston.createLogger({
      level: options.level,
      silent: options.silent,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true })
      ),
      transports,
    });
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  public error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  public setLevel(level: string): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}
