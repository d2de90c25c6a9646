/**
 * @fileoverview Provides a singleton Logger class that wraps Winston for file logging
 * and optional console output. Levels follow RFC 5424 syslog severities.
 * @module src/utils/internal/logger
 */
import fs from "fs";
import path from "path";
import winston from "winston";
import TransportStream from "winston-transport";
import { config } from "../../config/index.js";
import { RequestContext } from "./requestContext.js";

/**
 * Supported logging levels based on RFC 5424 Syslog severity levels.
 * Levels are: 'debug'(7), 'info'(6), 'notice'(5), 'warning'(4), 'error'(3), 'crit'(2), 'alert'(1), 'emerg'(0).
 * Lower numeric values indicate higher severity.
 */
export type LogLevel =
  | "debug"
  | "info"
  | "notice"
  | "warning"
  | "error"
  | "crit"
  | "alert"
  | "emerg";

/**
 * Numeric severity mapping for log levels (lower is more severe).
 * @private
 */
const levelSeverity: Record<LogLevel, number> = {
  emerg: 0,
  alert: 1,
  crit: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7,
};

type WinstonLevel = "debug" | "info" | "warn" | "error";

/**
 * Maps syslog levels to Winston's core levels.
 * @private
 */
const toWinstonLevel: Record<LogLevel, WinstonLevel> = {
  debug: "debug",
  info: "info",
  notice: "info",
  warning: "warn",
  error: "error",
  crit: "error",
  alert: "error",
  emerg: "error",
};

export function isLogLevel(value: string): value is LogLevel {
  return value in levelSeverity;
}

/**
 * Creates the Winston console log format.
 * @private
 */
function createWinstonConsoleFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      let metaString = "";
      const metaCopy: Record<string, unknown> = { ...meta };
      const errorObj = metaCopy.error;
      if (errorObj instanceof Error) {
        metaString += `\n  Error: ${errorObj.message}`;
        if (errorObj.stack)
          metaString += `\n  Stack: ${errorObj.stack
            .split("\n")
            .map((l: string) => `    ${l}`)
            .join("\n")}`;
        delete metaCopy.error;
      }
      if (Object.keys(metaCopy).length > 0) {
        try {
          const remainingMetaJson = JSON.stringify(metaCopy, null, 2);
          if (remainingMetaJson !== "{}")
            metaString += `\n  Meta: ${remainingMetaJson}`;
        } catch (stringifyError: unknown) {
          const errorMessage =
            stringifyError instanceof Error
              ? stringifyError.message
              : String(stringifyError);
          metaString += `\n  Meta: [Error stringifying metadata: ${errorMessage}]`;
        }
      }
      return `${String(timestamp)} ${level}: ${String(message)}${metaString}`;
    }),
  );
}

/**
 * Singleton Logger class that wraps Winston.
 * Messages logged before `initialize` are dropped.
 */
export class Logger {
  private static instance: Logger;
  private winstonLogger?: winston.Logger;
  private currentLevel: LogLevel = "info";

  private readonly LOG_FILE_MAX_SIZE = 5 * 1024 * 1024; // 5MB
  private readonly LOG_MAX_FILES = 5;

  /** @private */
  private constructor() {}

  /**
   * Initializes the Winston logger instance.
   * Should be called once at application startup.
   * @param level - The initial minimum log level.
   * @param logsDir - Directory for the log files. Defaults to the configured logs path.
   */
  public async initialize(
    level: LogLevel = "info",
    logsDir: string = config.logsPath,
  ): Promise<void> {
    if (this.winstonLogger) {
      this.warning("Logger already initialized.", {
        loggerSetup: true,
        requestId: "logger-init",
        timestamp: new Date().toISOString(),
      });
      return;
    }
    this.currentLevel = level;

    let logsDirCreatedMessage: string | null = null;
    const resolvedLogsDir = path.resolve(logsDir);
    if (!fs.existsSync(resolvedLogsDir)) {
      // Startup fails if the logs directory cannot be created
      await fs.promises.mkdir(resolvedLogsDir, { recursive: true });
      logsDirCreatedMessage = `Created logs directory: ${resolvedLogsDir}`;
    }

    const fileFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    );

    const fileTransportOptions = {
      format: fileFormat,
      maxsize: this.LOG_FILE_MAX_SIZE,
      maxFiles: this.LOG_MAX_FILES,
      tailable: true,
    };

    const transports: TransportStream[] = [
      new winston.transports.File({
        filename: path.join(resolvedLogsDir, "error.log"),
        level: "error",
        ...fileTransportOptions,
      }),
      new winston.transports.File({
        filename: path.join(resolvedLogsDir, "combined.log"),
        ...fileTransportOptions,
      }),
    ];

    const consoleEnabled = this.currentLevel === "debug" && process.stdout.isTTY;
    if (consoleEnabled) {
      transports.push(
        new winston.transports.Console({
          level: "debug",
          format: createWinstonConsoleFormat(),
        }),
      );
    }

    this.winstonLogger = winston.createLogger({
      level: toWinstonLevel[level],
      transports,
      exitOnError: false,
    });

    const initialContext: RequestContext = {
      loggerSetup: true,
      requestId: "logger-init-deferred",
      timestamp: new Date().toISOString(),
    };
    if (logsDirCreatedMessage) {
      this.info(logsDirCreatedMessage, initialContext);
    }

    this.info(
      `Logger initialized. Level: ${this.currentLevel}. Console logging: ${consoleEnabled ? "enabled" : "disabled"}`,
      {
        loggerSetup: true,
        requestId: "logger-post-init",
        timestamp: new Date().toISOString(),
      },
    );
  }

  /**
   * Gets the singleton instance of the Logger.
   */
  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /** Whether `initialize` has run and `close` has not. */
  public isInitialized(): boolean {
    return this.winstonLogger !== undefined;
  }

  /** The active minimum level. */
  public getLevel(): LogLevel {
    return this.currentLevel;
  }

  /**
   * Flushes and closes all transports. `initialize` may be called again afterwards.
   */
  public async close(): Promise<void> {
    const winstonLogger = this.winstonLogger;
    if (!winstonLogger) {
      return;
    }
    this.winstonLogger = undefined;
    await new Promise<void>((resolve) => {
      winstonLogger.on("finish", () => resolve());
      winstonLogger.end();
    });
  }

  /**
   * Centralized log processing method.
   * @private
   */
  private log(
    level: LogLevel,
    msg: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    const winstonLogger = this.winstonLogger;
    if (!winstonLogger) return;
    if (levelSeverity[level] > levelSeverity[this.currentLevel]) {
      return;
    }

    const logData: Record<string, unknown> = { ...context };
    const winstonLevel = toWinstonLevel[level];

    if (error) {
      winstonLogger.log(winstonLevel, msg, { ...logData, error });
    } else {
      winstonLogger.log(winstonLevel, msg, logData);
    }
  }

  /** Logs a message at the 'debug' level. */
  public debug(msg: string, context?: Record<string, unknown>): void {
    this.log("debug", msg, context);
  }

  /** Logs a message at the 'info' level. */
  public info(msg: string, context?: Record<string, unknown>): void {
    this.log("info", msg, context);
  }

  /** Logs a message at the 'notice' level. */
  public notice(msg: string, context?: Record<string, unknown>): void {
    this.log("notice", msg, context);
  }

  /** Logs a message at the 'warning' level. */
  public warning(msg: string, context?: Record<string, unknown>): void {
    this.log("warning", msg, context);
  }

  /**
   * Logs a message at the 'error' level.
   * @param err - Optional. Error object or context.
   * @param context - Optional. Context if `err` is an Error.
   */
  public error(
    msg: string,
    err?: Error | Record<string, unknown>,
    context?: Record<string, unknown>,
  ): void {
    const errorObj = err instanceof Error ? err : undefined;
    const actualContext = err instanceof Error ? context : err;
    this.log("error", msg, actualContext, errorObj);
  }

  /**
   * Logs a message at the 'crit' (critical) level.
   */
  public crit(
    msg: string,
    err?: Error | Record<string, unknown>,
    context?: Record<string, unknown>,
  ): void {
    const errorObj = err instanceof Error ? err : undefined;
    const actualContext = err instanceof Error ? context : err;
    this.log("crit", msg, actualContext, errorObj);
  }
}

/**
 * The singleton instance of the Logger.
 * Use this instance for all logging operations.
 */
export const logger = Logger.getInstance();
