import { Logger } from "@nestjs/common";
import { isLogLevel, shouldLog, type LogLevel } from "../types/logging";

/**
 * A NestJS Logger that filters messages against LOG_LEVEL.
 * Used before the application logger is configured (bootstrap, shutdown hooks).
 */
export class FilteredLogger extends Logger {
  private readonly currentLogLevel: LogLevel;

  constructor(context: string, level: string = process.env.LOG_LEVEL || "log") {
    super(context);
    this.currentLogLevel = isLogLevel(level) ? level : "log";
  }

  override log(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("log", this.currentLogLevel)) {
      super.log(message, ...optionalParams);
    }
  }

  override error(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("error", this.currentLogLevel)) {
      super.error(message, ...optionalParams);
    }
  }

  override warn(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("warn", this.currentLogLevel)) {
      super.warn(message, ...optionalParams);
    }
  }

  override debug(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("debug", this.currentLogLevel)) {
      super.debug(message, ...optionalParams);
    }
  }

  override verbose(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("verbose", this.currentLogLevel)) {
      super.verbose(message, ...optionalParams);
    }
  }

  override fatal(message: unknown, ...optionalParams: unknown[]): void {
    if (shouldLog("fatal", this.currentLogLevel)) {
      super.fatal(message, ...optionalParams);
    }
  }
}
