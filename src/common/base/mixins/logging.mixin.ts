import { Logger } from "@nestjs/common";
import type { Constructor } from "../../types/services/mixins";

/**
 * Logging capabilities interface
 */
export interface LoggingCapabilities {
  readonly logger: Logger;
  logInitialization(message?: string): void;
  logShutdown(message?: string): void;
  logPerformance(operation: string, duration: number, threshold?: number): void;
  logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void;
  logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void;
  logDebug(message: string, context?: string, additionalData?: unknown): void;
}

/**
 * Mixin that adds logging capabilities to a service
 */
export function WithLogging<TBase extends Constructor>(Base: TBase) {
  return class LoggingMixin extends Base implements LoggingCapabilities {
    public readonly logger: Logger;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.logger = new Logger(this.constructor.name);
    }

    logInitialization(message?: string): void {
      this.logger.log(message || `${this.constructor.name} initialized`);
    }

    logShutdown(message?: string): void {
      this.logger.log(message || `${this.constructor.name} shutting down`);
    }

    logPerformance(operation: string, duration: number, threshold = 1000): void {
      if (duration > threshold) {
        this.logger.warn(`Performance warning: ${operation} took ${duration}ms (threshold: ${threshold}ms)`);
      } else {
        this.logger.debug(`${operation} completed in ${duration}ms`);
      }
    }

    logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData) {
        this.logger.error(`${contextMessage}${error.message}`, error.stack, additionalData);
      } else {
        this.logger.error(`${contextMessage}${error.message}`, error.stack);
      }
    }

    logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData) {
        this.logger.warn(`${contextMessage}${message}`, additionalData);
      } else {
        this.logger.warn(`${contextMessage}${message}`);
      }
    }

    logDebug(message: string, context?: string, additionalData?: unknown): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData !== undefined) {
        this.logger.debug(`${contextMessage}${message}`, additionalData);
      } else {
        this.logger.debug(`${contextMessage}${message}`);
      }
    }
  };
}
