import type { Constructor } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

/**
 * Error handling capabilities
 */
export interface ErrorHandlingCapabilities {
  handleError(
    error: Error,
    context: string,
    options?: {
      shouldThrow?: boolean;
      shouldLog?: boolean;
      additionalData?: Record<string, unknown>;
    }
  ): void;
  getErrorCount(context: string): number;
  sleep(ms: number): Promise<void>;
}

/**
 * Mixin that adds counted, logged error handling to a service
 */
export function WithErrorHandling<TBase extends Constructor<LoggingCapabilities>>(Base: TBase) {
  return class ErrorHandlingMixin extends Base implements ErrorHandlingCapabilities {
    public errorCounts = new Map<string, number>();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    handleError(
      error: Error,
      context: string,
      options: {
        shouldThrow?: boolean;
        shouldLog?: boolean;
        additionalData?: Record<string, unknown>;
      } = {}
    ): void {
      const { shouldThrow = true, shouldLog = true, additionalData } = options;

      this.errorCounts.set(context, (this.errorCounts.get(context) || 0) + 1);

      if (shouldLog) {
        this.logError(error, context, additionalData);
      }

      if (shouldThrow) {
        throw error;
      }
    }

    getErrorCount(context: string): number {
      return this.errorCounts.get(context) || 0;
    }

    public sleep(ms: number): Promise<void> {
      return new Promise(resolve => setTimeout(resolve, ms));
    }
  };
}
