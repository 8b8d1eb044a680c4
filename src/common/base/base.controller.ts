import { HttpException, InternalServerErrorException } from "@nestjs/common";
import { BaseService } from "./base.service";
import { toError } from "../types/error-handling";

/**
 * Base controller class consolidates common controller patterns
 */
export abstract class BaseController extends BaseService {
  protected readonly startupTime: number = Date.now();

  /**
   * Runs a handler with timing; anything that is not already an HttpException becomes a 500.
   */
  protected async executeOperation<T>(
    operation: () => Promise<T>,
    operationName: string,
    performanceThreshold = 1000
  ): Promise<T> {
    const startTime = Date.now();

    try {
      const result = await operation();
      this.logPerformance(operationName, Date.now() - startTime, performanceThreshold);
      return result;
    } catch (error) {
      if (error instanceof HttpException) {
        throw error;
      }

      const err = toError(error);
      this.logError(err, operationName, { responseTime: Date.now() - startTime });
      throw new InternalServerErrorException(`${operationName} failed: ${err.message}`);
    }
  }

  /**
   * Get system uptime since controller startup
   */
  protected getUptime(): number {
    return Date.now() - this.startupTime;
  }
}
