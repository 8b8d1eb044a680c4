import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { ErrorCode, ErrorSeverity, type IErrorDetails } from "../types/error-handling";

export interface ErrorResponse {
  success: false;
  error: IErrorDetails;
  timestamp: number;
}

const CODE_BY_STATUS: Partial<Record<number, ErrorCode>> = {
  [HttpStatus.BAD_REQUEST]: ErrorCode.VALIDATION_ERROR,
  [HttpStatus.NOT_FOUND]: ErrorCode.NOT_FOUND,
  [HttpStatus.UNPROCESSABLE_ENTITY]: ErrorCode.VALIDATION_ERROR,
  [HttpStatus.TOO_MANY_REQUESTS]: ErrorCode.RATE_LIMIT_EXCEEDED,
  [HttpStatus.REQUEST_TIMEOUT]: ErrorCode.TIMEOUT_ERROR,
  [HttpStatus.GATEWAY_TIMEOUT]: ErrorCode.TIMEOUT_ERROR,
  [HttpStatus.BAD_GATEWAY]: ErrorCode.NETWORK_ERROR,
};

/**
 * Global exception filter that renders every failure as an ErrorResponse
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const errorResponse = this.buildErrorResponse(exception, status, request);

    this.logError(exception, errorResponse, request, status);
    response.status(status).json(errorResponse);
  }

  buildErrorResponse(exception: unknown, status: number, request: Pick<Request, "method" | "path">): ErrorResponse {
    const now = Date.now();
    return {
      success: false,
      error: {
        code: CODE_BY_STATUS[status] ?? ErrorCode.UNKNOWN_ERROR,
        message: this.extractMessage(exception),
        severity: this.getSeverityForStatus(status),
        module: "HttpFilter",
        timestamp: now,
        context: { httpStatus: status, method: request.method, path: request.path },
      },
      timestamp: now,
    };
  }

  private extractMessage(exception: unknown): string {
    if (exception instanceof HttpException) {
      const body = exception.getResponse();
      if (typeof body === "string") return body;
      if (typeof body === "object" && body !== null && "message" in body) {
        const { message } = body;
        if (Array.isArray(message)) return message.map(String).join("; ");
        if (typeof message === "string") return message;
      }
      return exception.message;
    }
    if (exception instanceof Error) return exception.message;
    return "Unknown error occurred";
  }

  private getSeverityForStatus(status: number): ErrorSeverity {
    if (status >= 500) {
      return ErrorSeverity.CRITICAL;
    }
    if (status >= 400) {
      return ErrorSeverity.MEDIUM;
    }
    return ErrorSeverity.LOW;
  }

  private logError(exception: unknown, errorResponse: ErrorResponse, request: Request, status: number): void {
    const message = `${request.method} ${request.path} - ${status} - ${errorResponse.error.message}`;

    if (status >= 500) {
      this.logger.error(message, exception instanceof Error ? exception.stack : undefined);
    } else {
      this.logger.warn(message);
    }
  }
}
