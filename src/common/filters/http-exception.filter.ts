import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ApiResponseBuilder, ResponseCodes, ResponseCode } from '../dto/api-response.dto';

/**
 * Renders every exception thrown by an HTTP handler as the standard envelope:
 * {
 *   "data": null,
 *   "code": "MSG_...",
 *   "httpStatus": 400,
 *   "description": "..."
 * }
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'An unexpected error occurred';
    let code: ResponseCode = ResponseCodes.INTERNAL_ERROR;

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      code = this.getErrorCode(status);
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'string') {
        message = exceptionResponse;
      } else if ('message' in exceptionResponse) {
        const detail = exceptionResponse.message;
        if (Array.isArray(detail)) {
          // class-validator messages from the ValidationPipe
          message = detail.map(String).join('; ');
          code = ResponseCodes.VALIDATION_ERROR;
        } else {
          message = typeof detail === 'string' && detail ? detail : exception.message;
        }
      } else {
        message = exception.message;
      }
    } else if (exception instanceof Error) {
      message = exception.message;
      this.logger.error(`Unhandled error: ${message}`, exception.stack);
    }

    const sanitizedMessage = this.sanitizeMessage(message, status);

    this.logger.warn(
      `HTTP ${status} ${request.method} ${request.url} - ${code}: ${sanitizedMessage}`,
    );

    response.status(status).json(ApiResponseBuilder.error(code, status, sanitizedMessage));
  }

  private getErrorCode(status: number): ResponseCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ResponseCodes.BAD_REQUEST;
      case HttpStatus.NOT_FOUND:
        return ResponseCodes.NOT_FOUND;
      case HttpStatus.METHOD_NOT_ALLOWED:
        return ResponseCodes.METHOD_NOT_ALLOWED;
      case HttpStatus.PAYLOAD_TOO_LARGE:
        return ResponseCodes.PAYLOAD_TOO_LARGE;
      case HttpStatus.UNPROCESSABLE_ENTITY:
        return ResponseCodes.VALIDATION_ERROR;
      case HttpStatus.SERVICE_UNAVAILABLE:
        return ResponseCodes.SERVICE_UNAVAILABLE;
      default:
        return ResponseCodes.INTERNAL_ERROR;
    }
  }

  private sanitizeMessage(message: string, status: number): string {
    if (
      process.env.NODE_ENV === 'production' &&
      status === HttpStatus.INTERNAL_SERVER_ERROR
    ) {
      return 'An internal server error occurred. Please try again later.';
    }

    // stack frames and source paths
    return message
      .replace(/at .+\(.+\)/g, '')
      .replace(/\/[a-zA-Z0-9_\-\/]+\.ts:\d+:\d+/g, '')
      .trim();
  }
}
