import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { ApiResponse, ResponseCodes } from '../dto/api-response.dto';

/**
 * Wraps a handler's result in the standard envelope. Applied per controller
 * with `@UseInterceptors`, so the live wire routes keep their raw bodies.
 */
@Injectable()
export class ResponseInterceptor<T>
  implements NestInterceptor<T, ApiResponse<T>>
{
  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiResponse<T>> {
    const ctx = context.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    return next.handle().pipe(
      map((data) => {
        const statusCode = response.statusCode || HttpStatus.OK;
        const { code, description } = this.getResponseMeta(request.url, data);

        return {
          data: data ?? null,
          code,
          httpStatus: statusCode,
          description,
        };
      }),
    );
  }

  private getResponseMeta(
    url: string,
    data: T,
  ): { code: string; description: string } {
    if (!url.includes('/health')) {
      return {
        code: ResponseCodes.SUCCESS,
        description: 'Request processed successfully',
      };
    }

    const status =
      typeof data === 'object' && data !== null && 'status' in data
        ? data.status
        : undefined;

    switch (status) {
      case undefined:
        return {
          code: ResponseCodes.HEALTH_OK,
          description: 'Health check completed',
        };
      case 'ok':
      case 'healthy':
        return {
          code: ResponseCodes.HEALTH_OK,
          description: 'Service is healthy',
        };
      case 'degraded':
        return {
          code: ResponseCodes.HEALTH_DEGRADED,
          description: 'Service is running with degraded performance',
        };
      default:
        return {
          code: ResponseCodes.HEALTH_UNHEALTHY,
          description: 'Service is unhealthy',
        };
    }
  }
}
