import { HttpStatus } from '@nestjs/common';

/**
 * Envelope for JSON answers outside the live wire routes:
 * {
 *   "data": {...},
 *   "code": "MSG_...",
 *   "httpStatus": 200,
 *   "description": "..."
 * }
 */
export interface ApiResponse<T = unknown> {
  data: T | null;
  code: string;
  httpStatus: HttpStatus;
  description: string;
}

export const ResponseCodes = {
  SUCCESS: 'MSG_SUCCESS',

  HEALTH_OK: 'MSG_HEALTH_OK',
  HEALTH_DEGRADED: 'MSG_HEALTH_DEGRADED',
  HEALTH_UNHEALTHY: 'MSG_HEALTH_UNHEALTHY',

  BAD_REQUEST: 'MSG_BAD_REQUEST',
  NOT_FOUND: 'MSG_NOT_FOUND',
  METHOD_NOT_ALLOWED: 'MSG_METHOD_NOT_ALLOWED',
  PAYLOAD_TOO_LARGE: 'MSG_PAYLOAD_TOO_LARGE',
  VALIDATION_ERROR: 'MSG_VALIDATION_ERROR',
  INTERNAL_ERROR: 'MSG_INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'MSG_SERVICE_UNAVAILABLE',
} as const;

export type ResponseCode = (typeof ResponseCodes)[keyof typeof ResponseCodes];

export class ApiResponseBuilder {
  static error(
    code: ResponseCode,
    httpStatus: HttpStatus,
    description: string,
  ): ApiResponse<null> {
    return {
      data: null,
      code,
      httpStatus,
      description,
    };
  }
}
