import { Injectable, NestMiddleware, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response, NextFunction } from 'express';
import { LIVE_PATHS } from '../../live/constants/live.constants';

export interface LogEntry {
  timestamp: string;
  method: string;
  url: string;
  statusCode: number;
  responseTime: number;
  contentLength: number;
  userAgent?: string;
  ip?: string;
  status: 'success' | 'error';
}

export type LogFormat = 'json' | 'text';

const bodyLength = (body: unknown): number =>
  typeof body === 'string' || Buffer.isBuffer(body) ? Buffer.byteLength(body) : 0;

@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');
  private readonly enabled: boolean;
  private readonly format: LogFormat;
  private readonly skipPoll: boolean;

  constructor(@Optional() private readonly configService?: ConfigService) {
    this.enabled = configService?.get<boolean>('LOG_HTTP_REQUESTS') ?? true;
    this.format = configService?.get<string>('LOG_FORMAT') === 'text' ? 'text' : 'json';
    this.skipPoll = configService?.get<boolean>('LOG_SKIP_POLL_REQUESTS') ?? true;
  }

  use(req: Request, res: Response, next: NextFunction): void {
    // every offline tab polls, so these would drown the log
    if (!this.enabled || (this.skipPoll && req.path === LIVE_PATHS.POLL)) {
      next();
      return;
    }

    const startTime = Date.now();
    const originalSend = res.send;

    res.send = (body?: unknown): Response => {
      const responseTime = Date.now() - startTime;
      const contentLength = bodyLength(body);

      setImmediate(() => {
        this.logRequest({
          timestamp: new Date().toISOString(),
          method: req.method,
          url: req.originalUrl || req.url,
          statusCode: res.statusCode,
          responseTime,
          contentLength,
          userAgent: req.get('User-Agent'),
          ip: req.ip || req.socket?.remoteAddress,
          status: res.statusCode >= 400 ? 'error' : 'success',
        });
      });

      return originalSend.call(res, body);
    };

    next();
  }

  private logRequest(entry: LogEntry): void {
    if (this.format === 'json') {
      this.logger.log(JSON.stringify(entry));
      return;
    }

    const statusIcon = entry.status === 'success' ? '✓' : '✗';
    const colorCode =
      entry.statusCode >= 400 ? '\x1b[31m' : entry.statusCode >= 300 ? '\x1b[33m' : '\x1b[32m';
    const resetCode = '\x1b[0m';
    const message = `${statusIcon} ${colorCode}${entry.method} ${entry.url}${resetCode} ${entry.statusCode} ${entry.responseTime}ms (${entry.contentLength}b)`;

    if (entry.status === 'error') {
      this.logger.error(message);
    } else {
      this.logger.log(message);
    }
  }
}
