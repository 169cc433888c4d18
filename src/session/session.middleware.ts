import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Response } from 'express';
import { SessionService } from './session.service';
import { SessionRequest } from './interfaces/session.interface';

@Injectable()
export class SessionMiddleware implements NestMiddleware {
  constructor(private readonly sessionService: SessionService) {}

  use(req: SessionRequest, res: Response, next: NextFunction): void {
    const { sessionId, isNew } = this.sessionService.resolve(req.headers.cookie);

    req.sessionId = sessionId;
    if (isNew) {
      res.append('Set-Cookie', this.sessionService.serializeCookie(sessionId));
    }

    next();
  }
}
