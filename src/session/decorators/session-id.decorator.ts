import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { SessionRequest } from '../interfaces/session.interface';

export const SessionId = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): string => {
    const request = ctx.switchToHttp().getRequest<SessionRequest>();
    return request.sessionId ?? '';
  },
);
