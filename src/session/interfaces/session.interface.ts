import { Request } from 'express';

export interface SessionConfig {
  cookieName: string;
  secure: boolean;
}

export interface ResolvedSession {
  sessionId: string;
  /** true when no usable cookie came with the request */
  isNew: boolean;
}

/**
 * Express request after SessionMiddleware ran
 */
export interface SessionRequest extends Request {
  sessionId?: string;
}
