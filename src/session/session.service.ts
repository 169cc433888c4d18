import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { parse, serialize } from 'cookie';
import { randomBytes } from 'crypto';
import {
  SESSION_DEFAULTS,
  SESSION_ID_PATTERN,
} from './constants/session.constants';
import { ResolvedSession, SessionConfig } from './interfaces/session.interface';

/**
 * Opaque per-browser session ids carried in a cookie.
 *
 * Ids are never stored or expired here; a request without a well-formed
 * cookie simply gets a fresh id.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);
  private readonly config: SessionConfig;

  constructor(@Optional() private readonly configService?: ConfigService) {
    this.config = this.loadConfig();
  }

  private loadConfig(): SessionConfig {
    return {
      cookieName:
        this.configService?.get<string>('SESSION_COOKIE_NAME') ??
        SESSION_DEFAULTS.COOKIE_NAME,
      secure:
        this.configService?.get<boolean>('SESSION_COOKIE_SECURE') ??
        SESSION_DEFAULTS.COOKIE_SECURE,
    };
  }

  getConfig(): SessionConfig {
    return { ...this.config };
  }

  createSessionId(): string {
    return (
      SESSION_DEFAULTS.ID_PREFIX +
      randomBytes(SESSION_DEFAULTS.ID_RANDOM_BYTES).toString('hex')
    );
  }

  isValidSessionId(value: string | undefined): value is string {
    return value !== undefined && SESSION_ID_PATTERN.test(value);
  }

  /**
   * Session id from a raw Cookie header, or a new one
   */
  resolve(cookieHeader: string | undefined): ResolvedSession {
    const existing = cookieHeader
      ? parse(cookieHeader)[this.config.cookieName]
      : undefined;

    if (this.isValidSessionId(existing)) {
      return { sessionId: existing, isNew: false };
    }

    const sessionId = this.createSessionId();
    this.logger.debug(`Session issued: ${sessionId}`);
    return { sessionId, isNew: true };
  }

  /**
   * Set-Cookie value for a session id
   */
  serializeCookie(sessionId: string): string {
    return serialize(this.config.cookieName, sessionId, {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure: this.config.secure,
    });
  }
}
