import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Logger,
  MethodNotAllowedException,
  Optional,
  Post,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { buildClientScript } from './client/client-script';
import { LIVE_DEFAULTS } from './constants/live.constants';
import { PatchDispatcherService } from './dispatcher/patch-dispatcher.service';
import { InvalidTargetDto } from './dto/invalid-target.dto';
import { PollResponse, toWirePatch } from './interfaces/patch.interface';
import { SessionId } from '../session/decorators/session-id.decorator';

/**
 * HTTP side of live delivery: polling fallback, stale target reports and
 * the browser script. Bodies are the raw wire format, not the API envelope.
 */
@Controller('_live')
export class LiveController {
  private readonly logger = new Logger(LiveController.name);
  private readonly clientScript: string;

  constructor(
    private readonly dispatcher: PatchDispatcherService,
    @Optional() private readonly configService?: ConfigService,
  ) {
    this.clientScript = buildClientScript({
      pollIntervalMs:
        this.configService?.get<number>('LIVE_CLIENT_POLL_INTERVAL_MS') ??
        LIVE_DEFAULTS.CLIENT_POLL_INTERVAL_MS,
      reconnectBaseMs:
        this.configService?.get<number>('LIVE_CLIENT_RECONNECT_BASE_MS') ??
        LIVE_DEFAULTS.CLIENT_RECONNECT_BASE_MS,
      reconnectMaxMs:
        this.configService?.get<number>('LIVE_CLIENT_RECONNECT_MAX_MS') ??
        LIVE_DEFAULTS.CLIENT_RECONNECT_MAX_MS,
    });
  }

  @Get('patch')
  @Header('Cache-Control', 'no-store')
  poll(@SessionId() sessionId: string): PollResponse {
    return {
      patches: this.dispatcher.drainPatches(sessionId).map(toWirePatch),
    };
  }

  /**
   * Best effort: a report that does not name a target is dropped, never
   * refused. The body is typed `unknown` so the global pipe leaves it alone.
   */
  @Post('invalid')
  @HttpCode(HttpStatus.NO_CONTENT)
  reportInvalid(@SessionId() sessionId: string, @Body() body: unknown): void {
    const targetId = this.readTargetId(body);
    if (targetId) {
      this.dispatcher.notifyInvalid(sessionId, targetId);
    }
  }

  @Get('client.js')
  @Header('Content-Type', 'application/javascript; charset=utf-8')
  @Header('Cache-Control', 'no-cache')
  getClientScript(): string {
    return this.clientScript;
  }

  // Upgrades never reach Express; a plain request here lacks the upgrade
  @Get('ws')
  rejectPlainSocketRequest(): never {
    throw new BadRequestException('WebSocket upgrade required');
  }

  @Post('ws')
  rejectSocketPost(): never {
    throw new MethodNotAllowedException('WebSocket upgrade requires GET');
  }

  private readTargetId(body: unknown): string | undefined {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      return undefined;
    }
    const report = plainToInstance(InvalidTargetDto, body);
    const errors = validateSync(report, { whitelist: true });
    if (errors.length > 0) {
      this.logger.debug(
        `Dropping invalid-target report: ${errors.map((e) => e.property).join(', ')}`,
      );
      return undefined;
    }
    return report.id;
  }
}
