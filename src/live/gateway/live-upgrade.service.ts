import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpAdapterHost } from '@nestjs/core';
import { IncomingMessage, Server } from 'http';
import { Socket } from 'net';
import { Duplex } from 'stream';
import { LIVE_DEFAULTS, LIVE_PATHS } from '../constants/live.constants';
import { LiveConnection } from '../connection/live-connection';
import { PatchDispatcherService } from '../dispatcher/patch-dispatcher.service';
import {
  buildHandshakeResponse,
  buildHttpErrorResponse,
  validateUpgradeRequest,
} from '../protocol/handshake';
import { SessionRegistryService } from '../registry/session-registry.service';
import { SessionService } from '../../session/session.service';

interface UpgradeConfig {
  pingIntervalMs: number;
  maxFrameBytes: number;
}

/**
 * Takes over HTTP upgrade requests on the live socket path.
 *
 * Express never sees an upgrade; the listener sits on the underlying HTTP
 * server. Any other upgrade path is refused with 404 so that no socket is
 * left hanging.
 */
@Injectable()
export class LiveUpgradeService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(LiveUpgradeService.name);
  private readonly config: UpgradeConfig;
  private server?: Server;

  private readonly upgradeListener = (
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer,
  ): void => {
    this.handleUpgrade(req, socket, head);
  };

  constructor(
    private readonly registry: SessionRegistryService,
    private readonly dispatcher: PatchDispatcherService,
    private readonly sessionService: SessionService,
    @Optional() private readonly adapterHost?: HttpAdapterHost,
    @Optional() private readonly configService?: ConfigService,
  ) {
    this.config = this.loadConfig();
  }

  private loadConfig(): UpgradeConfig {
    return {
      pingIntervalMs:
        this.configService?.get<number>('LIVE_PING_INTERVAL_MS') ??
        LIVE_DEFAULTS.PING_INTERVAL_MS,
      maxFrameBytes:
        this.configService?.get<number>('LIVE_MAX_FRAME_BYTES') ??
        LIVE_DEFAULTS.MAX_FRAME_BYTES,
    };
  }

  getConfig(): UpgradeConfig {
    return { ...this.config };
  }

  onApplicationBootstrap(): void {
    const server: Server | undefined =
      this.adapterHost?.httpAdapter?.getHttpServer();
    if (!server) {
      this.logger.warn('No HTTP server available, live socket disabled');
      return;
    }
    this.attach(server);
  }

  onModuleDestroy(): void {
    this.detach();
  }

  attach(server: Server): void {
    this.detach();
    server.on('upgrade', this.upgradeListener);
    this.server = server;
    this.logger.log(`Live socket listening on ${LIVE_PATHS.SOCKET}`);
  }

  isAttached(): boolean {
    return this.server !== undefined;
  }

  detach(): void {
    this.server?.off('upgrade', this.upgradeListener);
    this.server = undefined;
  }

  /**
   * Complete or refuse one upgrade request
   * @returns the registered connection, when the handshake succeeded
   */
  handleUpgrade(
    req: IncomingMessage,
    socket: Duplex,
    head: Buffer = Buffer.alloc(0),
  ): LiveConnection | undefined {
    const path = (req.url ?? '').split('?')[0];
    if (path !== LIVE_PATHS.SOCKET) {
      this.refuse(socket, 404, 'Not Found');
      return undefined;
    }

    const validation = validateUpgradeRequest(req);
    if (!validation.ok) {
      this.logger.debug(`Upgrade refused: ${validation.reason}`);
      this.refuse(socket, validation.status, validation.reason);
      return undefined;
    }

    const { sessionId, isNew } = this.sessionService.resolve(req.headers.cookie);
    const headers: Record<string, string> = isNew
      ? { 'Set-Cookie': this.sessionService.serializeCookie(sessionId) }
      : {};

    if (socket instanceof Socket) {
      socket.setNoDelay(true);
    }
    socket.write(buildHandshakeResponse(validation.key, headers));

    const connection = new LiveConnection(socket, {
      sessionId,
      pingIntervalMs: this.config.pingIntervalMs,
      maxFrameBytes: this.config.maxFrameBytes,
    });
    this.registry.register(sessionId, connection);
    connection.onClose((closed, reason) => {
      this.logger.debug(`Live socket ${closed.id} ended: ${reason}`);
      this.registry.unregister(sessionId, closed);
    });

    connection.receive(head);
    if (connection.isOpen()) {
      this.dispatcher.flushPending(sessionId);
    }
    return connection;
  }

  private refuse(socket: Duplex, status: number, reason: string): void {
    socket.on('error', (error: Error) => {
      this.logger.debug(`Refused upgrade socket failed: ${error.message}`);
    });
    if (socket.destroyed || !socket.writable) {
      socket.destroy();
      return;
    }
    socket.end(buildHttpErrorResponse(status, reason), () => socket.destroy());
  }
}
