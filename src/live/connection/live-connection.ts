import { Logger } from '@nestjs/common';
import { Duplex } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { LIVE_DEFAULTS } from '../constants/live.constants';
import { LiveChannel } from '../interfaces/live-channel.interface';
import {
  encodeCloseFrame,
  encodeFrame,
  encodeTextFrame,
  Frame,
  FrameDecodeError,
  FrameDecoder,
  Opcode,
} from '../protocol/frame-codec';

export type ConnectionState = 'open' | 'closed';

export type CloseListener = (connection: LiveConnection, reason: string) => void;

export interface LiveConnectionOptions {
  sessionId?: string;
  /** 0 disables server pings */
  pingIntervalMs?: number;
  maxFrameBytes?: number;
}

/**
 * One handshaken WebSocket.
 *
 * Each outbound frame is handed to the socket in a single write, so frames
 * produced by different callers never interleave on the wire. Closing is
 * idempotent: the socket is destroyed and close listeners run exactly once.
 */
export class LiveConnection implements LiveChannel {
  readonly id: string = uuidv4();
  readonly sessionId: string;

  private readonly logger = new Logger(LiveConnection.name);
  private readonly decoder: FrameDecoder;
  private readonly closeListeners = new Set<CloseListener>();
  private readonly pingIntervalMs: number;
  private state: ConnectionState = 'open';
  private closeReason?: string;
  private heartbeat?: NodeJS.Timeout;
  private lastSeenAt = Date.now();

  constructor(
    private readonly socket: Duplex,
    options: LiveConnectionOptions = {},
  ) {
    this.sessionId = options.sessionId ?? '';
    this.pingIntervalMs =
      options.pingIntervalMs ?? LIVE_DEFAULTS.PING_INTERVAL_MS;
    this.decoder = new FrameDecoder(
      options.maxFrameBytes ?? LIVE_DEFAULTS.MAX_FRAME_BYTES,
    );

    socket.on('data', (chunk: Buffer) => this.receive(chunk));
    socket.on('end', () => this.handleEnd());
    socket.on('error', (error: Error) => this.handleError(error));
    socket.on('close', () => this.close('socket closed'));

    this.startHeartbeat();
  }

  getState(): ConnectionState {
    return this.state;
  }

  isOpen(): boolean {
    return this.state === 'open';
  }

  getCloseReason(): string | undefined {
    return this.closeReason;
  }

  send(text: string): boolean {
    if (this.state === 'closed') {
      return false;
    }
    return this.writeFrame(encodeTextFrame(text));
  }

  sendJson(value: unknown): boolean {
    let text: string;
    try {
      text = JSON.stringify(value);
    } catch (error) {
      const err = error as Error;
      this.logger.warn(
        `Dropping connection ${this.id}: message could not be serialised (${err.message})`,
      );
      this.close('unserialisable message');
      return false;
    }
    return this.send(text);
  }

  ping(payload: Buffer = Buffer.alloc(0)): boolean {
    return this.writeFrame(encodeFrame(Opcode.PING, payload));
  }

  /**
   * Register a listener for the close; runs at once if already closed
   */
  onClose(listener: CloseListener): () => void {
    if (this.state === 'closed') {
      listener(this, this.closeReason ?? 'closed');
      return () => undefined;
    }
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /**
   * Feed raw bytes read from the socket (also used for bytes that arrived
   * together with the upgrade request)
   */
  receive(chunk: Buffer): void {
    if (this.state === 'closed' || chunk.length === 0) {
      return;
    }
    this.lastSeenAt = Date.now();

    let frames: Frame[];
    try {
      frames = this.decoder.push(chunk);
    } catch (error) {
      const reason =
        error instanceof FrameDecodeError ? error.message : 'frame decode failed';
      this.logger.debug(`Connection ${this.id} sent a bad frame: ${reason}`);
      this.close('decode error');
      return;
    }

    for (const frame of frames) {
      if (!this.isOpen()) {
        return;
      }
      this.handleFrame(frame);
    }
  }

  close(reason = 'closed', code?: number): void {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    this.closeReason = reason;
    this.stopHeartbeat();
    this.decoder.reset();

    if (code !== undefined && !this.socket.destroyed && this.socket.writable) {
      try {
        this.socket.write(encodeCloseFrame(code));
      } catch (error) {
        this.logger.debug(
          `Close frame not sent on ${this.id}: ${(error as Error).message}`,
        );
      }
    }
    this.socket.destroy();

    this.logger.debug(`Connection ${this.id} closed: ${reason}`);

    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) {
      try {
        listener(this, reason);
      } catch (error) {
        const err = error as Error;
        this.logger.error(`Close listener failed: ${err.message}`, err.stack);
      }
    }
  }

  private handleFrame(frame: Frame): void {
    switch (frame.opcode) {
      case Opcode.PING:
        this.writeFrame(encodeFrame(Opcode.PONG, frame.payload));
        return;
      case Opcode.PONG:
        return;
      case Opcode.CLOSE:
        this.close(
          'peer closed',
          frame.payload.length >= 2 ? frame.payload.readUInt16BE(0) : undefined,
        );
        return;
      case Opcode.TEXT:
        this.logger.debug(`Ignoring text frame on ${this.id}`);
        return;
      default:
        this.logger.debug(
          `Ignoring frame with opcode 0x${frame.opcode.toString(16)} on ${this.id}`,
        );
    }
  }

  private writeFrame(frame: Buffer): boolean {
    if (this.state === 'closed') {
      return false;
    }
    if (this.socket.destroyed || !this.socket.writable) {
      this.close('socket not writable');
      return false;
    }

    try {
      this.socket.write(frame, (error?: Error | null) => {
        if (error) {
          this.logger.debug(`Write failed on ${this.id}: ${error.message}`);
          this.close('write failed');
        }
      });
      return true;
    } catch (error) {
      this.logger.debug(
        `Write failed on ${this.id}: ${(error as Error).message}`,
      );
      this.close('write failed');
      return false;
    }
  }

  private handleEnd(): void {
    if (this.decoder.hasPartialFrame()) {
      this.close('truncated frame');
      return;
    }
    this.close('peer ended');
  }

  private handleError(error: Error): void {
    this.logger.debug(`Socket error on ${this.id}: ${error.message}`);
    this.close('socket error');
  }

  private startHeartbeat(): void {
    if (this.pingIntervalMs <= 0) {
      return;
    }
    this.heartbeat = setInterval(() => {
      if (Date.now() - this.lastSeenAt >= this.pingIntervalMs * 2) {
        this.close('peer timed out');
        return;
      }
      this.ping();
    }, this.pingIntervalMs);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = undefined;
    }
  }
}
