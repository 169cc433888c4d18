import { Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { LIVE_CLOSE_CODES, LIVE_EVENTS } from '../constants/live.constants';
import { LiveChannel } from '../interfaces/live-channel.interface';
import {
  Patch,
  PatchMessage,
  toWirePatch,
} from '../interfaces/patch.interface';

/**
 * Session id → live connections of that session (one per open tab).
 *
 * Every method runs to completion on the event loop, which serves as the
 * registry's single lock. Delivery walks a copy of the connection set, so a
 * failed connection can be unregistered mid-delivery.
 */
@Injectable()
export class SessionRegistryService implements OnModuleDestroy {
  private readonly logger = new Logger(SessionRegistryService.name);
  private readonly sessions = new Map<string, Set<LiveChannel>>();

  constructor(@Optional() private readonly eventEmitter?: EventEmitter2) {}

  onModuleDestroy(): void {
    this.closeAll();
  }

  register(sessionId: string, connection: LiveChannel): void {
    if (!sessionId) {
      return;
    }

    let connections = this.sessions.get(sessionId);
    if (!connections) {
      connections = new Set();
      this.sessions.set(sessionId, connections);
    }
    connections.add(connection);

    this.logger.log(
      `Connection ${connection.id} registered for ${sessionId} (${connections.size} open)`,
    );
    this.eventEmitter?.emit(LIVE_EVENTS.CONNECTION_OPENED, {
      sessionId,
      connectionId: connection.id,
    });
  }

  unregister(sessionId: string, connection: LiveChannel): boolean {
    if (!sessionId) {
      return false;
    }

    const connections = this.sessions.get(sessionId);
    if (!connections || !connections.delete(connection)) {
      return false;
    }
    if (connections.size === 0) {
      this.sessions.delete(sessionId);
    }

    this.logger.log(`Connection ${connection.id} unregistered from ${sessionId}`);
    this.eventEmitter?.emit(LIVE_EVENTS.CONNECTION_CLOSED, {
      sessionId,
      connectionId: connection.id,
    });
    return true;
  }

  /**
   * Push patches to every connection of a session.
   * @returns true when at least one connection accepted the message
   */
  sendPatches(sessionId: string, patches: readonly Patch[]): boolean {
    if (!sessionId || patches.length === 0) {
      return false;
    }

    const message: PatchMessage = {
      type: 'patch',
      patches: patches.map(toWirePatch),
    };
    return this.deliver(sessionId, message) > 0;
  }

  /**
   * Ask every open tab to reload the page.
   * @returns number of connections that accepted the message
   */
  broadcastReload(): number {
    const message: PatchMessage = { type: 'reload' };
    let delivered = 0;

    for (const sessionId of [...this.sessions.keys()]) {
      delivered += this.deliver(sessionId, message);
    }

    this.logger.log(`Reload sent to ${delivered} connection(s)`);
    this.eventEmitter?.emit(LIVE_EVENTS.RELOAD_BROADCAST, { delivered });
    return delivered;
  }

  hasConnections(sessionId: string): boolean {
    return (this.sessions.get(sessionId)?.size ?? 0) > 0;
  }

  connectionCount(sessionId?: string): number {
    if (sessionId !== undefined) {
      return this.sessions.get(sessionId)?.size ?? 0;
    }
    let total = 0;
    for (const connections of this.sessions.values()) {
      total += connections.size;
    }
    return total;
  }

  sessionCount(): number {
    return this.sessions.size;
  }

  closeAll(): void {
    const snapshot = [...this.sessions.entries()].map(
      ([sessionId, connections]) => [sessionId, [...connections]] as const,
    );
    this.sessions.clear();

    for (const [, connections] of snapshot) {
      for (const connection of connections) {
        connection.close('server shutdown', LIVE_CLOSE_CODES.GOING_AWAY);
      }
    }
  }

  private deliver(sessionId: string, message: PatchMessage): number {
    const targets = [...(this.sessions.get(sessionId) ?? [])];
    let delivered = 0;

    for (const connection of targets) {
      if (connection.sendJson(message)) {
        delivered++;
      } else {
        this.unregister(sessionId, connection);
      }
    }
    return delivered;
  }
}
