import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { LIVE_EVENTS } from '../constants/live.constants';
import { PatchQueueService } from '../queue/patch-queue.service';
import { SessionRegistryService } from '../registry/session-registry.service';

export interface LiveCounters {
  connectionsOpened: number;
  connectionsClosed: number;
  patchesQueued: number;
  patchesDelivered: number;
  patchesPolled: number;
  targetsInvalidated: number;
  cleanupsRun: number;
  reloadsSent: number;
  queuesEvicted: number;
}

export interface LiveStats {
  sessions: number;
  connections: number;
  pendingPatches: number;
  cleanups: number;
  counters: LiveCounters;
}

interface CountPayload {
  count: number;
}

interface InvalidatedPayload {
  cleanupRan: boolean;
}

interface ReloadPayload {
  delivered: number;
}

/**
 * Running totals of live delivery events, for the detailed health check
 */
@Injectable()
export class LiveStatsService {
  private counters: LiveCounters = LiveStatsService.emptyCounters();

  constructor(
    private readonly registry: SessionRegistryService,
    private readonly queue: PatchQueueService,
  ) {}

  private static emptyCounters(): LiveCounters {
    return {
      connectionsOpened: 0,
      connectionsClosed: 0,
      patchesQueued: 0,
      patchesDelivered: 0,
      patchesPolled: 0,
      targetsInvalidated: 0,
      cleanupsRun: 0,
      reloadsSent: 0,
      queuesEvicted: 0,
    };
  }

  @OnEvent(LIVE_EVENTS.CONNECTION_OPENED)
  handleConnectionOpened(): void {
    this.counters.connectionsOpened++;
  }

  @OnEvent(LIVE_EVENTS.CONNECTION_CLOSED)
  handleConnectionClosed(): void {
    this.counters.connectionsClosed++;
  }

  @OnEvent(LIVE_EVENTS.PATCH_QUEUED)
  handlePatchQueued(): void {
    this.counters.patchesQueued++;
  }

  @OnEvent(LIVE_EVENTS.PATCH_DELIVERED)
  handlePatchDelivered(payload: CountPayload): void {
    this.counters.patchesDelivered += payload.count;
  }

  @OnEvent(LIVE_EVENTS.PATCH_DRAINED)
  handlePatchDrained(payload: CountPayload): void {
    this.counters.patchesPolled += payload.count;
  }

  @OnEvent(LIVE_EVENTS.TARGET_INVALIDATED)
  handleTargetInvalidated(payload: InvalidatedPayload): void {
    this.counters.targetsInvalidated++;
    if (payload.cleanupRan) {
      this.counters.cleanupsRun++;
    }
  }

  @OnEvent(LIVE_EVENTS.RELOAD_BROADCAST)
  handleReloadBroadcast(payload: ReloadPayload): void {
    this.counters.reloadsSent += payload.delivered;
  }

  @OnEvent(LIVE_EVENTS.QUEUE_EVICTED)
  handleQueueEvicted(): void {
    this.counters.queuesEvicted++;
  }

  getStats(): LiveStats {
    return {
      sessions: this.registry.sessionCount(),
      connections: this.registry.connectionCount(),
      pendingPatches: this.queue.pendingCount(),
      cleanups: this.queue.cleanupCount(),
      counters: { ...this.counters },
    };
  }

  reset(): void {
    this.counters = LiveStatsService.emptyCounters();
  }
}
