import { Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { LIVE_DEFAULTS, LIVE_EVENTS } from '../constants/live.constants';
import { CleanupCallback, Patch } from '../interfaces/patch.interface';
import { SessionRegistryService } from '../registry/session-registry.service';
import { CleanupTable, SingleShotAction } from './cleanup-table';

interface QueueConfig {
  idleTtlMs: number;
  sweepIntervalMs: number;
}

/**
 * Per-session FIFO of patches waiting for a connection or a poll, plus the
 * cleanup actions registered alongside them.
 *
 * Queues are unbounded. With LIVE_QUEUE_IDLE_TTL_MS set, a session with no
 * open connection that nobody consumed from (push or poll) within the TTL is
 * evicted: its queue is discarded and its cleanups run, which stops background
 * work left behind by a closed tab.
 */
@Injectable()
export class PatchQueueService implements OnModuleDestroy {
  private readonly logger = new Logger(PatchQueueService.name);
  private readonly pending = new Map<string, Patch[]>();
  private readonly cleanups = new CleanupTable();
  private readonly lastConsumedAt = new Map<string, number>();
  private readonly config: QueueConfig;
  private sweepInterval?: NodeJS.Timeout;

  constructor(
    @Optional() private readonly configService?: ConfigService,
    @Optional() private readonly eventEmitter?: EventEmitter2,
    @Optional() private readonly registry?: SessionRegistryService,
  ) {
    this.config = this.loadConfig();
    this.startSweep();
  }

  onModuleDestroy(): void {
    this.stopSweep();
  }

  private loadConfig(): QueueConfig {
    return {
      idleTtlMs:
        this.configService?.get<number>('LIVE_QUEUE_IDLE_TTL_MS') ??
        LIVE_DEFAULTS.QUEUE_IDLE_TTL_MS,
      sweepIntervalMs:
        this.configService?.get<number>('LIVE_QUEUE_SWEEP_INTERVAL_MS') ??
        LIVE_DEFAULTS.QUEUE_SWEEP_INTERVAL_MS,
    };
  }

  getConfig(): QueueConfig {
    return { ...this.config };
  }

  /**
   * Append a patch; a cleanup replaces any earlier one for the same target
   */
  enqueue(sessionId: string, patch: Patch, cleanup?: CleanupCallback): void {
    let queue = this.pending.get(sessionId);
    if (!queue) {
      queue = [];
      this.pending.set(sessionId, queue);
    }
    queue.push(patch);

    if (cleanup) {
      this.cleanups.register(sessionId, patch.targetId, cleanup);
    }
    if (this.config.idleTtlMs > 0 && !this.lastConsumedAt.has(sessionId)) {
      this.lastConsumedAt.set(sessionId, Date.now());
    }
  }

  snapshot(sessionId: string): Patch[] {
    return [...(this.pending.get(sessionId) ?? [])];
  }

  /**
   * Drop the first `count` patches, the ones a connection has accepted
   */
  acknowledge(sessionId: string, count: number): void {
    const queue = this.pending.get(sessionId);
    if (!queue) {
      return;
    }
    queue.splice(0, count);
    if (queue.length === 0) {
      this.pending.delete(sessionId);
    }
    this.markConsumed(sessionId);
  }

  drain(sessionId: string): Patch[] {
    this.markConsumed(sessionId);
    const queue = this.pending.get(sessionId);
    if (!queue) {
      return [];
    }
    this.pending.delete(sessionId);
    return queue;
  }

  /**
   * Run and forget the cleanup for a target.
   * @returns true when a cleanup ran
   */
  invokeCleanup(sessionId: string, targetId: string): boolean {
    const action = this.cleanups.take(sessionId, targetId);
    if (!action) {
      return false;
    }
    return this.runCleanup(action, sessionId, targetId);
  }

  hasCleanup(sessionId: string, targetId: string): boolean {
    return this.cleanups.has(sessionId, targetId);
  }

  pendingCount(sessionId?: string): number {
    if (sessionId !== undefined) {
      return this.pending.get(sessionId)?.length ?? 0;
    }
    let total = 0;
    for (const queue of this.pending.values()) {
      total += queue.length;
    }
    return total;
  }

  /** Sessions with at least one pending patch */
  sessionCount(): number {
    return this.pending.size;
  }

  cleanupCount(sessionId?: string): number {
    return this.cleanups.size(sessionId);
  }

  /**
   * Evict unconnected sessions nobody consumed patches for within the idle TTL
   * @returns evicted session ids
   */
  evictIdleSessions(now: number = Date.now()): string[] {
    if (this.config.idleTtlMs <= 0) {
      return [];
    }

    const evicted: string[] = [];
    for (const [sessionId, consumedAt] of [...this.lastConsumedAt]) {
      if (now - consumedAt <= this.config.idleTtlMs) {
        continue;
      }
      if (this.registry?.hasConnections(sessionId)) {
        this.lastConsumedAt.set(sessionId, now);
        continue;
      }
      this.evict(sessionId);
      evicted.push(sessionId);
    }

    if (evicted.length > 0) {
      this.logger.debug(`Evicted ${evicted.length} idle session queue(s)`);
    }
    return evicted;
  }

  clear(): void {
    this.pending.clear();
    this.cleanups.clear();
    this.lastConsumedAt.clear();
  }

  private evict(sessionId: string): void {
    const discarded = this.pending.get(sessionId)?.length ?? 0;
    this.pending.delete(sessionId);
    this.lastConsumedAt.delete(sessionId);

    const actions = this.cleanups.takeSession(sessionId);
    for (const action of actions) {
      this.runCleanup(action, sessionId, '*');
    }

    this.eventEmitter?.emit(LIVE_EVENTS.QUEUE_EVICTED, {
      sessionId,
      discardedPatches: discarded,
      cleanups: actions.length,
    });
  }

  private markConsumed(sessionId: string): void {
    if (this.config.idleTtlMs > 0) {
      this.lastConsumedAt.set(sessionId, Date.now());
    }
  }

  private runCleanup(
    action: SingleShotAction,
    sessionId: string,
    targetId: string,
  ): boolean {
    try {
      return action.run();
    } catch (error) {
      const err = error as Error;
      this.logger.error(
        `Cleanup for ${sessionId}/${targetId} failed: ${err.message}`,
        err.stack,
      );
      return true;
    }
  }

  private startSweep(): void {
    if (this.config.idleTtlMs <= 0) {
      return;
    }
    this.sweepInterval = setInterval(() => {
      this.evictIdleSessions();
    }, this.config.sweepIntervalMs);
    this.sweepInterval.unref();
  }

  private stopSweep(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = undefined;
    }
  }
}
