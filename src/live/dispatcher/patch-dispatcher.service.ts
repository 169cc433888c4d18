import { Injectable, Logger, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { LIVE_EVENTS } from '../constants/live.constants';
import {
  CleanupCallback,
  createPatch,
  Patch,
  PatchContent,
  PatchTarget,
} from '../interfaces/patch.interface';
import { PatchQueueService } from '../queue/patch-queue.service';
import { SessionRegistryService } from '../registry/session-registry.service';

/**
 * Entry point for code that produces patches.
 *
 * Every patch goes through the session's pending queue; the queue is pushed
 * to the session's open connections right away and emptied only once at
 * least one connection took it. Without a connection the patches wait for
 * the polling route. Nothing here throws back at the producer: delivery is
 * best effort from the caller's point of view.
 */
@Injectable()
export class PatchDispatcherService {
  private readonly logger = new Logger(PatchDispatcherService.name);

  constructor(
    private readonly registry: SessionRegistryService,
    private readonly queue: PatchQueueService,
    @Optional() private readonly eventEmitter?: EventEmitter2,
  ) {}

  queuePatch(sessionId: string, patch: Patch, cleanup?: CleanupCallback): void {
    if (!sessionId || !patch.targetId) {
      // nowhere to deliver: release whatever the producer holds
      if (cleanup) {
        this.runDetachedCleanup(cleanup, sessionId, patch.targetId);
      }
      return;
    }

    this.queue.enqueue(sessionId, patch, cleanup);
    this.eventEmitter?.emit(LIVE_EVENTS.PATCH_QUEUED, {
      sessionId,
      targetId: patch.targetId,
      swap: patch.swap,
    });

    this.flushPending(sessionId);
  }

  /**
   * Push everything queued for a session to its open connections
   * @returns true when a connection accepted the queue
   */
  flushPending(sessionId: string): boolean {
    if (!sessionId) {
      return false;
    }

    const queued = this.queue.snapshot(sessionId);
    if (queued.length === 0) {
      return false;
    }
    if (!this.registry.sendPatches(sessionId, queued)) {
      return false;
    }

    this.queue.acknowledge(sessionId, queued.length);
    this.eventEmitter?.emit(LIVE_EVENTS.PATCH_DELIVERED, {
      sessionId,
      count: queued.length,
    });
    return true;
  }

  /**
   * Take every pending patch of a session, oldest first
   */
  drainPatches(sessionId: string): Patch[] {
    if (!sessionId) {
      return [];
    }
    const patches = this.queue.drain(sessionId);
    if (patches.length > 0) {
      this.eventEmitter?.emit(LIVE_EVENTS.PATCH_DRAINED, {
        sessionId,
        count: patches.length,
      });
    }
    return patches;
  }

  /**
   * The client no longer has the target in its DOM: stop the work feeding it
   * @returns true when a registered cleanup ran
   */
  notifyInvalid(sessionId: string, targetId: string): boolean {
    if (!sessionId || !targetId) {
      return false;
    }

    const ran = this.queue.invokeCleanup(sessionId, targetId);
    this.logger.debug(
      `Target ${targetId} gone for ${sessionId}${ran ? ', cleanup ran' : ''}`,
    );
    this.eventEmitter?.emit(LIVE_EVENTS.TARGET_INVALIDATED, {
      sessionId,
      targetId,
      cleanupRan: ran,
    });
    return ran;
  }

  /**
   * Resolve content, then queue it for a target. A content producer that
   * fails yields an empty body; the returned promise never rejects.
   */
  async patch(
    sessionId: string,
    target: PatchTarget,
    content: PatchContent,
    cleanup?: CleanupCallback,
  ): Promise<void> {
    const html = await this.resolveContent(content, target.id);
    this.queuePatch(sessionId, createPatch(target.id, html, target.swap), cleanup);
  }

  broadcastReload(): number {
    return this.registry.broadcastReload();
  }

  private async resolveContent(
    content: PatchContent,
    targetId: string,
  ): Promise<string> {
    try {
      const value = typeof content === 'function' ? content() : content;
      const html = await value;
      return typeof html === 'string' ? html : '';
    } catch (error) {
      const err = error as Error;
      this.logger.warn(
        `Content for ${targetId || 'unknown target'} failed: ${err.message}`,
      );
      return '';
    }
  }

  private runDetachedCleanup(
    cleanup: CleanupCallback,
    sessionId: string,
    targetId: string,
  ): void {
    try {
      cleanup();
    } catch (error) {
      const err = error as Error;
      this.logger.error(
        `Cleanup for ${sessionId || '-'}/${targetId || '-'} failed: ${err.message}`,
        err.stack,
      );
    }
  }
}
