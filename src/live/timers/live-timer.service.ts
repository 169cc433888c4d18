import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';

export type TimerCallback = () => void | Promise<void>;

/**
 * Handle to a running timer. Stopping is idempotent, so an explicit stop and
 * the target-invalid cleanup can both call it; only the first one counts.
 */
export interface StopHandle {
  /** @returns true when this call stopped the timer */
  stop(): boolean;
  readonly stopped: boolean;
}

/**
 * Background timers for patch producers, all cleared on shutdown
 */
@Injectable()
export class LiveTimerService implements OnModuleDestroy {
  private readonly logger = new Logger(LiveTimerService.name);
  private readonly active = new Set<StopHandle>();

  onModuleDestroy(): void {
    for (const handle of [...this.active]) {
      handle.stop();
    }
  }

  /**
   * Run `callback` every `intervalMs` until stopped
   */
  every(intervalMs: number, callback: TimerCallback): StopHandle {
    const timer = setInterval(() => this.invoke(callback), intervalMs);
    timer.unref();
    return this.track(() => clearInterval(timer));
  }

  /**
   * Run `callback` once after `delayMs` unless stopped first
   */
  after(delayMs: number, callback: TimerCallback): StopHandle {
    const timer = setTimeout(() => {
      handle.stop();
      this.invoke(callback);
    }, delayMs);
    timer.unref();
    const handle = this.track(() => clearTimeout(timer));
    return handle;
  }

  activeCount(): number {
    return this.active.size;
  }

  private track(clear: () => void): StopHandle {
    let stopped = false;
    const handle: StopHandle = {
      stop: () => {
        if (stopped) {
          return false;
        }
        stopped = true;
        clear();
        this.active.delete(handle);
        return true;
      },
      get stopped() {
        return stopped;
      },
    };
    this.active.add(handle);
    return handle;
  }

  private invoke(callback: TimerCallback): void {
    try {
      const result = callback();
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.report(error));
      }
    } catch (error) {
      this.report(error);
    }
  }

  private report(error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.logger.error(`Timer callback failed: ${err.message}`, err.stack);
  }
}
