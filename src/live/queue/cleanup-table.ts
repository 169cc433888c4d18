import { CleanupCallback } from '../interfaces/patch.interface';

/**
 * Wraps a callback so that it can run at most once
 */
export class SingleShotAction {
  private consumed = false;

  constructor(private readonly action: CleanupCallback) {}

  get hasRun(): boolean {
    return this.consumed;
  }

  /**
   * @returns false when the action already ran
   */
  run(): boolean {
    if (this.consumed) {
      return false;
    }
    this.consumed = true;
    this.action();
    return true;
  }
}

/**
 * (session, targetId) → cleanup action.
 *
 * A later registration for the same key replaces the earlier one, which is
 * discarded without running.
 */
export class CleanupTable {
  private readonly entries = new Map<string, Map<string, SingleShotAction>>();

  register(
    sessionId: string,
    targetId: string,
    action: CleanupCallback,
  ): SingleShotAction {
    let targets = this.entries.get(sessionId);
    if (!targets) {
      targets = new Map();
      this.entries.set(sessionId, targets);
    }
    const entry = new SingleShotAction(action);
    targets.set(targetId, entry);
    return entry;
  }

  has(sessionId: string, targetId: string): boolean {
    return this.entries.get(sessionId)?.has(targetId) ?? false;
  }

  /**
   * Remove and return the action for a key
   */
  take(sessionId: string, targetId: string): SingleShotAction | undefined {
    const targets = this.entries.get(sessionId);
    const entry = targets?.get(targetId);
    if (!targets || !entry) {
      return undefined;
    }
    targets.delete(targetId);
    if (targets.size === 0) {
      this.entries.delete(sessionId);
    }
    return entry;
  }

  /**
   * Remove and return every action registered for a session
   */
  takeSession(sessionId: string): SingleShotAction[] {
    const targets = this.entries.get(sessionId);
    if (!targets) {
      return [];
    }
    this.entries.delete(sessionId);
    return [...targets.values()];
  }

  size(sessionId?: string): number {
    if (sessionId !== undefined) {
      return this.entries.get(sessionId)?.size ?? 0;
    }
    let total = 0;
    for (const targets of this.entries.values()) {
      total += targets.size;
    }
    return total;
  }

  clear(): void {
    this.entries.clear();
  }
}
