import { v4 as uuidv4 } from 'uuid';
import { PatchTarget, SwapMode } from './interfaces/patch.interface';

/**
 * A DOM id a page renders once and producers patch later
 */
export class Target {
  readonly id: string;

  constructor(id?: string) {
    this.id = id ?? Target.createId();
  }

  static createId(): string {
    return 'i' + uuidv4().replace(/-/g, '').slice(0, 15);
  }

  /** Replace the node's contents */
  get render(): PatchTarget {
    return this.as(SwapMode.INLINE);
  }

  /** Replace the node itself; the new HTML should carry the same id */
  get replace(): PatchTarget {
    return this.as(SwapMode.OUTLINE);
  }

  get append(): PatchTarget {
    return this.as(SwapMode.APPEND);
  }

  get prepend(): PatchTarget {
    return this.as(SwapMode.PREPEND);
  }

  get stop(): PatchTarget {
    return this.as(SwapMode.NONE);
  }

  private as(swap: SwapMode): PatchTarget {
    return { id: this.id, swap };
  }
}
