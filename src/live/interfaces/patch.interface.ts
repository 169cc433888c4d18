/**
 * How a patch's HTML lands on its target node
 */
export enum SwapMode {
  /** Replace the node's contents */
  INLINE = 'inline',
  /** Replace the node itself */
  OUTLINE = 'outline',
  APPEND = 'append',
  PREPEND = 'prepend',
  /** No DOM effect; the patch only signals */
  NONE = 'none',
}

export interface Patch {
  readonly targetId: string;
  readonly swap: SwapMode;
  readonly html: string;
}

/**
 * Patch as it travels to the browser
 */
export interface WirePatch {
  id: string;
  swap: SwapMode;
  html: string;
}

export interface PatchTarget {
  id: string;
  swap: SwapMode;
}

export type PatchMessage =
  | { type: 'patch'; patches: WirePatch[] }
  | { type: 'reload' };

export interface PollResponse {
  patches: WirePatch[];
}

/**
 * HTML for a patch, given directly or produced later
 */
export type PatchContent =
  | string
  | Promise<string>
  | (() => string | Promise<string>);

export type CleanupCallback = () => void;

export function createPatch(
  targetId: string,
  html: string,
  swap: SwapMode = SwapMode.INLINE,
): Patch {
  return Object.freeze({ targetId, swap, html });
}

export function toWirePatch(patch: Patch): WirePatch {
  return { id: patch.targetId, swap: patch.swap, html: patch.html };
}
