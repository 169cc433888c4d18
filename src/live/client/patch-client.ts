import type { SwapMode } from '../interfaces/patch.interface';

/*
 * Browser side of live delivery. `installPatchClient` is serialised with
 * Function.prototype.toString into /_live/client.js, so its body must not
 * reach any module-level value: everything it needs comes through `host`
 * and `options`. Type-only imports are fine.
 */

export type ClientState = 'connecting' | 'connected' | 'reconnect_wait' | 'stopped';

export type ClientSwapMode = `${SwapMode}`;

export interface ClientPatch {
  id: string;
  swap: ClientSwapMode;
  html: string;
}

/**
 * The slice of a DOM element a patch touches
 */
export interface PatchNode {
  innerHTML: string;
  outerHTML: string;
  insertAdjacentHTML(position: 'afterbegin' | 'beforeend', html: string): void;
}

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onError(): void;
  onClose(): void;
}

export interface ClientSocket {
  close(): void;
}

export interface PatchClientHost {
  /** Open the live socket; may throw when no socket can be opened */
  connect(path: string, handlers: SocketHandlers): ClientSocket;
  /** GET returning parsed JSON; rejects on a non-2xx answer */
  getJson(path: string): Promise<unknown>;
  postJson(path: string, body: unknown): Promise<void>;
  findTarget(id: string): PatchNode | null;
  reload(): void;
  /** @returns a cancel function */
  schedule(callback: () => void, delayMs: number): () => void;
  /** @returns a cancel function */
  repeat(callback: () => void, intervalMs: number): () => void;
  log(message: string): void;
}

export interface PatchClientOptions {
  socketPath: string;
  pollPath: string;
  invalidPath: string;
  pollIntervalMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  maxRetryExponent: number;
}

export interface PatchClientHandle {
  state(): ClientState;
  isPolling(): boolean;
  /** Exponent used for the next reconnect delay */
  retryAttempt(): number;
  poll(): Promise<void>;
  notifyInvalid(id: string): void;
  handleMessage(data: string): void;
  /** @returns false when the target is missing */
  applyPatch(patch: ClientPatch): boolean;
  stop(): void;
}

/**
 * Keep one live socket open and fall back to polling while it is not.
 *
 * connecting → connected on open; any error or close moves to
 * reconnect_wait, starts polling and schedules the next connect after
 * min(base * 2^attempt, max).
 */
export function installPatchClient(
  host: PatchClientHost,
  options: PatchClientOptions,
): PatchClientHandle {
  let state: ClientState = 'connecting';
  let attempt = 0;
  let generation = 0;
  let socket: ClientSocket | null = null;
  let cancelPolling: (() => void) | null = null;
  let cancelReconnect: (() => void) | null = null;
  const SWAPS: readonly ClientSwapMode[] = ['inline', 'outline', 'append', 'prepend', 'none'];

  function readPatch(value: unknown): ClientPatch | null {
    if (typeof value !== 'object' || value === null) {
      return null;
    }
    const id = 'id' in value && typeof value.id === 'string' ? value.id : '';
    if (!id) {
      return null;
    }
    const html = 'html' in value && typeof value.html === 'string' ? value.html : '';
    const declared = 'swap' in value ? value.swap : undefined;
    const swap = SWAPS.find((mode) => mode === declared) ?? 'inline';
    return { id, swap, html };
  }

  function applyPatch(patch: ClientPatch): boolean {
    const node = host.findTarget(patch.id);
    if (!node) {
      notifyInvalid(patch.id);
      return false;
    }
    try {
      switch (patch.swap) {
        case 'inline':
          node.innerHTML = patch.html;
          break;
        case 'outline':
          node.outerHTML = patch.html;
          break;
        case 'append':
          node.insertAdjacentHTML('beforeend', patch.html);
          break;
        case 'prepend':
          node.insertAdjacentHTML('afterbegin', patch.html);
          break;
        case 'none':
          break;
        default: {
          const unknownSwap: never = patch.swap;
          host.log('unknown swap ' + String(unknownSwap));
        }
      }
    } catch (error) {
      host.log('patch ' + patch.id + ' failed: ' + String(error));
    }
    return true;
  }

  function applyPatches(list: unknown): void {
    if (!Array.isArray(list)) {
      return;
    }
    for (const item of list) {
      const patch = readPatch(item);
      if (patch) {
        applyPatch(patch);
      }
    }
  }

  function notifyInvalid(id: string): void {
    if (!id) {
      return;
    }
    host.postJson(options.invalidPath, { id }).catch((error: unknown) => {
      host.log('invalid report failed: ' + String(error));
    });
  }

  function handleMessage(data: string): void {
    let message: unknown;
    try {
      message = JSON.parse(data);
    } catch {
      return;
    }
    if (typeof message !== 'object' || message === null || !('type' in message)) {
      return;
    }
    if (message.type === 'patch') {
      applyPatches('patches' in message ? message.patches : []);
    } else if (message.type === 'reload') {
      host.reload();
    }
  }

  function poll(): Promise<void> {
    return host.getJson(options.pollPath).then(
      (body) => {
        if (typeof body === 'object' && body !== null && 'patches' in body) {
          applyPatches(body.patches);
        }
      },
      (error: unknown) => {
        host.log('poll failed: ' + String(error));
      },
    );
  }

  function runPoll(): void {
    poll().catch((error: unknown) => {
      host.log('poll failed: ' + String(error));
    });
  }

  function startPolling(): void {
    if (cancelPolling) {
      return;
    }
    runPoll();
    cancelPolling = host.repeat(runPoll, options.pollIntervalMs);
  }

  function stopPolling(): void {
    if (cancelPolling) {
      cancelPolling();
      cancelPolling = null;
    }
  }

  function scheduleReconnect(): void {
    if (cancelReconnect) {
      return;
    }
    const delay = Math.min(
      options.reconnectBaseMs * Math.pow(2, attempt),
      options.reconnectMaxMs,
    );
    attempt = Math.min(attempt + 1, options.maxRetryExponent);
    cancelReconnect = host.schedule(() => {
      cancelReconnect = null;
      connect();
    }, delay);
  }

  function handleDown(): void {
    if (state === 'stopped') {
      return;
    }
    generation++;
    socket = null;
    state = 'reconnect_wait';
    scheduleReconnect();
    startPolling();
  }

  function connect(): void {
    if (state === 'stopped') {
      return;
    }
    state = 'connecting';
    const current = ++generation;
    const live = (): boolean => current === generation && state !== 'stopped';

    try {
      socket = host.connect(options.socketPath, {
        onOpen: () => {
          if (!live()) {
            return;
          }
          state = 'connected';
          attempt = 0;
          stopPolling();
          runPoll();
        },
        onMessage: (data) => {
          if (live()) {
            handleMessage(data);
          }
        },
        onError: () => {
          if (live()) {
            handleDown();
          }
        },
        onClose: () => {
          if (live()) {
            handleDown();
          }
        },
      });
    } catch (error) {
      host.log('socket unavailable: ' + String(error));
      handleDown();
    }
  }

  function stop(): void {
    state = 'stopped';
    generation++;
    stopPolling();
    if (cancelReconnect) {
      cancelReconnect();
      cancelReconnect = null;
    }
    if (socket) {
      const closing = socket;
      socket = null;
      closing.close();
    }
  }

  connect();
  if (state === 'connecting') {
    startPolling();
  }

  return {
    state: () => state,
    isPolling: () => cancelPolling !== null,
    retryAttempt: () => attempt,
    poll,
    notifyInvalid,
    handleMessage,
    applyPatch,
    stop,
  };
}
