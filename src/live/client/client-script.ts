import { LIVE_DEFAULTS, LIVE_PATHS } from '../constants/live.constants';
import { ClientConfig } from '../interfaces/live-config.interface';
import { createBrowserHost } from './browser-host';
import { installPatchClient, PatchClientOptions } from './patch-client';

/** Global the installed client handle is kept under */
export const CLIENT_GLOBAL = '__livePatch';

export function toClientOptions(config: ClientConfig): PatchClientOptions {
  return {
    socketPath: LIVE_PATHS.SOCKET,
    pollPath: LIVE_PATHS.POLL,
    invalidPath: LIVE_PATHS.INVALID,
    pollIntervalMs: config.pollIntervalMs,
    reconnectBaseMs: config.reconnectBaseMs,
    reconnectMaxMs: config.reconnectMaxMs,
    maxRetryExponent: LIVE_DEFAULTS.CLIENT_MAX_RETRY_EXPONENT,
  };
}

/**
 * Source of /_live/client.js. Installs once per page, even when the script
 * tag appears more than once.
 */
export function buildClientScript(config: ClientConfig): string {
  const options = JSON.stringify(toClientOptions(config));
  return [
    '(function () {',
    `  if (window.${CLIENT_GLOBAL}) { return; }`,
    installPatchClient.toString(),
    createBrowserHost.toString(),
    `  window.${CLIENT_GLOBAL} = installPatchClient(createBrowserHost(), ${options});`,
    '})();',
    '',
  ].join('\n');
}
