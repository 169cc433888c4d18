import type { PatchClientHost } from './patch-client';

/**
 * PatchClientHost over the page's window. Serialised next to
 * installPatchClient, so it follows the same self-containment rule.
 */
export function createBrowserHost(): PatchClientHost {
  return {
    connect(path, handlers) {
      const { protocol, host } = window.location;
      if (!host) {
        throw new Error('page has no host');
      }
      const scheme = protocol === 'https:' ? 'wss' : 'ws';
      const ws = new WebSocket(scheme + '://' + host + path);
      ws.onopen = () => handlers.onOpen();
      ws.onmessage = (event: MessageEvent) => {
        if (typeof event.data === 'string') {
          handlers.onMessage(event.data);
        }
      };
      ws.onerror = () => handlers.onError();
      ws.onclose = () => handlers.onClose();
      return {
        close() {
          ws.onopen = null;
          ws.onmessage = null;
          ws.onerror = null;
          ws.onclose = null;
          ws.close();
        },
      };
    },
    async getJson(path) {
      const response = await fetch(path, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        credentials: 'same-origin',
      });
      if (!response.ok) {
        throw new Error('HTTP ' + response.status);
      }
      const body: unknown = await response.json();
      return body;
    },
    async postJson(path, body) {
      await fetch(path, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        credentials: 'same-origin',
        keepalive: true,
      });
    },
    findTarget(id) {
      return document.getElementById(id);
    },
    reload() {
      window.location.reload();
    },
    schedule(callback, delayMs) {
      const handle = window.setTimeout(callback, delayMs);
      return () => window.clearTimeout(handle);
    },
    repeat(callback, intervalMs) {
      const handle = window.setInterval(callback, intervalMs);
      return () => window.clearInterval(handle);
    },
    log(message) {
      console.debug('[live] ' + message);
    },
  };
}
