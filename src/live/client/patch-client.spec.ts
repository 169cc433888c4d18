import {
  ClientSocket,
  installPatchClient,
  PatchClientHandle,
  PatchClientHost,
  PatchClientOptions,
  PatchNode,
  SocketHandlers,
} from './patch-client';

class FakeNode implements PatchNode {
  outerHTML = '';

  constructor(public innerHTML = '') {}

  insertAdjacentHTML(position: 'afterbegin' | 'beforeend', html: string): void {
    this.innerHTML =
      position === 'beforeend' ? this.innerHTML + html : html + this.innerHTML;
  }
}

interface OpenedSocket {
  path: string;
  handlers: SocketHandlers;
  closed: boolean;
}

class FakeHost implements PatchClientHost {
  readonly sockets: OpenedSocket[] = [];
  readonly connectTimes: number[] = [];
  readonly nodes = new Map<string, FakeNode>();
  readonly logs: string[] = [];
  reloads = 0;
  offline = false;

  getJson = jest.fn<Promise<unknown>, [string]>(() => Promise.resolve({ patches: [] }));
  postJson = jest.fn<Promise<void>, [string, unknown]>(() => Promise.resolve());

  connect(path: string, handlers: SocketHandlers): ClientSocket {
    this.connectTimes.push(Date.now());
    if (this.offline) {
      throw new Error('offline');
    }
    const opened: OpenedSocket = { path, handlers, closed: false };
    this.sockets.push(opened);
    return {
      close: () => {
        opened.closed = true;
      },
    };
  }

  findTarget(id: string): PatchNode | null {
    return this.nodes.get(id) ?? null;
  }

  reload(): void {
    this.reloads++;
  }

  schedule(callback: () => void, delayMs: number): () => void {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  }

  repeat(callback: () => void, intervalMs: number): () => void {
    const handle = setInterval(callback, intervalMs);
    return () => clearInterval(handle);
  }

  log(message: string): void {
    this.logs.push(message);
  }

  get current(): OpenedSocket {
    return this.sockets[this.sockets.length - 1];
  }
}

const options: PatchClientOptions = {
  socketPath: '/_live/ws',
  pollPath: '/_live/patch',
  invalidPath: '/_live/invalid',
  pollIntervalMs: 1500,
  reconnectBaseMs: 1200,
  reconnectMaxMs: 10000,
  maxRetryExponent: 6,
};

const flush = async (): Promise<void> => {
  for (let i = 0; i < 5; i++) {
    await Promise.resolve();
  }
};

describe('installPatchClient', () => {
  let host: FakeHost;
  let client: PatchClientHandle;

  beforeEach(() => {
    jest.useFakeTimers();
    host = new FakeHost();
  });

  afterEach(() => {
    client.stop();
    jest.useRealTimers();
  });

  describe('connection lifecycle', () => {
    it('should connect and poll right away', () => {
      client = installPatchClient(host, options);

      expect(client.state()).toBe('connecting');
      expect(client.isPolling()).toBe(true);
      expect(host.current.path).toBe('/_live/ws');
      expect(host.getJson).toHaveBeenCalledTimes(1);
      expect(host.getJson).toHaveBeenCalledWith('/_live/patch');
    });

    it('should stop polling once connected, after one last poll', () => {
      client = installPatchClient(host, options);

      host.current.handlers.onOpen();

      expect(client.state()).toBe('connected');
      expect(client.isPolling()).toBe(false);
      expect(host.getJson).toHaveBeenCalledTimes(2);

      jest.advanceTimersByTime(6000);
      expect(host.getJson).toHaveBeenCalledTimes(2);
    });

    it('should poll on its interval while connecting', () => {
      client = installPatchClient(host, options);

      jest.advanceTimersByTime(3000);

      expect(host.getJson).toHaveBeenCalledTimes(3);
    });

    it('should fall back to polling and reconnect after a close', () => {
      client = installPatchClient(host, options);
      host.current.handlers.onOpen();

      host.current.handlers.onClose();

      expect(client.state()).toBe('reconnect_wait');
      expect(client.isPolling()).toBe(true);
      expect(host.getJson).toHaveBeenCalledTimes(3);

      jest.advanceTimersByTime(1199);
      expect(host.sockets).toHaveLength(1);
      jest.advanceTimersByTime(1);
      expect(host.sockets).toHaveLength(2);
      expect(client.state()).toBe('connecting');
    });

    it('should schedule one reconnect for an error followed by a close', () => {
      client = installPatchClient(host, options);
      const first = host.current;

      first.handlers.onError();
      first.handlers.onClose();
      jest.advanceTimersByTime(2400);

      expect(host.sockets).toHaveLength(2);
    });

    it('should ignore events from a replaced socket', () => {
      client = installPatchClient(host, options);
      const first = host.current;
      first.handlers.onClose();
      jest.advanceTimersByTime(1200);

      first.handlers.onOpen();

      expect(client.state()).toBe('connecting');
    });

    it('should back off exponentially up to the cap', () => {
      host.offline = true;
      client = installPatchClient(host, options);

      jest.advanceTimersByTime(1200 + 2400 + 4800 + 9600 + 10000 + 10000);

      const delays = host.connectTimes
        .slice(1)
        .map((time, i) => time - host.connectTimes[i]);
      expect(delays).toEqual([1200, 2400, 4800, 9600, 10000, 10000]);
      expect(client.retryAttempt()).toBe(6);
      expect(host.logs[0]).toBe('socket unavailable: Error: offline');
    });

    it('should reset the backoff once a socket opens', () => {
      client = installPatchClient(host, options);
      host.current.handlers.onClose();
      jest.advanceTimersByTime(1200);
      host.current.handlers.onClose();
      expect(client.retryAttempt()).toBe(2);

      jest.advanceTimersByTime(2400);
      host.current.handlers.onOpen();

      expect(client.retryAttempt()).toBe(0);
    });
  });

  describe('applying patches', () => {
    beforeEach(() => {
      client = installPatchClient(host, options);
      host.current.handlers.onOpen();
    });

    it('should swap by mode', () => {
      const inline = new FakeNode('old');
      const outline = new FakeNode();
      const list = new FakeNode('<li>b</li>');
      host.nodes.set('inline', inline);
      host.nodes.set('outline', outline);
      host.nodes.set('list', list);

      client.handleMessage(
        JSON.stringify({
          type: 'patch',
          patches: [
            { id: 'inline', swap: 'inline', html: 'new' },
            { id: 'outline', swap: 'outline', html: '<div id="outline"></div>' },
            { id: 'list', swap: 'append', html: '<li>c</li>' },
            { id: 'list', swap: 'prepend', html: '<li>a</li>' },
          ],
        }),
      );

      expect(inline.innerHTML).toBe('new');
      expect(outline.outerHTML).toBe('<div id="outline"></div>');
      expect(list.innerHTML).toBe('<li>a</li><li>b</li><li>c</li>');
    });

    it('should leave the node alone for swap none', () => {
      const node = new FakeNode('same');
      host.nodes.set('n', node);

      expect(client.applyPatch({ id: 'n', swap: 'none', html: 'ignored' })).toBe(true);
      expect(node.innerHTML).toBe('same');
    });

    it('should treat an unknown swap as inline', () => {
      const node = new FakeNode('old');
      host.nodes.set('n', node);

      client.handleMessage(
        JSON.stringify({ type: 'patch', patches: [{ id: 'n', swap: 'sideways', html: 'x' }] }),
      );

      expect(node.innerHTML).toBe('x');
    });

    it('should report a missing target and move on', () => {
      const node = new FakeNode();
      host.nodes.set('kept', node);

      client.handleMessage(
        JSON.stringify({
          type: 'patch',
          patches: [
            { id: 'gone', swap: 'inline', html: 'x' },
            { id: 'kept', swap: 'inline', html: 'y' },
          ],
        }),
      );

      expect(host.postJson).toHaveBeenCalledTimes(1);
      expect(host.postJson).toHaveBeenCalledWith('/_live/invalid', { id: 'gone' });
      expect(node.innerHTML).toBe('y');
    });

    it('should skip patches without an id', () => {
      client.handleMessage(
        JSON.stringify({ type: 'patch', patches: [{ swap: 'inline', html: 'x' }, 'junk'] }),
      );

      expect(host.postJson).not.toHaveBeenCalled();
    });

    it('should reload on a reload message', () => {
      client.handleMessage('{"type":"reload"}');

      expect(host.reloads).toBe(1);
    });

    it('should ignore malformed messages', () => {
      expect(() => client.handleMessage('not json')).not.toThrow();
      expect(() => client.handleMessage('null')).not.toThrow();
      expect(() => client.handleMessage('{"type":"patch"}')).not.toThrow();
    });

    it('should route socket messages through the handler', () => {
      const node = new FakeNode();
      host.nodes.set('clock', node);

      host.current.handlers.onMessage(
        '{"type":"patch","patches":[{"id":"clock","swap":"inline","html":"12:00"}]}',
      );

      expect(node.innerHTML).toBe('12:00');
    });
  });

  describe('polling', () => {
    beforeEach(() => {
      client = installPatchClient(host, options);
    });

    it('should apply polled patches', async () => {
      const node = new FakeNode();
      host.nodes.set('box', node);
      host.getJson.mockResolvedValueOnce({
        patches: [{ id: 'box', swap: 'append', html: '<p>1</p>' }],
      });

      await client.poll();

      expect(node.innerHTML).toBe('<p>1</p>');
    });

    it('should log a failed poll instead of rejecting', async () => {
      host.getJson.mockRejectedValueOnce(new Error('HTTP 500'));

      await expect(client.poll()).resolves.toBeUndefined();
      expect(host.logs).toContain('poll failed: Error: HTTP 500');
    });

    it('should log a failed invalid report', async () => {
      host.postJson.mockRejectedValueOnce(new Error('offline'));

      client.notifyInvalid('gone');
      await flush();

      expect(host.logs).toContain('invalid report failed: Error: offline');
    });

    it('should not report an empty id', () => {
      client.notifyInvalid('');

      expect(host.postJson).not.toHaveBeenCalled();
    });
  });

  describe('stop', () => {
    it('should close the socket and cancel every timer', () => {
      client = installPatchClient(host, options);
      const socket = host.current;

      client.stop();
      jest.advanceTimersByTime(60000);

      expect(client.state()).toBe('stopped');
      expect(client.isPolling()).toBe(false);
      expect(socket.closed).toBe(true);
      expect(host.getJson).toHaveBeenCalledTimes(1);
      expect(host.sockets).toHaveLength(1);
    });

    it('should cancel a pending reconnect', () => {
      client = installPatchClient(host, options);
      host.current.handlers.onClose();

      client.stop();
      jest.advanceTimersByTime(60000);

      expect(host.sockets).toHaveLength(1);
    });
  });
});
