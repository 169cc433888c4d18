import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { PatchQueueService } from './patch-queue.service';
import { createPatch } from '../interfaces/patch.interface';
import { LIVE_DEFAULTS, LIVE_EVENTS } from '../constants/live.constants';
import { SessionRegistryService } from '../registry/session-registry.service';

describe('PatchQueueService', () => {
  let service: PatchQueueService;

  const first = createPatch('a', '<i>1</i>');
  const second = createPatch('b', '<i>2</i>');
  const third = createPatch('c', '<i>3</i>');

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PatchQueueService,
        { provide: ConfigService, useValue: { get: jest.fn().mockReturnValue(undefined) } },
      ],
    }).compile();

    service = module.get<PatchQueueService>(PatchQueueService);
  });

  afterEach(() => {
    service.onModuleDestroy();
  });

  describe('instantiation', () => {
    it('should load default configuration', () => {
      expect(service.getConfig()).toEqual({
        idleTtlMs: LIVE_DEFAULTS.QUEUE_IDLE_TTL_MS,
        sweepIntervalMs: LIVE_DEFAULTS.QUEUE_SWEEP_INTERVAL_MS,
      });
    });

    it('should work without ConfigService', () => {
      const standalone = new PatchQueueService();
      expect(standalone.getConfig().idleTtlMs).toBe(0);
    });
  });

  describe('enqueue and drain', () => {
    it('should drain patches in enqueue order, then nothing', () => {
      service.enqueue('s1', first);
      service.enqueue('s1', second);
      service.enqueue('s1', third);

      expect(service.drain('s1')).toEqual([first, second, third]);
      expect(service.drain('s1')).toEqual([]);
    });

    it('should keep sessions apart', () => {
      service.enqueue('s1', first);
      service.enqueue('s2', second);

      expect(service.drain('s2')).toEqual([second]);
      expect(service.pendingCount('s1')).toBe(1);
      expect(service.sessionCount()).toBe(1);
    });

    it('should count pending patches', () => {
      service.enqueue('s1', first);
      service.enqueue('s1', second);
      service.enqueue('s2', third);

      expect(service.pendingCount()).toBe(3);
      expect(service.pendingCount('s1')).toBe(2);
      expect(service.pendingCount('nobody')).toBe(0);
    });
  });

  describe('snapshot and acknowledge', () => {
    it('should return a copy that later enqueues do not change', () => {
      service.enqueue('s1', first);
      const snapshot = service.snapshot('s1');

      service.enqueue('s1', second);

      expect(snapshot).toEqual([first]);
    });

    it('should drop only the acknowledged prefix', () => {
      service.enqueue('s1', first);
      service.enqueue('s1', second);
      const snapshot = service.snapshot('s1');
      service.enqueue('s1', third);

      service.acknowledge('s1', snapshot.length);

      expect(service.drain('s1')).toEqual([third]);
    });

    it('should remove the session once fully acknowledged', () => {
      service.enqueue('s1', first);

      service.acknowledge('s1', 1);

      expect(service.sessionCount()).toBe(0);
    });
  });

  describe('cleanups', () => {
    it('should run a cleanup once', () => {
      const cleanup = jest.fn();
      service.enqueue('s1', first, cleanup);

      expect(service.invokeCleanup('s1', 'a')).toBe(true);
      expect(service.invokeCleanup('s1', 'a')).toBe(false);
      expect(cleanup).toHaveBeenCalledTimes(1);
    });

    it('should keep the cleanup after the patch is drained', () => {
      service.enqueue('s1', first, jest.fn());
      service.drain('s1');

      expect(service.hasCleanup('s1', 'a')).toBe(true);
      expect(service.cleanupCount()).toBe(1);
    });

    it('should contain a cleanup that throws', () => {
      service.enqueue('s1', first, () => {
        throw new Error('timer already gone');
      });

      expect(service.invokeCleanup('s1', 'a')).toBe(true);
      expect(service.hasCleanup('s1', 'a')).toBe(false);
    });
  });

  describe('evictIdleSessions', () => {
    let evicting: PatchQueueService;
    let eventEmitter: { emit: jest.Mock };
    let registry: SessionRegistryService;

    beforeEach(() => {
      const values: Record<string, number> = {
        LIVE_QUEUE_IDLE_TTL_MS: 1000,
        LIVE_QUEUE_SWEEP_INTERVAL_MS: 500,
      };
      const configService = {
        get: jest.fn((key: string) => values[key]),
      };
      eventEmitter = { emit: jest.fn() };
      registry = new SessionRegistryService();
      evicting = new PatchQueueService(
        configService as unknown as ConfigService,
        eventEmitter as unknown as EventEmitter2,
        registry,
      );
    });

    afterEach(() => {
      evicting.onModuleDestroy();
    });

    it('should do nothing while the TTL is disabled', () => {
      service.enqueue('s1', first);

      expect(service.evictIdleSessions(Date.now() + 10_000_000)).toEqual([]);
      expect(service.pendingCount('s1')).toBe(1);
    });

    it('should discard idle queues and run their cleanups', () => {
      const cleanup = jest.fn();
      const start = Date.now();
      evicting.enqueue('s1', first, cleanup);

      expect(evicting.evictIdleSessions(start + 500)).toEqual([]);
      expect(evicting.evictIdleSessions(start + 60_000)).toEqual(['s1']);

      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(evicting.pendingCount('s1')).toBe(0);
      expect(eventEmitter.emit).toHaveBeenCalledWith(LIVE_EVENTS.QUEUE_EVICTED, {
        sessionId: 's1',
        discardedPatches: 1,
        cleanups: 1,
      });
    });

    it('should spare sessions that were consumed recently', () => {
      evicting.enqueue('s1', first);
      evicting.drain('s1');

      expect(evicting.evictIdleSessions(Date.now() + 100)).toEqual([]);
    });

    it('should spare a session that still has an open connection', () => {
      const cleanup = jest.fn();
      const start = Date.now();
      const channel = {
        id: 'c1',
        isOpen: () => true,
        send: jest.fn(() => true),
        sendJson: jest.fn(() => true),
        close: jest.fn(),
      };
      registry.register('s1', channel);
      evicting.enqueue('s1', first, cleanup);

      expect(evicting.evictIdleSessions(start + 5000)).toEqual([]);

      expect(cleanup).not.toHaveBeenCalled();
      expect(evicting.pendingCount('s1')).toBe(1);
      expect(evicting.hasCleanup('s1', 'a')).toBe(true);
    });

    it('should evict once the last connection is gone and the TTL passes again', () => {
      const cleanup = jest.fn();
      const start = Date.now();
      const channel = {
        id: 'c1',
        isOpen: () => true,
        send: jest.fn(() => true),
        sendJson: jest.fn(() => true),
        close: jest.fn(),
      };
      registry.register('s1', channel);
      evicting.enqueue('s1', first, cleanup);
      expect(evicting.evictIdleSessions(start + 5000)).toEqual([]);

      registry.unregister('s1', channel);

      expect(evicting.evictIdleSessions(start + 5500)).toEqual([]);
      expect(evicting.evictIdleSessions(start + 7000)).toEqual(['s1']);
      expect(cleanup).toHaveBeenCalledTimes(1);
    });

    it('should count an empty poll as consumption', () => {
      const cleanup = jest.fn();
      const start = Date.now();
      evicting.enqueue('s1', first, cleanup);
      evicting.drain('s1');

      jest.spyOn(Date, 'now').mockReturnValue(start + 900);
      expect(evicting.drain('s1')).toEqual([]);
      jest.restoreAllMocks();

      expect(evicting.evictIdleSessions(start + 1500)).toEqual([]);
      expect(cleanup).not.toHaveBeenCalled();
      expect(evicting.evictIdleSessions(start + 2000)).toEqual(['s1']);
      expect(cleanup).toHaveBeenCalledTimes(1);
    });

    it('should sweep on its interval', () => {
      jest.useFakeTimers();
      const swept = new PatchQueueService(
        { get: jest.fn((key: string) => (key === 'LIVE_QUEUE_IDLE_TTL_MS' ? 1000 : 500)) } as unknown as ConfigService,
      );
      const cleanup = jest.fn();
      swept.enqueue('s1', first, cleanup);

      jest.advanceTimersByTime(1500);

      expect(cleanup).toHaveBeenCalledTimes(1);
      swept.onModuleDestroy();
      jest.useRealTimers();
    });
  });

  describe('clear', () => {
    it('should forget queues and cleanups', () => {
      service.enqueue('s1', first, jest.fn());

      service.clear();

      expect(service.pendingCount()).toBe(0);
      expect(service.cleanupCount()).toBe(0);
    });
  });
});
