import { DependencyInjectionService } from './dependency-injection';
import type { ExecutionCoordinator } from '@watchrun/core';

const silentReporter: ExecutionCoordinator.ExecutionReporter = {
  onResult: jest.fn(),
  onChangeNotice: jest.fn(),
  onNotice: jest.fn(),
};

describe('DependencyInjectionService', () => {
  let diService: DependencyInjectionService;

  beforeEach(() => {
    DependencyInjectionService.reset();
    diService = DependencyInjectionService.getInstance();
  });

  afterEach(() => {
    DependencyInjectionService.reset();
  });

  describe('Singleton Pattern', () => {
    it('should return same instance across multiple calls', () => {
      const instance1 = DependencyInjectionService.getInstance();
      const instance2 = DependencyInjectionService.getInstance();

      expect(instance1).toBe(instance2);
      expect(instance1).toBe(diService);
    });

    it('should reset singleton instance correctly', () => {
      const instance1 = DependencyInjectionService.getInstance();

      DependencyInjectionService.reset();

      const instance2 = DependencyInjectionService.getInstance();
      expect(instance1).not.toBe(instance2);
    });
  });

  describe('getConfigManager', () => {
    it('should cache one manager per config path', () => {
      const first = diService.getConfigManager('/tmp/a/watchrun.json');
      const again = diService.getConfigManager('/tmp/a/watchrun.json');
      const other = diService.getConfigManager('/tmp/b/watchrun.json');

      expect(again).toBe(first);
      expect(other).not.toBe(first);
      expect(other.location).toBe('/tmp/b/watchrun.json');
    });

    it('should default to watchrun.json in the working directory', () => {
      const manager = diService.getConfigManager();

      expect(manager.location).toBe(`${process.cwd()}/watchrun.json`);
    });
  });

  describe('createWatchRuntime', () => {
    it('should build a session from the effective config', () => {
      const { session, coordinator } = diService.createWatchRuntime(
        {
          monitoredDirs: ['src'],
          program: 'make',
          args: 'test',
          latencyMs: 250,
          resolveTargetOnFire: false,
        },
        silentReporter
      );

      expect(session.getCommandLine()).toBe('make test');
      expect(coordinator.getStatus()).toEqual({
        phase: 'initialized',
        commandLine: 'make test',
        monitoredDirs: ['src'],
        latencyMs: 250,
        watching: false,
        running: false,
        pid: null,
        debouncePending: false,
        lastChangeAt: null,
        executionCount: 0,
      });
    });

    it('should make the coordinator the consumer of change events', async () => {
      const { eventBus, coordinator } = diService.createWatchRuntime(
        { monitoredDirs: ['./'], program: '', args: '', latencyMs: 500, resolveTargetOnFire: false },
        silentReporter
      );

      expect(eventBus.getSubscriptionCount('watch.change.detected')).toBe(1);

      await coordinator.shutdown();
      expect(eventBus.getSubscriptionCount('watch.change.detected')).toBe(0);
    });
  });
});
