import {
  ChangeAggregator,
  Config,
  ConfigStore,
  EventBus,
  ExecutionCoordinator,
  ProcessRunner,
  Session,
} from '@watchrun/core';

/**
 * Everything one `watchrun` session runs on
 */
export interface WatchRuntime {
  session: Session.Session;
  eventBus: EventBus.EventBus;
  coordinator: ExecutionCoordinator.ExecutionCoordinator;
}

/**
 * Dependency Injection Service for the watchrun CLI
 *
 * Builds the filesystem-backed collaborators (config store, chokidar change
 * aggregator, shell process runner) and wires them into a coordinator.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configManagers = new Map<string, Config.ConfigManager>();
  private eventBus: EventBus.EventBus | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Resets the singleton instance (useful for testing)
   */
  static reset(): void {
    DependencyInjectionService.instance = null;
  }

  getConfigManager(configPath: string = ConfigStore.DEFAULT_CONFIG_FILE): Config.ConfigManager {
    let manager = this.configManagers.get(configPath);
    if (!manager) {
      manager = ConfigStore.createConfigManager(configPath);
      this.configManagers.set(configPath, manager);
    }
    return manager;
  }

  getEventBus(): EventBus.EventBus {
    if (!this.eventBus) {
      this.eventBus = new EventBus.EventBus();
    }
    return this.eventBus;
  }

  /**
   * Builds a session from the effective config and a coordinator that
   * reports to the given reporter.
   */
  createWatchRuntime(
    config: Config.ResolvedWatchConfig,
    reporter: ExecutionCoordinator.ExecutionReporter
  ): WatchRuntime {
    const eventBus = this.getEventBus();
    const session = new Session.Session({
      program: config.program,
      args: config.args,
      monitoredDirs: config.monitoredDirs,
      latencyMs: config.latencyMs,
    });

    const coordinator = new ExecutionCoordinator.ExecutionCoordinator(
      {
        session,
        processRunner: new ProcessRunner.LocalProcessRunner(),
        changeAggregator: new ChangeAggregator.FsChangeAggregator({ eventBus }),
        eventBus,
        reporter,
      },
      { resolveTargetOnFire: config.resolveTargetOnFire }
    );

    return { session, eventBus, coordinator };
  }
}
