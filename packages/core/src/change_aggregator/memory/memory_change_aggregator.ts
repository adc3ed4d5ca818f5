import type { IChangeAggregator } from "../change_aggregator";
import type {
  ChangeAggregatorDependencies,
  ChangeAggregatorStatus,
  ChangeKind,
} from "../change_aggregator.types";
import type { IEventStream } from "../../event_bus";

/**
 * In-memory change aggregator for tests: nothing is watched, changes are
 * injected with emitChange() and published exactly like the fs implementation.
 */
export class MemoryChangeAggregator implements IChangeAggregator {
  private eventBus: IEventStream;
  private monitoredRoots: string[] = [];
  private running = false;
  private eventsPublished = 0;

  /** Number of completed start() calls, for restart assertions */
  public startCount = 0;
  public stopCount = 0;

  constructor(deps: ChangeAggregatorDependencies) {
    this.eventBus = deps.eventBus;
  }

  async start(roots: string[]): Promise<void> {
    this.monitoredRoots = [...roots];
    this.running = true;
    this.startCount++;
  }

  async stop(): Promise<void> {
    this.monitoredRoots = [];
    this.running = false;
    this.stopCount++;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): ChangeAggregatorStatus {
    return {
      isRunning: this.running,
      monitoredRoots: [...this.monitoredRoots],
      eventsPublished: this.eventsPublished,
      lastError: undefined,
    };
  }

  /**
   * Publishes a change as if a watcher saw it. Ignored while stopped, like a
   * closed chokidar watcher.
   *
   * @returns whether the change was published
   */
  emitChange(root: string, path: string, kind: ChangeKind = "modified"): boolean {
    if (!this.running) return false;

    this.eventBus.publish({
      type: "watch.change.detected",
      timestamp: Date.now(),
      source: "change_aggregator",
      payload: { root, path, kind },
    });
    this.eventsPublished++;
    return true;
  }
}
