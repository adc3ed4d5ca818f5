/**
 * FsChangeAggregator - chokidar-backed change aggregator
 *
 * One recursive chokidar watcher per monitored root. Every add/change/unlink
 * (files and directories) is normalized into a `watch.change.detected` event
 * on the EventBus. Debouncing is the coordinator's job, not this module's.
 */

import { watch, type FSWatcher } from "chokidar";
import { existsSync } from "fs";
import { resolve } from "path";
import { createLogger } from "../../logger/logger";
import type { IChangeAggregator } from "../change_aggregator";
import type {
  ChangeAggregatorDependencies,
  ChangeAggregatorStatus,
  ChangeKind,
} from "../change_aggregator.types";
import type { ChangeDetectedEvent, IEventStream } from "../../event_bus";
import {
  MonitoredRootNotFoundError,
  WatcherSetupError,
} from "../change_aggregator.errors";

export interface FsChangeAggregatorOptions {
  /** Use fs polling instead of native events (network mounts, containers) */
  usePolling?: boolean;
}

// --- Implementation ---

export class FsChangeAggregator implements IChangeAggregator {
  private eventBus: IEventStream;
  private usePolling: boolean;
  private logger = createLogger("[FsChangeAggregator] ");
  private watchers: FSWatcher[] = [];
  private monitoredRoots: string[] = [];
  private running = false;
  private eventsPublished = 0;
  private lastError?: Error;

  constructor(
    deps: ChangeAggregatorDependencies,
    options: FsChangeAggregatorOptions = {}
  ) {
    this.eventBus = deps.eventBus;
    this.usePolling = options.usePolling ?? false;
  }

  /**
   * Creates one watcher per root and resolves once every watcher finished its
   * initial scan, so changes made afterwards are reported.
   *
   * @throws MonitoredRootNotFoundError if a root does not exist
   * @throws WatcherSetupError if chokidar refuses a root
   */
  async start(roots: string[]): Promise<void> {
    const resolvedRoots = roots.map((root) => resolve(root));
    for (const root of resolvedRoots) {
      if (!existsSync(root)) {
        throw new MonitoredRootNotFoundError(root);
      }
    }

    const ready: Promise<void>[] = [];
    for (const root of resolvedRoots) {
      let watcher: FSWatcher;
      try {
        watcher = watch(root, {
          ignoreInitial: true,
          persistent: true,
          usePolling: this.usePolling,
        });
      } catch (error) {
        await this.stop();
        throw new WatcherSetupError(
          root,
          error instanceof Error ? error : new Error(String(error))
        );
      }

      watcher.on("add", (fp) => this.onWatcherEvent(root, fp, "created"));
      watcher.on("addDir", (fp) => this.onWatcherEvent(root, fp, "created"));
      watcher.on("change", (fp) => this.onWatcherEvent(root, fp, "modified"));
      watcher.on("unlink", (fp) => this.onWatcherEvent(root, fp, "deleted"));
      watcher.on("unlinkDir", (fp) => this.onWatcherEvent(root, fp, "deleted"));
      watcher.on("error", (error: unknown) => this.onWatcherError(root, error));

      ready.push(
        new Promise<void>((resolveReady) => {
          watcher.once("ready", () => resolveReady());
          watcher.once("error", () => resolveReady());
        })
      );

      this.watchers.push(watcher);
      this.monitoredRoots.push(root);
    }

    this.running = true;
    await Promise.all(ready);
    this.logger.debug(`Watching ${this.monitoredRoots.join(", ")}`);
  }

  /** Closes every watcher; safe to call repeatedly */
  async stop(): Promise<void> {
    const closing = this.watchers.map((w) => w.close());
    this.watchers = [];
    this.monitoredRoots = [];
    this.running = false;

    const results = await Promise.allSettled(closing);
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.warn(`Failed to close watcher: ${String(result.reason)}`);
      }
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  getStatus(): ChangeAggregatorStatus {
    return {
      isRunning: this.running,
      monitoredRoots: [...this.monitoredRoots],
      eventsPublished: this.eventsPublished,
      lastError: this.lastError,
    };
  }

  private onWatcherEvent(root: string, filePath: string, kind: ChangeKind): void {
    if (!this.running) return;

    const event: ChangeDetectedEvent = {
      type: "watch.change.detected",
      timestamp: Date.now(),
      source: "change_aggregator",
      payload: { root, path: filePath, kind },
    };

    try {
      this.eventBus.publish(event);
      this.eventsPublished++;
    } catch (error) {
      this.onWatcherError(root, error);
    }
  }

  // A failing feed must not take the session down with it
  private onWatcherError(root: string, error: unknown): void {
    this.lastError = error instanceof Error ? error : new Error(String(error));
    this.logger.error(`Watcher error under ${root}: ${this.lastError.message}`);
  }
}
