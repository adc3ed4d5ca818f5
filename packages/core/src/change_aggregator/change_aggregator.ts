/**
 * IChangeAggregator - Change Aggregator Interface
 *
 * Subscribes one watch feed per monitored root and publishes every
 * modify/create/move/delete as a single `watch.change.detected` event.
 * It never touches timers or processes: the execution coordinator consumes
 * the events and owns the debounce.
 *
 * Implementations:
 * - FsChangeAggregator: chokidar watchers (change_aggregator/fs/)
 * - MemoryChangeAggregator: scripted changes for tests (change_aggregator/memory/)
 *
 * @module change_aggregator
 */

import type { ChangeAggregatorStatus } from "./change_aggregator.types";

export interface IChangeAggregator {
  /** Start watching the given roots recursively. Replaces nothing: call stop() first. */
  start(roots: string[]): Promise<void>;

  /** Stop watching and release all watchers */
  stop(): Promise<void>;

  /** Whether any watch feed is active */
  isRunning(): boolean;

  /** Current status snapshot */
  getStatus(): ChangeAggregatorStatus;
}
