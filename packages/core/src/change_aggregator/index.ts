export type { IChangeAggregator } from './change_aggregator';

export type {
  ChangeKind,
  ChangeAggregatorDependencies,
  ChangeAggregatorStatus,
} from './change_aggregator.types';

export {
  ChangeAggregatorError,
  MonitoredRootNotFoundError,
  WatcherSetupError,
  isChangeAggregatorError,
  isMonitoredRootNotFoundError,
  isWatcherSetupError,
} from './change_aggregator.errors';

export { FsChangeAggregator } from './fs';
export type { FsChangeAggregatorOptions } from './fs';
export { MemoryChangeAggregator } from './memory';
