export { FsChangeAggregator } from './fs_change_aggregator';
export type { FsChangeAggregatorOptions } from './fs_change_aggregator';
