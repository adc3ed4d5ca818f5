export { MemoryChangeAggregator } from './memory_change_aggregator';
