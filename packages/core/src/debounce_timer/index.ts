export { DebounceTimer } from './debounce_timer';
export type { DebounceCallback } from './debounce_timer';
