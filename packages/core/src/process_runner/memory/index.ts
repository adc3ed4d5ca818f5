export { MemoryProcessRunner } from './memory_process_runner';
export type { MemoryProcessRunnerOptions, ScriptedResult } from './memory_process_runner';
