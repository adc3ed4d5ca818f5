export type { IProcessRunner } from './process_runner';

export type {
  ExecutionTrigger,
  ExecutionResult,
  ProcessHandle,
  LocalProcessRunnerOptions,
} from './process_runner.types';

export { LocalProcessRunner } from './local';
export { MemoryProcessRunner } from './memory';
export type { MemoryProcessRunnerOptions, ScriptedResult } from './memory';
