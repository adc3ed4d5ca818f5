/**
 * IProcessRunner - Process Runner Interface
 *
 * Owns nothing between calls: the execution coordinator keeps the single
 * ProcessHandle and decides when to launch or terminate.
 *
 * Implementations:
 * - LocalProcessRunner: child_process.spawn through the system shell (process_runner/local/)
 * - MemoryProcessRunner: scripted handles for tests (process_runner/memory/)
 *
 * @module process_runner
 */

import type { ExecutionResult, ProcessHandle } from "./process_runner.types";

export interface IProcessRunner {
  /**
   * Start a command line and return immediately with its handle.
   * Launch failures are reported through handle.completion, never thrown.
   */
  launch(commandLine: string): ProcessHandle;

  /** Launch and wait for completion */
  execute(commandLine: string): Promise<ExecutionResult>;

  /**
   * Request termination of the process and everything it started. Resolves
   * once completion has settled and nothing of the process remains.
   * No-op when nothing is left. Never rejects.
   */
  terminate(handle: ProcessHandle): Promise<void>;
}
