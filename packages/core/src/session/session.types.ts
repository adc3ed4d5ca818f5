/**
 * Lifecycle phase of a watch session.
 *
 * - initialized: built from defaults or the config file, nothing ran yet
 * - prompting: the REPL is waiting for operator input
 * - starting: a manual execution was requested and is being launched
 * - executed: the last manual execution completed
 */
export type Phase = "initialized" | "prompting" | "starting" | "executed";

export const DEFAULT_LATENCY_MS = 500;

export interface SessionOptions {
  program?: string;
  args?: string;
  /** Empty or missing falls back to the current working directory */
  monitoredDirs?: string[];
  latencyMs?: number;
}
