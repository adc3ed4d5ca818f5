/**
 * Who asked for an execution: the operator through the REPL, or the debounce
 * timer after a burst of filesystem changes.
 */
export type ExecutionTrigger = "manual" | "automatic";

/**
 * Outcome of one execution. Never thrown: launch failures land in `error`.
 */
export interface ExecutionResult {
  commandLine: string;
  /** Captured stdout, trailing whitespace trimmed */
  stdout: string;
  /** Captured stderr, trailing whitespace trimmed */
  stderr: string;
  /** null when the process was killed by a signal or never launched */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
  /** Display flag: stderr was non-empty or the launch failed */
  failed: boolean;
  /** Human-readable launch failure */
  error?: string;
}

/**
 * A launched child process. `completion` never rejects.
 */
export interface ProcessHandle {
  readonly pid: number | null;
  readonly commandLine: string;
  readonly startedAt: number;
  readonly completion: Promise<ExecutionResult>;
  /** True once completion has settled: the process exited and its output closed */
  hasExited(): boolean;
}

export interface LocalProcessRunnerOptions {
  /** Working directory for commands (default: process.cwd()) */
  cwd?: string;
  /** Extra environment merged over process.env */
  env?: Record<string, string>;
  /** Time between SIGTERM and SIGKILL during terminate() (default: 2000) */
  killGraceMs?: number;
  /** Shell used to interpret the command line (default: true, the system shell) */
  shell?: string | boolean;
}
