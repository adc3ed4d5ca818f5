import { DebounceTimer } from "../debounce_timer/debounce_timer";
import type { ProcessHandle } from "../process_runner/process_runner.types";
import { DEFAULT_LATENCY_MS } from "./session.types";
import type { Phase, SessionOptions } from "./session.types";

/**
 * Session - mutable state of one watchrun run.
 *
 * Holds the command, the monitored roots and the two exclusive resources:
 * the running child (`child`, 0 or 1) and the debounce timer (0 or 1 pending).
 * Only the ExecutionCoordinator mutates `child` and arms `timer`.
 */
export class Session {
  program: string;
  args: string;
  readonly monitoredDirs: readonly string[];
  readonly latencyMs: number;
  phase: Phase = "initialized";
  child: ProcessHandle | null = null;
  readonly timer = new DebounceTimer();
  lastChangeAt: number | null = null;
  executionCount = 0;

  private stopController = new AbortController();

  constructor(options: SessionOptions = {}) {
    this.program = options.program?.trim() ?? "";
    this.args = options.args?.trim() ?? "";
    this.monitoredDirs =
      options.monitoredDirs && options.monitoredDirs.length > 0
        ? [...options.monitoredDirs]
        : [process.cwd()];
    this.latencyMs = options.latencyMs ?? DEFAULT_LATENCY_MS;
  }

  /**
   * Program plus arguments, or null when no program is configured.
   */
  getCommandLine(): string | null {
    if (!this.program) return null;
    return this.args ? `${this.program} ${this.args}` : this.program;
  }

  hasCommand(): boolean {
    return this.program.length > 0;
  }

  setCommand(program: string, args: string = ""): void {
    this.program = program.trim();
    this.args = args.trim();
  }

  setArgs(args: string): void {
    this.args = args.trim();
  }

  get stopSignal(): AbortSignal {
    return this.stopController.signal;
  }

  /** Idempotent */
  requestStop(): void {
    this.stopController.abort();
  }

  isStopRequested(): boolean {
    return this.stopController.signal.aborted;
  }

  /** Fresh signal for a new monitoring session */
  renewStopSignal(): AbortSignal {
    this.stopController.abort();
    this.stopController = new AbortController();
    return this.stopController.signal;
  }
}

/**
 * Splits "program rest of args" at the first run of whitespace.
 * Returns null for blank input.
 */
export function parseCommandText(text: string): { program: string; args: string } | null {
  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match || match[1] === undefined) return null;
  return { program: match[1], args: (match[2] ?? "").trim() };
}
