import type { IProcessRunner } from "../process_runner";
import type { ExecutionResult, ProcessHandle } from "../process_runner.types";

export type ScriptedResult = Partial<Pick<ExecutionResult, "stdout" | "stderr" | "exitCode">>;

export interface MemoryProcessRunnerOptions {
  /**
   * Complete every launch on the next macrotask (default: true).
   * With false, handles stay running until complete() or terminate().
   */
  autoComplete?: boolean;
  /** Output per command line; unknown command lines produce empty output */
  results?: Record<string, ScriptedResult>;
  /** Command lines whose launch fails */
  failingCommands?: string[];
}

class MemoryProcessHandle implements ProcessHandle {
  readonly pid: number | null;
  readonly commandLine: string;
  readonly startedAt = Date.now();
  readonly completion: Promise<ExecutionResult>;

  private exited = false;
  private resolveCompletion: (result: ExecutionResult) => void = () => {};

  constructor(commandLine: string, pid: number | null) {
    this.commandLine = commandLine;
    this.pid = pid;
    this.completion = new Promise<ExecutionResult>((resolve) => {
      this.resolveCompletion = resolve;
    });
  }

  hasExited(): boolean {
    return this.exited;
  }

  finish(result: Omit<ExecutionResult, "commandLine" | "durationMs">): boolean {
    if (this.exited) return false;
    this.exited = true;
    this.resolveCompletion({
      ...result,
      commandLine: this.commandLine,
      durationMs: Date.now() - this.startedAt,
    });
    return true;
  }
}

/**
 * In-memory process runner for tests. Nothing is spawned; it records every
 * launch and termination and tracks how many handles were alive at once.
 */
export class MemoryProcessRunner implements IProcessRunner {
  private readonly autoComplete: boolean;
  private readonly results: Record<string, ScriptedResult>;
  private readonly failingCommands: Set<string>;
  private readonly running = new Set<MemoryProcessHandle>();
  private nextPid = 1000;

  readonly launched: string[] = [];
  readonly terminated: string[] = [];
  maxConcurrent = 0;

  constructor(options: MemoryProcessRunnerOptions = {}) {
    this.autoComplete = options.autoComplete ?? true;
    this.results = options.results ?? {};
    this.failingCommands = new Set(options.failingCommands ?? []);
  }

  launch(commandLine: string): ProcessHandle {
    this.launched.push(commandLine);

    if (this.failingCommands.has(commandLine)) {
      const failed = new MemoryProcessHandle(commandLine, null);
      failed.finish({
        stdout: "",
        stderr: "",
        exitCode: null,
        signal: null,
        failed: true,
        error: `Failed to launch "${commandLine}": scripted failure`,
      });
      return failed;
    }

    const handle = new MemoryProcessHandle(commandLine, this.nextPid++);
    this.running.add(handle);
    this.maxConcurrent = Math.max(this.maxConcurrent, this.running.size);

    if (this.autoComplete) {
      setImmediate(() => this.complete(handle));
    }
    return handle;
  }

  async execute(commandLine: string): Promise<ExecutionResult> {
    return this.launch(commandLine).completion;
  }

  async terminate(handle: ProcessHandle): Promise<void> {
    if (!(handle instanceof MemoryProcessHandle) || handle.hasExited()) return;

    this.terminated.push(handle.commandLine);
    this.running.delete(handle);
    handle.finish({
      stdout: "",
      stderr: "",
      exitCode: null,
      signal: "SIGTERM",
      failed: false,
    });
  }

  /**
   * Finish a running handle with its scripted result.
   *
   * @returns false when the handle had already exited
   */
  complete(handle: ProcessHandle, override: ScriptedResult = {}): boolean {
    if (!(handle instanceof MemoryProcessHandle)) return false;

    const scripted = { ...this.results[handle.commandLine], ...override };
    const stderr = scripted.stderr ?? "";
    this.running.delete(handle);
    return handle.finish({
      stdout: scripted.stdout ?? "",
      stderr,
      exitCode: scripted.exitCode ?? 0,
      signal: null,
      failed: stderr.length > 0,
    });
  }

  /** Handles launched and not yet finished */
  getRunning(): ProcessHandle[] {
    return Array.from(this.running);
  }
}
