/**
 * LocalProcessRunner - runs command lines through the system shell
 *
 * Each command gets its own process group (POSIX `detached`), so terminate()
 * can signal the shell and everything it spawned, including background jobs
 * that outlive the shell. Output is buffered in full; there is no execution
 * timeout and no output cap.
 */

import { spawn } from "child_process";
import type { ChildProcess } from "child_process";
import { createLogger } from "../../logger/logger";
import type { IProcessRunner } from "../process_runner";
import type {
  ExecutionResult,
  LocalProcessRunnerOptions,
  ProcessHandle,
} from "../process_runner.types";

// --- Constants ---

const DEFAULT_KILL_GRACE_MS = 2000;
const GROUP_POLL_MS = 25;
const USE_PROCESS_GROUPS = process.platform !== "win32";

const logger = createLogger("[LocalProcessRunner] ");

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// --- Handle ---

class LocalProcessHandle implements ProcessHandle {
  readonly pid: number | null;
  readonly commandLine: string;
  readonly startedAt: number;
  readonly completion: Promise<ExecutionResult>;
  readonly child: ChildProcess | null;

  /** The shell itself was reaped; background jobs may still hold its output */
  private shellExited = false;
  private settled = false;

  constructor(commandLine: string, child: ChildProcess | null, launchError?: unknown) {
    this.commandLine = commandLine;
    this.child = child;
    this.pid = child?.pid ?? null;
    this.startedAt = Date.now();

    if (!child) {
      this.shellExited = true;
      this.settled = true;
      this.completion = Promise.resolve(this.buildLaunchFailure(describeError(launchError)));
      return;
    }

    child.once("exit", () => {
      this.shellExited = true;
    });
    this.completion = this.collect(child);
  }

  hasExited(): boolean {
    return this.settled;
  }

  hasShellExited(): boolean {
    return this.shellExited;
  }

  private collect(child: ChildProcess): Promise<ExecutionResult> {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    return new Promise<ExecutionResult>((resolve) => {
      child.on("error", (error) => {
        if (this.settled) return;
        if (child.pid === undefined) {
          this.shellExited = true;
          this.settled = true;
          resolve(this.buildLaunchFailure(error.message));
          return;
        }
        logger.warn(`Process ${child.pid} reported: ${error.message}`);
      });

      // close fires once the shell exited and every holder of its pipes is gone
      child.once("close", (code, signal) => {
        if (this.settled) return;
        this.shellExited = true;
        this.settled = true;

        const stdout = Buffer.concat(stdoutChunks).toString("utf-8").trimEnd();
        const stderr = Buffer.concat(stderrChunks).toString("utf-8").trimEnd();

        resolve({
          commandLine: this.commandLine,
          stdout,
          stderr,
          exitCode: code,
          signal,
          durationMs: Date.now() - this.startedAt,
          failed: stderr.length > 0,
        });
      });
    });
  }

  private buildLaunchFailure(message: string): ExecutionResult {
    return {
      commandLine: this.commandLine,
      stdout: "",
      stderr: "",
      exitCode: null,
      signal: null,
      durationMs: Date.now() - this.startedAt,
      failed: true,
      error: `Failed to launch "${this.commandLine}": ${message}`,
    };
  }
}

// --- Implementation ---

export class LocalProcessRunner implements IProcessRunner {
  private readonly cwd: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private readonly killGraceMs: number;
  private readonly shell: string | boolean;

  constructor(options: LocalProcessRunnerOptions = {}) {
    this.cwd = options.cwd;
    this.env = { ...process.env, ...options.env };
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.shell = options.shell ?? true;
  }

  launch(commandLine: string): ProcessHandle {
    let child: ChildProcess;
    try {
      child = spawn(commandLine, {
        cwd: this.cwd,
        env: this.env,
        shell: this.shell,
        detached: USE_PROCESS_GROUPS,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });
    } catch (error) {
      return new LocalProcessHandle(commandLine, null, error);
    }

    logger.debug(`Launched "${commandLine}" as pid ${child.pid ?? "?"}`);
    return new LocalProcessHandle(commandLine, child);
  }

  async execute(commandLine: string): Promise<ExecutionResult> {
    return this.launch(commandLine).completion;
  }

  /**
   * SIGTERM to the process group, SIGKILL after killGraceMs, then wait for
   * completion. The group is signalled even when the shell already exited,
   * as long as a member survives or the output is still open.
   */
  async terminate(handle: ProcessHandle): Promise<void> {
    if (!(handle instanceof LocalProcessHandle)) {
      logger.warn(`Cannot terminate a handle this runner did not launch: "${handle.commandLine}"`);
      return;
    }
    if (handle.pid === null || this.isReleased(handle)) return;

    this.signal(handle, "SIGTERM");
    if (await this.waitForRelease(handle, this.killGraceMs)) return;

    logger.warn(`Process group ${handle.pid} survived SIGTERM for ${this.killGraceMs}ms, sending SIGKILL`);
    this.signal(handle, "SIGKILL");
    await handle.completion;
  }

  /** Output closed and no member of the process group left */
  private isReleased(handle: LocalProcessHandle): boolean {
    return handle.hasExited() && !this.isGroupAlive(handle);
  }

  private isGroupAlive(handle: LocalProcessHandle): boolean {
    const pid = handle.pid;
    if (pid === null) return false;
    if (!USE_PROCESS_GROUPS) return !handle.hasShellExited();

    try {
      process.kill(-pid, 0);
      return true;
    } catch (error) {
      // EPERM: the group exists but belongs to someone else
      return errorCode(error) === "EPERM";
    }
  }

  private signal(handle: LocalProcessHandle, signal: NodeJS.Signals): void {
    const pid = handle.pid;
    if (pid === null) return;

    if (USE_PROCESS_GROUPS) {
      try {
        // Negative pid targets the whole process group
        process.kill(-pid, signal);
        return;
      } catch (error) {
        logger.debug(`Group signal ${signal} to ${pid} failed: ${describeError(error)}`);
      }
    }

    if (handle.hasShellExited()) return;
    if (!handle.child?.kill(signal)) {
      logger.warn(`Failed to send ${signal} to process ${pid}`);
    }
  }

  private async waitForRelease(handle: LocalProcessHandle, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (!this.isReleased(handle)) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) return false;
      await delay(Math.min(GROUP_POLL_MS, remaining));
    }
    return true;
  }
}
