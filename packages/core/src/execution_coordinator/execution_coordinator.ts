/**
 * ExecutionCoordinator - debounced trigger and execution core
 *
 * Single consumer of `watch.change.detected` events. It owns the session's
 * debounce timer and child process handle and serializes every
 * read-modify-write of them through one promise-chain mutex, so watcher
 * callbacks, debounce callbacks and REPL commands never interleave:
 *
 *   change events → onChangeEvent → timer (re-armed per event)
 *                 → onAutomaticTrigger → run('automatic')
 *   REPL          → startCommand / applyArguments / restart → run('manual')
 *
 * run() terminates and reaps any previous child before launching, so at most
 * one child exists. Completion is awaited outside the mutex: kill/restart/quit
 * stay available while a child hangs.
 */

import { createLogger } from "../logger/logger";
import type { IChangeAggregator } from "../change_aggregator/change_aggregator";
import type {
  ChangeDetectedEvent,
  EventSubscription,
  IEventStream,
} from "../event_bus";
import type { IProcessRunner } from "../process_runner/process_runner";
import type {
  ExecutionTrigger,
  ProcessHandle,
} from "../process_runner/process_runner.types";
import { parseCommandText } from "../session/session";
import type { Session } from "../session/session";
import type {
  CoordinatorStatus,
  ExecutionCoordinatorDependencies,
  ExecutionCoordinatorOptions,
  ExecutionReporter,
} from "./execution_coordinator.types";
import { NoArgumentsError, NoCommandError } from "./execution_coordinator.errors";

const NO_COMMAND_NOTICE = "no command configured, use 'start <command>'";

export class ExecutionCoordinator {
  private readonly session: Session;
  private readonly processRunner: IProcessRunner;
  private readonly changeAggregator: IChangeAggregator;
  private readonly eventBus: IEventStream;
  private readonly reporter: ExecutionReporter;
  private readonly resolveTargetOnFire: boolean;
  private readonly logger = createLogger("[ExecutionCoordinator] ");

  private lock: Promise<void> = Promise.resolve();
  private changeSubscription: EventSubscription | null;
  private pendingCompletions = new Set<Promise<void>>();
  private lastChangePath: string | null = null;
  private launchCount = 0;

  constructor(
    deps: ExecutionCoordinatorDependencies,
    options: ExecutionCoordinatorOptions = {}
  ) {
    this.session = deps.session;
    this.processRunner = deps.processRunner;
    this.changeAggregator = deps.changeAggregator;
    this.eventBus = deps.eventBus;
    this.reporter = deps.reporter;
    this.resolveTargetOnFire = options.resolveTargetOnFire ?? false;

    this.changeSubscription = this.eventBus.subscribe(
      "watch.change.detected",
      (event) => this.onChangeEvent(event)
    );
  }

  // ===== Operator operations =====

  /**
   * Replaces the command line. Does not execute and does not touch monitoring.
   */
  setCommand(program: string, args?: string): void {
    this.session.setCommand(program, args);
  }

  /**
   * `start <command...>`: set the command, (re)start monitoring and execute.
   *
   * @throws NoCommandError for blank input, leaving the session untouched
   */
  async startCommand(commandText: string): Promise<ProcessHandle | null> {
    const parsed = parseCommandText(commandText);
    if (!parsed) {
      throw new NoCommandError();
    }

    this.setCommand(parsed.program, parsed.args);
    await this.startMonitoring();
    return this.execute();
  }

  /**
   * `apply <args...>`: replace the arguments and execute immediately.
   *
   * @throws NoArgumentsError for blank input, leaving command and process unchanged
   */
  async applyArguments(newArgs: string): Promise<ProcessHandle | null> {
    if (newArgs.trim().length === 0) {
      throw new NoArgumentsError();
    }

    this.session.setArgs(newArgs);
    return this.execute();
  }

  /**
   * `restart`: stop everything, watch again and execute the current command.
   */
  async restart(): Promise<ProcessHandle | null> {
    await this.terminateProcess();
    await this.startMonitoring();
    return this.execute();
  }

  /**
   * Stops any previous watch session (and the process it tracked), then
   * watches every monitored root with a fresh stop signal.
   */
  async startMonitoring(): Promise<void> {
    this.halt();
    await this.exclusive(async () => {
      await this.haltLocked();
      this.session.renewStopSignal();
      await this.changeAggregator.start([...this.session.monitoredDirs]);
      this.logger.debug(`Monitoring ${this.session.monitoredDirs.join(", ")}`);
    });
  }

  /**
   * `kill`: stop automatic triggers and monitoring, then terminate and reap
   * the running child if there is one. Idempotent.
   */
  async terminateProcess(): Promise<void> {
    this.halt();
    await this.exclusive(() => this.haltLocked());
  }

  /**
   * Manual execution of the current command line.
   *
   * @returns the launched handle, or null when no command is configured
   */
  async execute(): Promise<ProcessHandle | null> {
    return this.run("manual");
  }

  /**
   * `quit`: terminate everything and stop consuming change events.
   */
  async shutdown(): Promise<void> {
    await this.terminateProcess();
    if (this.changeSubscription) {
      this.eventBus.unsubscribe(this.changeSubscription.id);
      this.changeSubscription = null;
    }
  }

  /** Called by the REPL each time it shows the prompt */
  enterPrompt(): void {
    this.session.phase = "prompting";
  }

  getStatus(): CoordinatorStatus {
    const child = this.session.child;
    return {
      phase: this.session.phase,
      commandLine: this.session.getCommandLine(),
      monitoredDirs: [...this.session.monitoredDirs],
      latencyMs: this.session.latencyMs,
      watching: this.changeAggregator.isRunning(),
      running: child !== null && !child.hasExited(),
      pid: child?.pid ?? null,
      debouncePending: this.session.timer.isPending(),
      lastChangeAt: this.session.lastChangeAt,
      executionCount: this.session.executionCount,
    };
  }

  /**
   * Resolves once every launched execution has completed and been reported.
   */
  async waitForIdle(): Promise<void> {
    while (this.pendingCompletions.size > 0) {
      await Promise.all(Array.from(this.pendingCompletions));
    }
  }

  // ===== Automatic trigger path =====

  /**
   * One normalized filesystem change. Re-arms the debounce timer; the target
   * (execute or notify) is chosen now unless resolveTargetOnFire is set.
   */
  onChangeEvent(event: ChangeDetectedEvent): void {
    if (this.session.isStopRequested()) return;

    this.session.lastChangeAt = event.timestamp;
    this.lastChangePath = event.payload.path;

    // onAutomaticTrigger re-checks the command itself when it fires
    const target =
      this.resolveTargetOnFire || this.session.hasCommand()
        ? () => this.onAutomaticTrigger()
        : () => this.notifyChange();

    this.session.timer.arm(this.session.latencyMs, target);
  }

  /**
   * Debounce fired. Executes the current command, or posts a change notice
   * when none is configured.
   */
  async onAutomaticTrigger(): Promise<void> {
    const signal = this.session.stopSignal;
    if (signal.aborted) return;

    if (!this.session.hasCommand()) {
      this.notifyChange();
      return;
    }

    await this.run("automatic", signal);
  }

  // ===== Internals =====

  private async run(
    trigger: ExecutionTrigger,
    signal?: AbortSignal
  ): Promise<ProcessHandle | null> {
    const launch = await this.exclusive(async () => {
      // A trigger queued behind kill/restart belongs to the stopped session
      if (signal?.aborted) return null;

      const commandLine = this.session.getCommandLine();
      if (!commandLine) return null;

      await this.killChild();

      if (trigger === "manual") {
        this.session.phase = "starting";
      }
      const launched = this.processRunner.launch(commandLine);
      this.session.child = launched;
      const firstRun = this.launchCount === 0;
      this.launchCount++;

      this.eventBus.publish({
        type: "execution.started",
        timestamp: Date.now(),
        source: "execution_coordinator",
        payload: { commandLine, pid: launched.pid, trigger },
      });
      return { handle: launched, firstRun };
    });

    if (!launch) {
      if (!signal?.aborted && !this.session.hasCommand()) {
        this.reporter.onNotice(NO_COMMAND_NOTICE);
      }
      return null;
    }

    const completion = this.awaitCompletion(launch.handle, trigger, launch.firstRun);
    this.pendingCompletions.add(completion);
    void completion.finally(() => this.pendingCompletions.delete(completion));

    return launch.handle;
  }

  private async awaitCompletion(
    handle: ProcessHandle,
    trigger: ExecutionTrigger,
    firstRun: boolean
  ): Promise<void> {
    const result = await handle.completion;

    await this.exclusive(async () => {
      if (this.session.child === handle) {
        this.session.child = null;
      }
    });

    this.session.executionCount++;
    if (trigger === "manual") {
      this.session.phase = "executed";
    }

    try {
      this.reporter.onResult({ result, trigger, firstRun });
    } catch (error) {
      this.logger.error(`Reporter failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    this.eventBus.publish({
      type: "execution.completed",
      timestamp: Date.now(),
      source: "execution_coordinator",
      payload: { result, trigger },
    });
  }

  private notifyChange(): void {
    this.reporter.onChangeNotice(this.lastChangePath);
    this.eventBus.publish({
      type: "change.notice",
      timestamp: Date.now(),
      source: "execution_coordinator",
      payload: { path: this.lastChangePath },
    });
  }

  /** Takes effect immediately, before waiting for the mutex */
  private halt(): void {
    this.session.requestStop();
    this.session.timer.cancel();
  }

  /** Must run inside exclusive() */
  private async haltLocked(): Promise<void> {
    this.halt();
    if (this.changeAggregator.isRunning()) {
      try {
        await this.changeAggregator.stop();
      } catch (error) {
        this.logger.warn(`Failed to stop watchers: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    await this.killChild();
  }

  /** Must run inside exclusive(). Clears the handle even when termination fails. */
  private async killChild(): Promise<void> {
    const child = this.session.child;
    if (!child) return;

    const wasRunning = !child.hasExited();
    try {
      await this.processRunner.terminate(child);
    } catch (error) {
      this.logger.warn(
        `Failed to terminate "${child.commandLine}": ${error instanceof Error ? error.message : String(error)}`
      );
    } finally {
      this.session.child = null;
    }

    if (wasRunning) {
      this.eventBus.publish({
        type: "process.terminated",
        timestamp: Date.now(),
        source: "execution_coordinator",
        payload: { commandLine: child.commandLine, pid: child.pid },
      });
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const result = this.lock.then(task);
    this.lock = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
