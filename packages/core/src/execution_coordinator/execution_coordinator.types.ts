import type { IChangeAggregator } from "../change_aggregator/change_aggregator";
import type { IEventStream } from "../event_bus";
import type { IProcessRunner } from "../process_runner/process_runner";
import type { ExecutionResult, ExecutionTrigger } from "../process_runner/process_runner.types";
import type { Session } from "../session/session";
import type { Phase } from "../session/session.types";

export interface ExecutionReport {
  result: ExecutionResult;
  trigger: ExecutionTrigger;
  /** No execution was launched before this one; drives output framing */
  firstRun: boolean;
}

/**
 * Receives everything the coordinator wants the operator to see.
 */
export interface ExecutionReporter {
  onResult(report: ExecutionReport): void;
  /** Debounce fired while no command was configured */
  onChangeNotice(path: string | null): void;
  onNotice(message: string): void;
}

export interface ExecutionCoordinatorDependencies {
  session: Session;
  processRunner: IProcessRunner;
  changeAggregator: IChangeAggregator;
  eventBus: IEventStream;
  reporter: ExecutionReporter;
}

export interface ExecutionCoordinatorOptions {
  /**
   * Decide between executing and notifying when the debounce fires instead of
   * when it is armed (default: false, the choice is frozen at arm time).
   */
  resolveTargetOnFire?: boolean;
}

export interface CoordinatorStatus {
  phase: Phase;
  commandLine: string | null;
  monitoredDirs: string[];
  latencyMs: number;
  watching: boolean;
  running: boolean;
  pid: number | null;
  debouncePending: boolean;
  lastChangeAt: number | null;
  executionCount: number;
}
