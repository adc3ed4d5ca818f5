/**
 * Event Bus types for the watchrun event-driven core
 */

import type { ChangeKind } from '../change_aggregator/change_aggregator.types';
import type { ExecutionResult, ExecutionTrigger } from '../process_runner/process_runner.types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Source that emitted the event */
  source: string;
};

/**
 * A filesystem change under one of the monitored roots, normalized by the change aggregator.
 */
export type ChangeDetectedEvent = BaseEvent & {
  type: 'watch.change.detected';
  payload: {
    root: string;
    path: string;
    kind: ChangeKind;
  };
};

/**
 * Debounce fired while no command was configured.
 */
export type ChangeNoticeEvent = BaseEvent & {
  type: 'change.notice';
  payload: {
    path: string | null;
  };
};

export type ExecutionStartedEvent = BaseEvent & {
  type: 'execution.started';
  payload: {
    commandLine: string;
    pid: number | null;
    trigger: ExecutionTrigger;
  };
};

export type ExecutionCompletedEvent = BaseEvent & {
  type: 'execution.completed';
  payload: {
    result: ExecutionResult;
    trigger: ExecutionTrigger;
  };
};

export type ProcessTerminatedEvent = BaseEvent & {
  type: 'process.terminated';
  payload: {
    commandLine: string;
    pid: number | null;
  };
};

/**
 * Union type of all watchrun events
 */
export type WatchrunEvent =
  | ChangeDetectedEvent
  | ChangeNoticeEvent
  | ExecutionStartedEvent
  | ExecutionCompletedEvent
  | ProcessTerminatedEvent;

export type WatchrunEventType = WatchrunEvent['type'];

/** The event variant carried by a given type string */
export type EventOfType<K extends WatchrunEventType> = Extract<WatchrunEvent, { type: K }>;

export type EventHandler<T extends WatchrunEvent = WatchrunEvent> = (event: T) => void | Promise<void>;

export type EventSubscription = {
  id: string;
  eventType: WatchrunEventType;
  /** Listener registered on the emitter */
  listener(event: WatchrunEvent): void;
};
