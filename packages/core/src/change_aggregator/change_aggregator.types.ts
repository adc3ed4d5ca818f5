import type { IEventStream } from "../event_bus";

/**
 * Kinds of filesystem change a watch feed can report. All of them collapse
 * into the same stimulus for the coordinator; the kind is kept for notices and logs.
 */
export type ChangeKind = "modified" | "created" | "moved" | "deleted";

export interface ChangeAggregatorDependencies {
  eventBus: IEventStream;
}

export interface ChangeAggregatorStatus {
  isRunning: boolean;
  monitoredRoots: string[];
  eventsPublished: number;
  lastError: Error | undefined;
}
