export * as Config from "./config_manager";
export * as ConfigStore from "./config_store";
export * as Logger from "./logger";
export * as EventBus from "./event_bus";

// Trigger/execution core
export * as Session from "./session";
export * as DebounceTimer from "./debounce_timer";
export * as ChangeAggregator from "./change_aggregator";
export * as ProcessRunner from "./process_runner";
export * as ExecutionCoordinator from "./execution_coordinator";
