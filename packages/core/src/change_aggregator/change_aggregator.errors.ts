export class ChangeAggregatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChangeAggregatorError";
    Object.setPrototypeOf(this, ChangeAggregatorError.prototype);
  }
}

export class MonitoredRootNotFoundError extends ChangeAggregatorError {
  public readonly root: string;

  constructor(root: string) {
    super(`Monitored directory ${root} not found.`);
    this.name = "MonitoredRootNotFoundError";
    this.root = root;
    Object.setPrototypeOf(this, MonitoredRootNotFoundError.prototype);
  }
}

export class WatcherSetupError extends ChangeAggregatorError {
  constructor(root: string, cause: Error) {
    super(`Failed to create watcher for ${root}: ${cause.message}`);
    this.name = "WatcherSetupError";
    this.cause = cause;
    Object.setPrototypeOf(this, WatcherSetupError.prototype);
  }
}

// Type guards
export function isChangeAggregatorError(
  error: unknown
): error is ChangeAggregatorError {
  return error instanceof ChangeAggregatorError;
}

export function isMonitoredRootNotFoundError(
  error: unknown
): error is MonitoredRootNotFoundError {
  return error instanceof MonitoredRootNotFoundError;
}

export function isWatcherSetupError(
  error: unknown
): error is WatcherSetupError {
  return error instanceof WatcherSetupError;
}
