export class CoordinatorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CoordinatorError";
    Object.setPrototypeOf(this, CoordinatorError.prototype);
  }
}

/**
 * `apply` without arguments. Nothing changes and nothing runs.
 */
export class NoArgumentsError extends CoordinatorError {
  constructor() {
    super("no new arguments");
    this.name = "NoArgumentsError";
    Object.setPrototypeOf(this, NoArgumentsError.prototype);
  }
}

/**
 * `start` without a command. Nothing changes and nothing runs.
 */
export class NoCommandError extends CoordinatorError {
  constructor() {
    super("no command given");
    this.name = "NoCommandError";
    Object.setPrototypeOf(this, NoCommandError.prototype);
  }
}

// Type guards
export function isCoordinatorError(error: unknown): error is CoordinatorError {
  return error instanceof CoordinatorError;
}

export function isNoArgumentsError(error: unknown): error is NoArgumentsError {
  return error instanceof NoArgumentsError;
}

export function isNoCommandError(error: unknown): error is NoCommandError {
  return error instanceof NoCommandError;
}
