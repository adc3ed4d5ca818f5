export { ExecutionCoordinator } from './execution_coordinator';

export type {
  CoordinatorStatus,
  ExecutionCoordinatorDependencies,
  ExecutionCoordinatorOptions,
  ExecutionReport,
  ExecutionReporter,
} from './execution_coordinator.types';

export {
  CoordinatorError,
  NoArgumentsError,
  NoCommandError,
  isCoordinatorError,
  isNoArgumentsError,
  isNoCommandError,
} from './execution_coordinator.errors';
