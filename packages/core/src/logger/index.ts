export { createLogger, logger, isLogLevel, setDefaultLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
