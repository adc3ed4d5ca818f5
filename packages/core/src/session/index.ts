export { Session, parseCommandText } from './session';
export { DEFAULT_LATENCY_MS } from './session.types';
export type { Phase, SessionOptions } from './session.types';
