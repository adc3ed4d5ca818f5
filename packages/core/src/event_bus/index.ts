export { EventBus } from './event_bus';
export type { IEventStream } from './event_bus';
export type {
  BaseEvent,
  EventHandler,
  EventOfType,
  EventSubscription,
  WatchrunEvent,
  WatchrunEventType,
  ChangeDetectedEvent,
  ChangeNoticeEvent,
  ExecutionStartedEvent,
  ExecutionCompletedEvent,
  ProcessTerminatedEvent,
} from './types';
