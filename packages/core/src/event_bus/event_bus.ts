import { EventEmitter } from 'events';

import { createLogger } from '../logger/logger';
import type {
  EventHandler,
  EventOfType,
  EventSubscription,
  WatchrunEvent,
  WatchrunEventType
} from './types';

const logger = createLogger('[EventBus] ');

let subscriptionCounter = 0;

function isEventOfType<K extends WatchrunEventType>(
  event: WatchrunEvent,
  eventType: K
): event is EventOfType<K> {
  return event.type === eventType;
}

/**
 * Contract shared by producers (change aggregators, coordinator) and
 * consumers (coordinator, tests)
 */
export interface IEventStream {
  publish(event: WatchrunEvent): void;

  subscribe<K extends WatchrunEventType>(
    eventType: K,
    handler: EventHandler<EventOfType<K>>
  ): EventSubscription;

  /**
   * @returns false when the id is unknown
   */
  unsubscribe(subscriptionId: string): boolean;
}

/**
 * In-process event bus on a Node.js EventEmitter.
 *
 * Change aggregators publish `watch.change.detected` here and the execution
 * coordinator is its single consumer, so watcher callbacks never touch timer
 * or process state directly. Delivery is synchronous. A handler that throws
 * or rejects is logged and does not stop delivery to the others.
 */
export class EventBus implements IEventStream {
  private readonly emitter = new EventEmitter();
  private readonly subscriptions = new Map<string, EventSubscription>();

  /**
   * @throws Error when timestamp or source are missing
   */
  publish(event: WatchrunEvent): void {
    if (!event.timestamp) {
      throw new Error('Event must have a valid timestamp number');
    }
    if (!event.source) {
      throw new Error('Event must have a valid source string');
    }

    this.emitter.emit(event.type, event);
  }

  subscribe<K extends WatchrunEventType>(
    eventType: K,
    handler: EventHandler<EventOfType<K>>
  ): EventSubscription {
    const subscription: EventSubscription = {
      id: `subscription:${++subscriptionCounter}`,
      eventType,
      listener: (event) => {
        if (!isEventOfType(event, eventType)) return;
        try {
          const pending = handler(event);
          if (pending) {
            pending.catch((error: unknown) => this.reportHandlerError(eventType, error));
          }
        } catch (error) {
          this.reportHandlerError(eventType, error);
        }
      }
    };

    this.emitter.on(eventType, subscription.listener);
    this.subscriptions.set(subscription.id, subscription);
    return subscription;
  }

  unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }

    this.emitter.removeListener(subscription.eventType, subscription.listener);
    this.subscriptions.delete(subscriptionId);
    return true;
  }

  getSubscriptionCount(eventType: WatchrunEventType): number {
    return this.emitter.listenerCount(eventType);
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
  }

  private reportHandlerError(eventType: WatchrunEventType, error: unknown): void {
    logger.error(`Error in event handler for ${eventType}:`, error);
  }
}
