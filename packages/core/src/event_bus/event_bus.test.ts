import { EventBus } from './event_bus';
import type { ChangeDetectedEvent, ChangeNoticeEvent } from './types';

function makeChange(path: string = '/project/a.ts'): ChangeDetectedEvent {
  return {
    type: 'watch.change.detected',
    timestamp: Date.now(),
    source: 'test',
    payload: { root: '/project', path, kind: 'modified' },
  };
}

function makeNotice(path: string | null = null): ChangeNoticeEvent {
  return { type: 'change.notice', timestamp: Date.now(), source: 'test', payload: { path } };
}

describe('EventBus', () => {
  let testEventBus: EventBus;

  beforeEach(() => {
    testEventBus = new EventBus();
  });

  afterEach(() => {
    testEventBus.clearSubscriptions();
  });

  describe('publish', () => {
    it('should deliver events to subscribers of the same type', () => {
      const handler = jest.fn();
      const event = makeChange();

      testEventBus.subscribe('watch.change.detected', handler);
      testEventBus.publish(event);

      expect(handler).toHaveBeenCalledWith(event);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should reject events without timestamp or source', () => {
      const invalidEvents: ChangeNoticeEvent[] = [
        { ...makeNotice(), timestamp: 0 },
        { ...makeNotice(), source: '' },
      ];

      for (const invalidEvent of invalidEvents) {
        expect(() => {
          testEventBus.publish(invalidEvent);
        }).toThrow();
      }
    });

    it('should not deliver events of other types', () => {
      const changeHandler = jest.fn();
      const noticeHandler = jest.fn();

      testEventBus.subscribe('watch.change.detected', changeHandler);
      testEventBus.subscribe('change.notice', noticeHandler);

      const change = makeChange();
      testEventBus.publish(change);

      expect(changeHandler).toHaveBeenCalledWith(change);
      expect(noticeHandler).not.toHaveBeenCalled();
    });
  });

  describe('subscriptions', () => {
    it('should create subscriptions with unique ids', () => {
      const first = testEventBus.subscribe('change.notice', jest.fn());
      const second = testEventBus.subscribe('change.notice', jest.fn());

      expect(first.id).toMatch(/^subscription:\d+$/);
      expect(first.id).not.toBe(second.id);
      expect(first.eventType).toBe('change.notice');
    });

    it('should stop delivering after unsubscribe', () => {
      const handler = jest.fn();
      const subscription = testEventBus.subscribe('change.notice', handler);

      expect(testEventBus.getSubscriptionCount('change.notice')).toBe(1);
      expect(testEventBus.unsubscribe(subscription.id)).toBe(true);
      expect(testEventBus.getSubscriptionCount('change.notice')).toBe(0);

      testEventBus.publish(makeNotice());
      expect(handler).not.toHaveBeenCalled();
    });

    it('should return false when unsubscribing an unknown id', () => {
      expect(testEventBus.unsubscribe('non-existent-id')).toBe(false);
    });

    it('should clear all subscriptions', () => {
      testEventBus.subscribe('change.notice', jest.fn());
      testEventBus.subscribe('watch.change.detected', jest.fn());

      testEventBus.clearSubscriptions();

      expect(testEventBus.getSubscriptionCount('change.notice')).toBe(0);
      expect(testEventBus.getSubscriptionCount('watch.change.detected')).toBe(0);
    });
  });

  describe('handler isolation', () => {
    it('should keep delivering when a handler throws', () => {
      const failing = jest.fn(() => {
        throw new Error('handler failed');
      });
      const healthy = jest.fn();

      testEventBus.subscribe('change.notice', failing);
      testEventBus.subscribe('change.notice', healthy);

      expect(() => testEventBus.publish(makeNotice())).not.toThrow();
      expect(failing).toHaveBeenCalledTimes(1);
      expect(healthy).toHaveBeenCalledTimes(1);
    });

    it('should contain a rejected async handler', async () => {
      const healthy = jest.fn();
      testEventBus.subscribe('change.notice', async () => {
        throw new Error('async handler failed');
      });
      testEventBus.subscribe('change.notice', healthy);

      testEventBus.publish(makeNotice('/project/a.ts'));
      await new Promise((resolve) => setImmediate(resolve));

      expect(healthy).toHaveBeenCalledWith(makeNoticeMatcher('/project/a.ts'));
    });
  });
});

function makeNoticeMatcher(path: string) {
  return expect.objectContaining({ type: 'change.notice', payload: { path } });
}
