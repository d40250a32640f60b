import { EventEmitter } from 'events';

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type {
  BaseEvent,
  EventHandler,
  EventSubscription,
  ReviewTaskEvent,
  ReviewTaskEventType,
  TaskEventOf,
  TaskEventPayloads,
} from './types';

let subscriptionCounter = 0;

function nextSubscriptionId(): string {
  subscriptionCounter += 1;
  return `subscription:${subscriptionCounter}`;
}

/**
 * Publish/subscribe contract the pipeline, dispatcher and CLI share.
 */
export interface IEventStream {
  publish(event: BaseEvent): void;

  subscribe<T extends BaseEvent = BaseEvent>(
    eventType: string,
    handler: EventHandler<T>
  ): EventSubscription;

  /**
   * @returns false when the id is unknown
   */
  unsubscribe(subscriptionId: string): boolean;

  /**
   * Resolves once every handler started so far has settled.
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

export type EventBusDependencies = {
  logger?: Logger;
};

/**
 * In-process EventBus on Node's EventEmitter.
 *
 * Delivery is synchronous from `publish`; async handlers run in the
 * background and are tracked so `waitForIdle()` can await them.
 * A throwing handler is logged and never reaches the publisher.
 * Every event is also emitted on the `*` channel.
 */
export class EventBus implements IEventStream {
  private readonly emitter = new EventEmitter();
  private readonly subscriptions = new Map<string, EventSubscription>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly logger: Logger;

  constructor(deps: EventBusDependencies = {}) {
    this.logger = deps.logger ?? createLogger('[EventBus] ');
    this.emitter.setMaxListeners(100);
  }

  publish(event: BaseEvent): void {
    if (typeof event.type !== 'string' || event.type === '') {
      throw new Error('Event must have a valid type string');
    }
    if (typeof event.timestamp !== 'number' || !event.timestamp) {
      throw new Error('Event must have a valid timestamp number');
    }
    if (typeof event.source !== 'string' || event.source === '') {
      throw new Error('Event must have a valid source string');
    }

    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }

  subscribe<T extends BaseEvent = BaseEvent>(
    eventType: string,
    handler: EventHandler<T>
  ): EventSubscription {
    const listener = (event: T): void => {
      const run = (async () => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(`Error in event handler for ${eventType}:`, error);
        }
      })();
      this.inFlight.add(run);
      void run.finally(() => this.inFlight.delete(run));
    };

    const subscription: EventSubscription = { id: nextSubscriptionId(), eventType, handler: listener };
    this.emitter.on(eventType, listener);
    this.subscriptions.set(subscription.id, subscription);
    return subscription;
  }

  unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }
    this.emitter.removeListener(subscription.eventType, subscription.handler);
    this.subscriptions.delete(subscriptionId);
    return true;
  }

  /**
   * Listeners currently attached to `eventType` (`*` for wildcard ones)
   */
  getSubscriptionCount(eventType: string): number {
    return this.emitter.listenerCount(eventType);
  }

  subscribeToAll(handler: EventHandler<BaseEvent>): EventSubscription {
    return this.subscribe('*', handler);
  }

  /**
   * Waits for background handlers, giving up after `timeout` ms (default 5000).
   *
   * @example
   * await dispatcher.submit(repoUrl, 42);
   * await eventBus.waitForIdle();
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const deadline = Date.now() + timeout;

    while (this.inFlight.size > 0) {
      if (Date.now() > deadline) {
        this.logger.warn(`waitForIdle() timeout after ${timeout}ms with ${this.inFlight.size} handlers still pending`);
        return;
      }
      await Promise.race([
        Promise.all([...this.inFlight]),
        new Promise((resolve) => setTimeout(resolve, 10)),
      ]);
    }
  }
}

/**
 * Builds a typed lifecycle event stamped with the current time.
 */
export function createTaskEvent<K extends ReviewTaskEventType>(
  type: K,
  payload: TaskEventPayloads[K],
  source: string,
): TaskEventOf<K> {
  return { type, payload, source, timestamp: Date.now() };
}

/**
 * Type-safe subscriber helper for lifecycle events.
 */
export function subscribeToTaskEvent<K extends ReviewTaskEventType>(
  bus: IEventStream,
  eventType: K,
  handler: EventHandler<Extract<ReviewTaskEvent, { type: K }>>
): EventSubscription {
  return bus.subscribe(eventType, handler);
}
