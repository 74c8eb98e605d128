import type { Logger } from '@logtape/logtape';
import type {
  BusEvent,
  EventHandler,
  EventMonitor,
  EventPublisher,
  EventSubscribeOptions,
  EventSubscriber,
  EventType,
  ThreadMarshaller,
  Unsubscribe
} from '../types';
import { getCellwireLogger } from '../utils/logger';

type SubscriberEntry = {
  readonly id: number;
  readonly handler: unknown;
  readonly priority: number;
  readonly target: object | undefined;
  readonly invoke: (event: BusEvent) => void;
};

export type EventBusOptions = {
  readonly marshaller?: ThreadMarshaller;
  /**
   * Dispatch handlers through the marshaller. Without a marshaller, or
   * with this set to `false`, handlers run inline in `publish`.
   */
  readonly dispatchOnMainThread?: boolean;
  readonly logger?: Logger;
};

/**
 * Typed publish/subscribe keyed by event class.
 *
 * Subscriber lists are copy-on-write: `subscribe` and the removal methods
 * replace the array for a type, while `publish` dispatches from the array it
 * read. A handler that unsubscribes during dispatch therefore does not
 * disturb the running publish, and removal never has to be retried.
 */
export class EventBus implements EventPublisher, EventSubscriber {
  static #nextId = 0;

  readonly #subscribers = new Map<object, readonly SubscriberEntry[]>();
  readonly #monitors = new Set<EventMonitor>();
  readonly #marshaller: ThreadMarshaller | undefined;
  readonly #dispatchOnMainThread: boolean;
  readonly #logger: Logger;
  #initialized = false;

  constructor(options: EventBusOptions = {}) {
    this.#marshaller = options.marshaller;
    this.#dispatchOnMainThread = options.dispatchOnMainThread ?? true;
    this.#logger = getCellwireLogger('event-bus', options.logger);
  }

  get isInitialized(): boolean {
    return this.#initialized;
  }

  initialize(): this {
    if (this.#initialized) {
      return this;
    }

    this.#initialized = true;
    this.#logger.debug('Event bus initialized');

    return this;
  }

  subscribe<T extends BusEvent>(
    type: EventType<T>,
    handler: EventHandler<T>,
    options: EventSubscribeOptions = {}
  ): Unsubscribe {
    const entry: SubscriberEntry = {
      id: EventBus.#nextId++,
      handler,
      priority: options.priority ?? 0,
      target: options.target,
      invoke: (event) => {
        if (event instanceof type) {
          handler(event);
        }
      }
    };

    this.#subscribers.set(type, [...(this.#subscribers.get(type) ?? []), entry]);

    let active = true;

    return () => {
      if (!active) {
        return;
      }

      active = false;
      this.#removeWhere(type, (candidate) => candidate.id === entry.id);
    };
  }

  /** Removes every registration of `handler` for `type`. */
  unsubscribe<T extends BusEvent>(type: EventType<T>, handler: EventHandler<T>): boolean {
    return this.#removeWhere(type, (entry) => entry.handler === handler) > 0;
  }

  /**
   * Removes every registration owned by `target`, across all event types.
   * Returns how many registrations were removed.
   */
  unsubscribeAll(target: object): number {
    let removed = 0;

    for (const type of Array.from(this.#subscribers.keys())) {
      removed += this.#removeWhere(type, (entry) => entry.target === target);
    }

    if (removed > 0) {
      this.#logger.debug('Removed {removed} subscriptions of {target}', {
        removed,
        target: String(target)
      });
    }

    return removed;
  }

  /**
   * Registers a monitor invoked with every published event before any
   * handler, regardless of event type.
   */
  onEventPublished(monitor: EventMonitor): Unsubscribe {
    this.#monitors.add(monitor);

    return () => {
      this.#monitors.delete(monitor);
    };
  }

  publish<T extends BusEvent>(event: T): void {
    for (const monitor of Array.from(this.#monitors)) {
      try {
        monitor(event);
      } catch (error) {
        this.#logger.error('Event monitor failed on {eventType}: {error}', {
          eventType: event.constructor.name,
          error
        });
      }
    }

    const snapshot = this.#subscribers.get(event.constructor);
    if (snapshot === undefined || snapshot.length === 0) {
      return;
    }

    // Array#sort is stable, so equal priorities keep subscription order.
    const ordered = [...snapshot].sort((left, right) => right.priority - left.priority);

    const dispatch = () => {
      for (const entry of ordered) {
        try {
          entry.invoke(event);
        } catch (error) {
          this.#logger.error('Event handler failed on {eventType}: {error}', {
            eventType: event.constructor.name,
            priority: entry.priority,
            error
          });
        }
      }
    };

    if (this.#dispatchOnMainThread && this.#marshaller !== undefined) {
      this.#marshaller.executeOnMainThread(dispatch);
    } else {
      dispatch();
    }
  }

  getSubscriberCount<T extends BusEvent>(type: EventType<T>): number {
    return this.#subscribers.get(type)?.length ?? 0;
  }

  getTotalSubscriberCount(): number {
    let total = 0;
    for (const entries of this.#subscribers.values()) {
      total += entries.length;
    }

    return total;
  }

  clear(): void {
    this.#subscribers.clear();
  }

  #removeWhere(type: object, predicate: (entry: SubscriberEntry) => boolean): number {
    const current = this.#subscribers.get(type);
    if (current === undefined) {
      return 0;
    }

    const next = current.filter((entry) => !predicate(entry));
    const removed = current.length - next.length;
    if (removed === 0) {
      return 0;
    }

    if (next.length === 0) {
      this.#subscribers.delete(type);
    } else {
      this.#subscribers.set(type, next);
    }

    return removed;
  }

  get [Symbol.toStringTag]() {
    return 'EventBus';
  }
}
