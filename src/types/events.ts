import type { Unsubscribe } from '.';

export interface BusEvent {
  readonly timestamp: Date;
  readonly eventId: string;
  readonly source: string | undefined;
}

export type EventType<T extends BusEvent> = abstract new (...args: never[]) => T;

export type EventHandler<T extends BusEvent> = (event: T) => void;

export type EventMonitor = (event: BusEvent) => void;

export type EventSubscribeOptions = {
  /** Higher runs first. */
  readonly priority?: number;
  /** Owner of the registration, used by `unsubscribeAll`. */
  readonly target?: object;
};

export interface EventPublisher {
  publish(event: BusEvent): void;
}

export interface EventSubscriber {
  subscribe<T extends BusEvent>(
    type: EventType<T>,
    handler: EventHandler<T>,
    options?: EventSubscribeOptions
  ): Unsubscribe;
}
