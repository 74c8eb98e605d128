import type { Logger } from '@logtape/logtape';
import type { ValueType } from '../value-type';
import type {
  AnyCell,
  BoxedListener,
  ChangeListener,
  EventPublisher,
  SubscribeOptions,
  ThreadMarshaller,
  Unsubscribe,
  ValueListener
} from '.';

export interface Cell<Value> {
  [Symbol.toStringTag]: string;

  name: string;

  readonly valueType: ValueType<Value>;

  readonly value: Value;

  readonly subscriberCount: number;

  readonly hasSubscribers: boolean;

  readonly isDisposed: boolean;

  get(): Value;

  /**
   * Untyped write used by bindings. Returns `false` when the value was
   * rejected.
   */
  setValue(value: unknown, forceNotify?: boolean): boolean;

  isWritable(): boolean;

  subscribe(listener: ValueListener<Value>, options?: SubscribeOptions): Unsubscribe;

  subscribeBoxed(listener: BoxedListener, options?: SubscribeOptions): Unsubscribe;

  subscribeWithOldValue(
    listener: ChangeListener<Value>,
    options?: SubscribeOptions
  ): Unsubscribe;

  addDependentSubscription(subscription: Unsubscribe): void;

  /** Fills in collaborators the cell was created without; keeps the rest. */
  adoptContext(context: CellContext): void;

  dispose(): void;
}

export interface WritableCell<Value> extends Cell<Value> {
  set(value: Value, forceNotify?: boolean): void;
}

export interface CellKeyResolver {
  getKey(cell: AnyCell): string | undefined;
}

/**
 * Collaborators a cell reports to. Every member is optional so cells can
 * live outside a runtime, e.g. in tests.
 */
export interface CellContext {
  readonly marshaller?: ThreadMarshaller;
  readonly events?: EventPublisher;
  readonly keys?: CellKeyResolver;
  readonly logger?: Logger;
}
