import type { Logger } from '@logtape/logtape';
import type {
  BoxedListener,
  Cell,
  CellContext,
  ChangeListener,
  EqualityFn,
  SubscribeOptions,
  Unsubscribe,
  ValueListener
} from '../types';
import { getCellwireLogger } from '../utils/logger';
import type { ValueType } from '../value-type';
import type { ListenerSet } from './listener-set';

export type BaseCellOptions<Value> = {
  readonly valueType?: ValueType<Value>;
  /** Defaults to `Object.is`. */
  readonly equals?: EqualityFn<Value>;
  readonly context?: CellContext;
  readonly name?: string;
};

type Notify<Value> = (oldValue: Value, newValue: Value) => void;

/**
 * Subscriber bookkeeping shared by reactive and computed cells.
 *
 * All three listener shapes are adapted into one `(oldValue, newValue)`
 * channel kept in an id-indexed table, so every subscription is released by
 * deleting a single entry.
 */
export abstract class BaseCell<Value> implements Cell<Value> {
  static #cellNr = 0;
  static #listenerNr = 0;

  readonly #listeners = new Map<number, Notify<Value>>();
  #dependents: Unsubscribe[] = [];
  #disposed = false;
  #context: CellContext;
  #logger: Logger;

  protected readonly equals: EqualityFn<Value>;

  readonly valueType: ValueType<Value>;
  name: string;

  protected constructor(valueType: ValueType<Value>, options: BaseCellOptions<Value>) {
    this.valueType = valueType;
    this.equals = options.equals ?? Object.is;
    this.#context = options.context ?? {};
    this.#logger = getCellwireLogger('cells', this.#context.logger);
    this.name = options.name ?? `Cell<${BaseCell.#cellNr++}>`;
  }

  abstract get(): Value;

  abstract setValue(value: unknown, forceNotify?: boolean): boolean;

  abstract isWritable(): boolean;

  protected get context(): CellContext {
    return this.#context;
  }

  protected get logger(): Logger {
    return this.#logger;
  }

  get value(): Value {
    return this.get();
  }

  get subscriberCount(): number {
    return this.#listeners.size;
  }

  get hasSubscribers(): boolean {
    return this.#listeners.size > 0;
  }

  get isDisposed(): boolean {
    return this.#disposed;
  }

  subscribe(listener: ValueListener<Value>, options: SubscribeOptions = {}): Unsubscribe {
    const unsubscribe = this.#addListener((_, newValue) => listener(newValue));
    if (options.fireOnSubscribe === true) {
      const current = this.get();
      this.runListener(() => listener(current));
    }

    return unsubscribe;
  }

  subscribeBoxed(listener: BoxedListener, options: SubscribeOptions = {}): Unsubscribe {
    const unsubscribe = this.#addListener((_, newValue) => listener(newValue));
    if (options.fireOnSubscribe === true) {
      const current = this.get();
      this.runListener(() => listener(current));
    }

    return unsubscribe;
  }

  subscribeWithOldValue(
    listener: ChangeListener<Value>,
    options: SubscribeOptions = {}
  ): Unsubscribe {
    const unsubscribe = this.#addListener(listener);
    if (options.fireOnSubscribe === true) {
      const current = this.get();
      this.runListener(() => listener(current, current));
    }

    return unsubscribe;
  }

  /**
   * Takes ownership of a subscription created on behalf of this cell, e.g.
   * by a combinator. It is released when this cell is disposed, or right
   * away when it already is.
   */
  addDependentSubscription(subscription: Unsubscribe): void {
    if (this.#disposed) {
      this.#release(subscription);

      return;
    }

    this.#dependents.push(subscription);
  }

  /**
   * Fills in the collaborators this cell was created without. Those it
   * already has are kept.
   */
  adoptContext(context: CellContext): void {
    const own = this.#context;
    this.#context = {
      marshaller: own.marshaller ?? context.marshaller,
      events: own.events ?? context.events,
      keys: own.keys ?? context.keys,
      logger: own.logger ?? context.logger
    };
    this.#logger = getCellwireLogger('cells', this.#context.logger);
  }

  /** Drops every listener and releases dependent subscriptions. Does not notify. */
  dispose(): void {
    this.#listeners.clear();

    const dependents = this.#dependents;
    this.#dependents = [];
    this.#disposed = true;
    for (const release of dependents) {
      this.#release(release);
    }
  }

  rename(name: string): this {
    this.name = name;

    return this;
  }

  /**
   * Delivers a change to the listeners registered right now. Delivery runs
   * inline on the main context and is marshalled there otherwise. A listener
   * removed before delivery is skipped; one added after it is not called.
   */
  protected notifyChanged(oldValue: Value, newValue: Value): void {
    const snapshot = Array.from(this.#listeners);
    if (snapshot.length === 0) {
      return;
    }

    this.#deliver(() => {
      for (const [id, notify] of snapshot) {
        if (this.#listeners.get(id) === notify) {
          this.runListener(() => notify(oldValue, newValue));
        }
      }
    });
  }

  /** Delivers to item-level hooks the way `notifyChanged` delivers changes. */
  protected emit<Args extends unknown[]>(listeners: ListenerSet<Args>, ...args: Args): void {
    const snapshot = listeners.snapshot();
    if (snapshot.length === 0) {
      return;
    }

    this.#deliver(() => {
      for (const listener of snapshot) {
        this.runListener(() => listener(...args));
      }
    });
  }

  /** Runs a listener callback, logging instead of propagating its failure. */
  protected runListener(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.error('Subscriber of {cell} failed: {error}', {
        cell: this.toString(),
        error
      });
    }
  }

  #deliver(action: () => void): void {
    const marshaller = this.#context.marshaller;
    if (marshaller !== undefined && !marshaller.isMainThread()) {
      marshaller.executeOnMainThread(action);
    } else {
      action();
    }
  }

  #release(subscription: Unsubscribe): void {
    try {
      subscription();
    } catch (error) {
      this.logger.error('Releasing a dependent subscription of {cell} failed: {error}', {
        cell: this.toString(),
        error
      });
    }
  }

  #addListener(notify: Notify<Value>): Unsubscribe {
    const id = BaseCell.#listenerNr++;
    this.#listeners.set(id, notify);

    return () => {
      this.#listeners.delete(id);
    };
  }

  get [Symbol.toStringTag]() {
    return `${this.constructor.name}:${this.name}`;
  }

  toString(): string {
    return this[Symbol.toStringTag];
  }
}
