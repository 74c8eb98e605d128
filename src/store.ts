import type { Logger } from '@logtape/logtape';
import { ReactiveCell } from './cells/reactive-cell';
import { PropertyNotFoundError, PropertyTypeMismatchError } from './errors';
import { PropertyRegisteredEvent } from './events/property-events';
import type {
  AnyCell,
  Cell,
  CellContext,
  CellKeyResolver,
  DeferredCallback,
  PropertyRecord,
  PropertyRegisteredListener,
  Unsubscribe
} from './types';
import { isDevOrTest } from './utils/is-debug';
import { getCellwireLogger } from './utils/logger';
import {
  inferValueType,
  isAssignableValueType,
  isSameValueType,
  type ValueType
} from './value-type';

export type PropertyStoreOptions = {
  readonly name?: string;
  /**
   * Collaborators handed to cells created by `getOrCreateProperty`. The
   * store always installs itself as their key resolver.
   */
  readonly context?: CellContext;
  readonly logger?: Logger;
};

export type GetOrCreatePropertyOptions<V> = {
  readonly valueType?: ValueType<V>;
  readonly persistent?: boolean;
};

const noop: Unsubscribe = () => undefined;

function isReadableAs<V>(cell: AnyCell, valueType: ValueType<V>): cell is Cell<V> {
  return isAssignableValueType(cell.valueType, valueType);
}

function isReactiveCellOf<V>(
  cell: AnyCell,
  valueType: ValueType<V>
): cell is ReactiveCell<V> {
  return cell instanceof ReactiveCell && isSameValueType(cell.valueType, valueType);
}

/**
 * Keyed registry of cells. Keeps a reverse index so a cell can find the key
 * it is published under without knowing it itself.
 */
export class PropertyStore implements CellKeyResolver {
  static #deferredNr = 0;

  readonly #name: string | undefined;
  readonly #records = new Map<string, PropertyRecord>();
  readonly #keysByCell = new Map<AnyCell, string>();
  readonly #deferred = new Map<string, Map<number, DeferredCallback>>();
  readonly #registeredListeners = new Set<PropertyRegisteredListener>();
  readonly #cellContext: CellContext;
  readonly #logger: Logger;

  constructor(options: PropertyStoreOptions = {}) {
    this.#name = options.name;
    this.#cellContext = { ...options.context, keys: this };
    this.#logger = getCellwireLogger('properties', options.logger);
  }

  get name(): string | undefined {
    return this.#name;
  }

  get propertyCount(): number {
    return this.#records.size;
  }

  /**
   * Registers `cell` under `key`, replacing any previous record, then
   * resolves every deferred subscription waiting for `key`. A cell created
   * without a bus or key resolver takes the store's, so its changes are
   * published under `key`. A cell registered under several keys reports the
   * most recent one.
   */
  registerProperty(key: string, cell: AnyCell, persistent = false): void {
    const previous = this.#records.get(key);
    this.#records.set(key, { key, cell, persistent });
    if (previous !== undefined && previous.cell !== cell) {
      this.#releaseKey(previous.cell, key);
    }

    this.#keysByCell.set(cell, key);
    cell.adoptContext(this.#cellContext);
    this.#logger.debug('Registered {key} ({valueType}, persistent: {persistent})', {
      key,
      valueType: cell.valueType.name,
      persistent
    });

    for (const listener of Array.from(this.#registeredListeners)) {
      try {
        listener(key, cell);
      } catch (error) {
        this.#logger.error('Registration observer failed for {key}: {error}', {
          key,
          error
        });
      }
    }

    this.#cellContext.events?.publish(new PropertyRegisteredEvent(key, cell, persistent));

    // Detach the pending callbacks before running them: a callback that
    // subscribes to the same key again is served synchronously instead.
    const pending = this.#deferred.get(key);
    if (pending === undefined) {
      return;
    }

    this.#deferred.delete(key);
    for (const callback of pending.values()) {
      try {
        callback(cell);
      } catch (error) {
        this.#logger.error('Deferred subscription failed for {key}: {error}', {
          key,
          error
        });
      }
    }
  }

  /**
   * Returns the reactive cell under `key`, creating and registering one
   * holding `defaultValue` when the key is free.
   *
   * @throws PropertyTypeMismatchError when the key holds a cell of another
   * value type, or a cell that is not a reactive cell.
   */
  getOrCreateProperty<V>(
    key: string,
    defaultValue: V,
    options: GetOrCreatePropertyOptions<V> = {}
  ): ReactiveCell<V> {
    const valueType = options.valueType ?? inferValueType(defaultValue);
    const existing = this.#records.get(key);

    if (existing !== undefined) {
      if (isReactiveCellOf(existing.cell, valueType)) {
        return existing.cell;
      }

      throw new PropertyTypeMismatchError(
        key,
        valueType,
        existing.cell.isWritable()
          ? existing.cell.valueType
          : `read-only ${existing.cell.valueType.name}`
      );
    }

    const created = new ReactiveCell(defaultValue, {
      valueType,
      context: this.#cellContext,
      name: key
    });
    this.registerProperty(key, created, options.persistent ?? false);

    return created;
  }

  getProperty(key: string): AnyCell | undefined {
    return this.#records.get(key)?.cell;
  }

  /**
   * Read access under `valueType`. Unlike `getOrCreateProperty` this also
   * accepts a cell whose type is narrower, e.g. an `integer` cell read as
   * `number`.
   *
   * @throws PropertyNotFoundError when nothing is registered under `key`.
   * @throws PropertyTypeMismatchError when the cell holds another value type.
   */
  getTypedProperty<V>(key: string, valueType: ValueType<V>): Cell<V> {
    const record = this.#records.get(key);
    if (record === undefined) {
      throw new PropertyNotFoundError(key);
    }

    if (!isReadableAs(record.cell, valueType)) {
      throw new PropertyTypeMismatchError(key, valueType, record.cell.valueType);
    }

    return record.cell;
  }

  hasProperty(key: string): boolean {
    return this.#records.has(key);
  }

  isPersistent(key: string): boolean {
    return this.#records.get(key)?.persistent ?? false;
  }

  /** Records flagged persistent, for an external save system to walk. */
  getPersistentProperties(): PropertyRecord[] {
    return Array.from(this.#records.values()).filter((record) => record.persistent);
  }

  unregisterProperty(key: string): boolean {
    const record = this.#records.get(key);
    if (record === undefined) {
      return false;
    }

    this.#records.delete(key);
    this.#releaseKey(record.cell, key);

    return true;
  }

  /** Returns the number of records removed. */
  clearNonPersistentProperties(): number {
    let removed = 0;
    for (const record of Array.from(this.#records.values())) {
      if (!record.persistent && this.unregisterProperty(record.key)) {
        removed++;
      }
    }

    this.#logger.debug('Cleared {removed} non-persistent properties', { removed });

    return removed;
  }

  clear(): void {
    this.#records.clear();
    this.#keysByCell.clear();
  }

  getKey(cell: AnyCell): string | undefined {
    return this.#keysByCell.get(cell);
  }

  getAllPropertyKeys(): string[] {
    return Array.from(this.#records.keys());
  }

  /**
   * Hands the cell under `key` to `callback`: right away when it is
   * registered, otherwise once, on its next registration. The returned
   * function cancels a callback that is still pending.
   */
  subscribeDeferred(key: string, callback: DeferredCallback): Unsubscribe {
    const record = this.#records.get(key);
    if (record !== undefined) {
      callback(record.cell);

      return noop;
    }

    const id = PropertyStore.#deferredNr++;
    let pending = this.#deferred.get(key);
    if (pending === undefined) {
      pending = new Map();
      this.#deferred.set(key, pending);
    }
    pending.set(id, callback);

    return () => {
      const waiting = this.#deferred.get(key);
      if (waiting === undefined) {
        return;
      }

      waiting.delete(id);
      if (waiting.size === 0) {
        this.#deferred.delete(key);
      }
    };
  }

  onPropertyRegistered(listener: PropertyRegisteredListener): Unsubscribe {
    this.#registeredListeners.add(listener);

    return () => {
      this.#registeredListeners.delete(listener);
    };
  }

  /** Points `cell` at another key it is still registered under, if any. */
  #releaseKey(cell: AnyCell, key: string): void {
    if (this.#keysByCell.get(cell) !== key) {
      return;
    }

    for (const record of this.#records.values()) {
      if (record.cell === cell) {
        this.#keysByCell.set(cell, record.key);

        return;
      }
    }

    this.#keysByCell.delete(cell);
  }

  toString() {
    return `PropertyStore${this.#name !== undefined ? `<${this.#name}>` : ''}`;
  }

  get [Symbol.toStringTag]() {
    return this.toString();
  }

  _devGetPendingDeferredKeys(): string[] {
    if (isDevOrTest() === false) {
      this.#logger.warn('This method only available in dev mode');

      return [];
    }

    return Array.from(this.#deferred.keys());
  }
}
