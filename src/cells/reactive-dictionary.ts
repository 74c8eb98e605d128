import { DuplicateEntryError } from '../errors';
import type { Action, EntryListener, KeyListener, Unsubscribe } from '../types';
import { defineValueType, type ValueType } from '../value-type';
import { ListenerSet } from './listener-set';
import { ReactiveCell, type ReactiveCellOptions } from './reactive-cell';

export type ReactiveDictionaryOptions<Key, Item> = ReactiveCellOptions<ReadonlyMap<Key, Item>>;

function mapValueType<Key, Item>(): ValueType<ReadonlyMap<Key, Item>> {
  return defineValueType<ReadonlyMap<Key, Item>>(
    'Map',
    (value): value is ReadonlyMap<Key, Item> => value instanceof Map
  );
}

/**
 * Keyed cell. Mutations replace the map and report through the entry hooks
 * after the value subscribers ran. Writing a value that is already stored
 * under its key is a no-op.
 */
export class ReactiveDictionary<Key, Item> extends ReactiveCell<ReadonlyMap<Key, Item>> {
  readonly #added = new ListenerSet<[Key, Item]>();
  readonly #changed = new ListenerSet<[Key, Item]>();
  readonly #removed = new ListenerSet<[Key]>();
  readonly #cleared = new ListenerSet<[]>();

  constructor(
    initialEntries: Iterable<readonly [Key, Item]> = [],
    options: ReactiveDictionaryOptions<Key, Item> = {}
  ) {
    super(new Map(initialEntries), {
      ...options,
      valueType: options.valueType ?? mapValueType<Key, Item>()
    });
  }

  get count(): number {
    return this.get().size;
  }

  hasKey(key: Key): boolean {
    return this.get().has(key);
  }

  getItem(key: Key): Item | undefined {
    return this.get().get(key);
  }

  keys(): Key[] {
    return Array.from(this.get().keys());
  }

  values(): Item[] {
    return Array.from(this.get().values());
  }

  entries(): Array<[Key, Item]> {
    return Array.from(this.get().entries());
  }

  /** @throws DuplicateEntryError when `key` already has an entry. */
  add(key: Key, item: Item): void {
    if (this.hasKey(key)) {
      throw new DuplicateEntryError(this, key);
    }

    this.#write(key, item);
    this.emit(this.#added, key, item);
  }

  /** Adds or replaces the entry for `key`. */
  setItem(key: Key, item: Item): void {
    const current = this.get();
    const existed = current.has(key);
    if (existed && Object.is(current.get(key), item)) {
      return;
    }

    this.#write(key, item);
    this.emit(existed ? this.#changed : this.#added, key, item);
  }

  remove(key: Key): boolean {
    if (!this.hasKey(key)) {
      return false;
    }

    const next = new Map(this.get());
    next.delete(key);
    this.set(next);
    this.emit(this.#removed, key);

    return true;
  }

  clear(): void {
    if (this.get().size === 0) {
      return;
    }

    this.set(new Map<Key, Item>());
    this.emit(this.#cleared);
  }

  onItemAdded(listener: EntryListener<Key, Item>): Unsubscribe {
    return this.#added.add(listener);
  }

  onItemChanged(listener: EntryListener<Key, Item>): Unsubscribe {
    return this.#changed.add(listener);
  }

  onItemRemoved(listener: KeyListener<Key>): Unsubscribe {
    return this.#removed.add(listener);
  }

  onCleared(listener: Action): Unsubscribe {
    return this.#cleared.add(listener);
  }

  override dispose(): void {
    this.#added.clear();
    this.#changed.clear();
    this.#removed.clear();
    this.#cleared.clear();
    super.dispose();
  }

  #write(key: Key, item: Item): void {
    const next = new Map(this.get());
    next.set(key, item);
    this.set(next);
  }
}
