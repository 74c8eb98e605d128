import type { Action, ItemsListener, Unsubscribe } from '../types';
import { inferValueType, ValueTypes, type ValueType } from '../value-type';
import { ListenerSet } from './listener-set';
import { ReactiveCell, type ReactiveCellOptions } from './reactive-cell';

export type ReactiveCollectionOptions<Item> = ReactiveCellOptions<readonly Item[]> & {
  /** Element type for boxed writes; inferred from the initial items otherwise. */
  readonly itemType?: ValueType<Item>;
};

function collectionValueType<Item>(
  items: readonly Item[],
  options: ReactiveCollectionOptions<Item>
): ValueType<readonly Item[]> {
  if (options.valueType !== undefined) {
    return options.valueType;
  }

  return options.itemType !== undefined
    ? ValueTypes.arrayOf(options.itemType)
    : inferValueType<readonly Item[]>(items);
}

/**
 * List cell. Every mutation replaces the array, so subscribers receive the
 * previous and the new contents, and the item hooks run after them.
 */
export class ReactiveCollection<Item> extends ReactiveCell<readonly Item[]> {
  readonly #added = new ListenerSet<[readonly Item[]]>();
  readonly #removed = new ListenerSet<[readonly Item[]]>();
  readonly #cleared = new ListenerSet<[]>();

  constructor(initialItems: Iterable<Item> = [], options: ReactiveCollectionOptions<Item> = {}) {
    const items = Array.from(initialItems);
    super(items, { ...options, valueType: collectionValueType(items, options) });
  }

  get count(): number {
    return this.get().length;
  }

  at(index: number): Item | undefined {
    return this.get()[index];
  }

  contains(item: Item): boolean {
    return this.get().includes(item);
  }

  indexOf(item: Item): number {
    return this.get().indexOf(item);
  }

  add(item: Item): void {
    this.set([...this.get(), item]);
    this.emit(this.#added, [item]);
  }

  addRange(items: Iterable<Item>): void {
    const added = Array.from(items);
    if (added.length === 0) {
      return;
    }

    this.set([...this.get(), ...added]);
    this.emit(this.#added, added);
  }

  /** Removes the first occurrence of `item`. */
  remove(item: Item): boolean {
    return this.removeAt(this.indexOf(item));
  }

  removeAt(index: number): boolean {
    const current = this.get();
    if (!Number.isInteger(index) || index < 0 || index >= current.length) {
      return false;
    }

    this.set(current.filter((_, position) => position !== index));
    this.emit(this.#removed, current.slice(index, index + 1));

    return true;
  }

  /**
   * Replaces the item at `index`, reported as a removal followed by an
   * addition.
   *
   * @throws RangeError when `index` is outside the collection.
   */
  setAt(index: number, item: Item): void {
    const current = this.get();
    if (!Number.isInteger(index) || index < 0 || index >= current.length) {
      throw new RangeError(`Index ${index} is outside ${this} (count ${current.length})`);
    }

    const replaced = current.slice(index, index + 1);
    this.set(current.map((entry, position) => (position === index ? item : entry)));
    this.emit(this.#removed, replaced);
    this.emit(this.#added, [item]);
  }

  clear(): void {
    if (this.get().length === 0) {
      return;
    }

    this.set([]);
    this.emit(this.#cleared);
  }

  onItemsAdded(listener: ItemsListener<Item>): Unsubscribe {
    return this.#added.add(listener);
  }

  onItemsRemoved(listener: ItemsListener<Item>): Unsubscribe {
    return this.#removed.add(listener);
  }

  onCleared(listener: Action): Unsubscribe {
    return this.#cleared.add(listener);
  }

  override dispose(): void {
    this.#added.clear();
    this.#removed.clear();
    this.#cleared.clear();
    super.dispose();
  }
}
