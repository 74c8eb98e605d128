import type { Cell } from '.';

export type Unsubscribe = () => void;

export type Action = () => void;

export type ValueListener<Value> = (value: Value) => void;
export type BoxedListener = (value: unknown) => void;
export type ChangeListener<Value> = (oldValue: Value, newValue: Value) => void;

export type EqualityFn<Value> = (left: Value, right: Value) => boolean;

export type SubscribeOptions = {
  /** Invoke the listener once with the current value right away. */
  readonly fireOnSubscribe?: boolean;
};

export type ExtractCellValue<T> = T extends Cell<infer Value> ? Value : never;

export type AnyCellValue = unknown;
export type AnyCell = Cell<AnyCellValue>;

export type ItemsListener<Item> = (items: readonly Item[]) => void;
export type EntryListener<Key, Item> = (key: Key, item: Item) => void;
export type KeyListener<Key> = (key: Key) => void;
