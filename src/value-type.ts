/**
 * Runtime type tokens for cell values.
 *
 * TypeScript erases `T`, so every cell carries a `ValueType<T>` that boxed
 * writes are checked against and that the property store compares when a
 * key is requested with a different element type. Two tokens describe the
 * same type when their names are equal.
 */
export interface ValueType<T> {
  readonly name: string;

  /** Names of wider types every value of this type also belongs to. */
  readonly supertypes?: readonly string[];

  is(value: unknown): value is T;
}

export type AnyValueType = ValueType<unknown>;

export type ExtractValueType<T> = T extends ValueType<infer V> ? V : never;

type AnyConstructor<T> = abstract new (...args: never[]) => T;

export function defineValueType<T>(
  name: string,
  is: (value: unknown) => value is T,
  supertypes: readonly string[] = []
): ValueType<T> {
  return Object.freeze({
    name,
    supertypes,
    is,
    toString: () => `ValueType<${name}>`
  });
}

function instanceOf<T>(ctor: AnyConstructor<T>): ValueType<T> {
  return defineValueType<T>(
    ctor.name,
    (value): value is T => value instanceof ctor
  );
}

function arrayOf<T>(item: ValueType<T>): ValueType<T[]> {
  return defineValueType<T[]>(
    `${item.name}[]`,
    (value): value is T[] =>
      Array.isArray(value) && value.every((entry) => item.is(entry)),
    (item.supertypes ?? []).map((name) => `${name}[]`)
  );
}

export const ValueTypes = {
  number: defineValueType<number>(
    'number',
    (value): value is number => typeof value === 'number'
  ),
  integer: defineValueType<number>(
    'integer',
    (value): value is number => Number.isInteger(value),
    ['number']
  ),
  string: defineValueType<string>(
    'string',
    (value): value is string => typeof value === 'string'
  ),
  boolean: defineValueType<boolean>(
    'boolean',
    (value): value is boolean => typeof value === 'boolean'
  ),
  bigint: defineValueType<bigint>(
    'bigint',
    (value): value is bigint => typeof value === 'bigint'
  ),
  unknown: defineValueType<unknown>('unknown', (_value): _value is unknown => true),
  instanceOf,
  arrayOf
} as const;

/** A token that accepts any value, for cells whose type is not checked. */
export function anyValueType<T>(): ValueType<T> {
  return defineValueType<T>('unknown', (_value): _value is T => true);
}

/**
 * Derives a token from a sample value. `null` and `undefined` carry no type
 * information and yield a token that accepts anything. Arrays are typed by
 * their elements, as `arrayOf` would name them: `[1, 2]` is `number[]`,
 * while empty or mixed arrays are `unknown[]`.
 */
export function inferValueType<T>(value: T): ValueType<T> {
  if (value === null || value === undefined) {
    return anyValueType<T>();
  }

  if (Array.isArray(value)) {
    return inferArrayValueType<T>(value);
  }

  const kind = typeof value;
  if (kind !== 'object') {
    return defineValueType<T>(kind, (other): other is T => typeof other === kind);
  }

  const proto: unknown = Object.getPrototypeOf(value);
  const ctor =
    typeof proto === 'object' && proto !== null ? proto.constructor : undefined;
  if (typeof ctor !== 'function' || ctor === Object) {
    return defineValueType<T>(
      'object',
      (other): other is T =>
        typeof other === 'object' && other !== null && !Array.isArray(other)
    );
  }

  return defineValueType<T>(ctor.name, (other): other is T => other instanceof ctor);
}

function inferArrayValueType<T>(items: readonly unknown[]): ValueType<T> {
  const itemTypes = items.map((item) => inferValueType(item));
  const [first] = itemTypes;
  const itemType =
    first !== undefined && itemTypes.every((type) => isSameValueType(type, first))
      ? first
      : ValueTypes.unknown;

  return defineValueType<T>(
    `${itemType.name}[]`,
    (other): other is T =>
      Array.isArray(other) && other.every((entry) => itemType.is(entry))
  );
}

export function isSameValueType(left: AnyValueType, right: AnyValueType): boolean {
  return left === right || left.name === right.name;
}

/**
 * Whether every value a `held` cell can contain is also a `requested`
 * value: same type, `requested` is `unknown`, or `held` names it as a
 * supertype.
 */
export function isAssignableValueType(
  held: AnyValueType,
  requested: AnyValueType
): boolean {
  return (
    isSameValueType(held, requested) ||
    requested.name === ValueTypes.unknown.name ||
    (held.supertypes ?? []).includes(requested.name)
  );
}
