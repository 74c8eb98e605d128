import type { Cell } from '../types';
import { ReactiveCell, type ReactiveCellOptions } from './reactive-cell';

/**
 * Each operator returns a new reactive cell fed by subscriptions on its
 * sources. The result owns those subscriptions: disposing it detaches it
 * from the sources.
 */

export function transform<Source, Target>(
  source: Cell<Source>,
  mapper: (value: Source) => Target,
  options?: ReactiveCellOptions<Target>
): ReactiveCell<Target> {
  const target = new ReactiveCell(mapper(source.get()), options);
  target.addDependentSubscription(
    source.subscribe((value) => target.set(mapper(value)))
  );

  return target;
}

export function combineWith<First, Second, Result>(
  first: Cell<First>,
  second: Cell<Second>,
  combiner: (first: First, second: Second) => Result,
  options?: ReactiveCellOptions<Result>
): ReactiveCell<Result> {
  const result = new ReactiveCell(combiner(first.get(), second.get()), options);
  result.addDependentSubscription(
    first.subscribe((value) => result.set(combiner(value, second.get())))
  );
  result.addDependentSubscription(
    second.subscribe((value) => result.set(combiner(first.get(), value)))
  );

  return result;
}

/** Starts from the source value and then only follows values accepted by `predicate`. */
export function where<Value>(
  source: Cell<Value>,
  predicate: (value: Value) => boolean,
  options?: ReactiveCellOptions<Value>
): ReactiveCell<Value> {
  const filtered = new ReactiveCell(source.get(), {
    valueType: source.valueType,
    ...options
  });
  filtered.addDependentSubscription(
    source.subscribe((value) => {
      if (predicate(value)) {
        filtered.set(value);
      }
    })
  );

  return filtered;
}

/**
 * Follows `source` but drops values equal to the last one it holds, per
 * `options.equals` (default `Object.is`). Forced notifications of the
 * source are absorbed as well.
 */
export function distinctUntilChanged<Value>(
  source: Cell<Value>,
  options?: ReactiveCellOptions<Value>
): ReactiveCell<Value> {
  const distinct = new ReactiveCell(source.get(), {
    valueType: source.valueType,
    ...options
  });
  distinct.addDependentSubscription(source.subscribe((value) => distinct.set(value)));

  return distinct;
}
