import { ComputedCell, type ComputedCellOptions } from './cells/computed-cell';
import { ReactiveCell, type ReactiveCellOptions } from './cells/reactive-cell';

function isComputeFunction<Value>(input: unknown): input is () => Value {
  return typeof input === 'function';
}

// computed cell
export function cell<Value>(
  compute: () => Value,
  options?: ComputedCellOptions<Value>
): ComputedCell<Value>;

// reactive cell
export function cell<Value>(
  initialValue: Value,
  options?: ReactiveCellOptions<Value>
): ReactiveCell<Value>;

export function cell<Value>(
  input: Value | (() => Value),
  options?: ComputedCellOptions<Value>
) {
  if (isComputeFunction<Value>(input)) {
    return new ComputedCell<Value>(input, options);
  }

  return new ReactiveCell<Value>(input, options);
}
