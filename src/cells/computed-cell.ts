import { CellComputationError, CellIsNotWritableError } from '../errors';
import type { AnyCell } from '../types';
import { anyValueType } from '../value-type';
import { BaseCell, type BaseCellOptions } from './base-cell';

export type ComputedCellOptions<Value> = BaseCellOptions<Value> & {
  /**
   * Cells the computation reads. A change in any of them marks this cell
   * dirty; the value itself is only recomputed on the next read.
   */
  readonly dependsOn?: readonly AnyCell[];
};

type Cached<Value> = { readonly value: Value };

/**
 * Read-only cell derived from a computation. Pull based: `get()` recomputes
 * only while dirty, and subscribers hear about a new value when a read
 * produces one that differs from the cached value.
 */
export class ComputedCell<Value> extends BaseCell<Value> {
  readonly #compute: () => Value;
  #cached: Cached<Value> | undefined;
  #dirty = true;

  constructor(compute: () => Value, options: ComputedCellOptions<Value> = {}) {
    super(options.valueType ?? anyValueType<Value>(), options);

    this.#compute = compute;

    for (const source of options.dependsOn ?? []) {
      this.addDependentSubscription(source.subscribeBoxed(() => this.invalidate()));
    }
  }

  get isDirty(): boolean {
    return this.#dirty;
  }

  override get(): Value {
    if (this.#dirty || this.#cached === undefined) {
      return this.#recomputeValue();
    }

    return this.#cached.value;
  }

  /** Marks the cached value stale without recomputing it. */
  invalidate(): void {
    this.#dirty = true;
  }

  recompute(): Value {
    this.#dirty = true;

    return this.get();
  }

  set(_value: Value, _forceNotify?: boolean): never {
    throw new CellIsNotWritableError(this);
  }

  override setValue(_value: unknown, _forceNotify?: boolean): never {
    throw new CellIsNotWritableError(this);
  }

  override isWritable(): boolean {
    return false;
  }

  #recomputeValue(): Value {
    const next = this.#evaluate();
    const previous = this.#cached;
    this.#dirty = false;

    if (previous !== undefined && this.equals(previous.value, next)) {
      return previous.value;
    }

    this.#cached = { value: next };
    if (previous !== undefined) {
      this.notifyChanged(previous.value, next);
    }

    return next;
  }

  #evaluate(): Value {
    try {
      return this.#compute();
    } catch (error) {
      throw new CellComputationError(this, error);
    }
  }
}
