import { PropertyChangedEvent } from '../events/property-events';
import type { WritableCell } from '../types';
import { isDevOrTest } from '../utils/is-debug';
import { inferValueType } from '../value-type';
import { BaseCell, type BaseCellOptions } from './base-cell';

export type ReactiveCellOptions<Value> = BaseCellOptions<Value>;

export class ReactiveCell<Value> extends BaseCell<Value> implements WritableCell<Value> {
  #value: Value;

  /**
   * Without an explicit `valueType` the type is inferred from
   * `initialValue`, so `new ReactiveCell(0)` only accepts numbers through
   * `setValue`.
   */
  constructor(initialValue: Value, options: ReactiveCellOptions<Value> = {}) {
    super(options.valueType ?? inferValueType(initialValue), options);

    this.#value = initialValue;
  }

  override get(): Value {
    return this.#value;
  }

  set(value: Value, forceNotify = false): void {
    this.#setValueInternal(value, forceNotify);
  }

  override setValue(value: unknown, forceNotify = false): boolean {
    if (!this.valueType.is(value)) {
      this.logger.error(
        'Value {value} of type {actualType} cannot be assigned to {cell} of type {valueType}',
        {
          value,
          actualType: value === null ? 'null' : typeof value,
          cell: this.toString(),
          valueType: this.valueType.name
        }
      );

      return false;
    }

    this.#setValueInternal(value, forceNotify);

    return true;
  }

  override isWritable(): boolean {
    return true;
  }

  #setValueInternal(newValue: Value, forceNotify: boolean): void {
    const oldValue = this.#value;
    const changed = !this.equals(oldValue, newValue);
    if (changed) {
      this.#value = newValue;
    }

    if (!changed && !forceNotify) {
      return;
    }

    this.notifyChanged(oldValue, newValue);
    this.#publishChange(oldValue, newValue);
  }

  #publishChange(oldValue: Value, newValue: Value): void {
    const { events, keys } = this.context;
    if (events === undefined) {
      return;
    }

    const key = keys?.getKey(this);
    if (key === undefined && isDevOrTest()) {
      this.logger.debug('{cell} changed without a registered key', {
        cell: this.toString()
      });
    }

    events.publish(new PropertyChangedEvent(key, oldValue, newValue, this.valueType));
  }
}
