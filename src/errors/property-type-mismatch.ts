import type { AnyValueType } from '../value-type';
import { CellError } from './cell-error';

export class PropertyTypeMismatchError extends CellError {
  readonly key: string;
  readonly expected: string;
  readonly actual: string;

  constructor(key: string, expected: AnyValueType, actual: AnyValueType | string) {
    const actualName = typeof actual === 'string' ? actual : actual.name;
    super(
      `Property "${key}" holds ${actualName} but ${expected.name} was requested`
    );
    this.key = key;
    this.expected = expected.name;
    this.actual = actualName;
  }
}
