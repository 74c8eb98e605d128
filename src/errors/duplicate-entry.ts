import type { AnyCell } from '../types';
import { CellError } from './cell-error';

export class DuplicateEntryError extends CellError {
  readonly key: unknown;

  constructor(cell: AnyCell, key: unknown) {
    super(`The cell ${cell} already has an entry for ${String(key)}`);
    this.key = key;
  }
}
