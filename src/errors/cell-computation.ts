import type { AnyCell } from '../types';
import { CellError } from './cell-error';

export class CellComputationError extends CellError {
  constructor(cell: AnyCell, cause: unknown) {
    super(`The cell ${cell} failed to compute its value`, { cause });
  }
}
