import { CellError } from './cell-error';

export class PropertyNotFoundError extends CellError {
  readonly key: string;

  constructor(key: string) {
    super(`Property "${key}" is not registered`);
    this.key = key;
  }
}
