import type { AnyCell } from '.';

export type PropertyRecord = {
  readonly key: string;
  readonly cell: AnyCell;
  readonly persistent: boolean;
};

export type DeferredCallback = (cell: AnyCell) => void;

export type PropertyRegisteredListener = (key: string, cell: AnyCell) => void;
