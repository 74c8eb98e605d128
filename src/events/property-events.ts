import type { AnyCell } from '../types';
import type { AnyValueType } from '../value-type';
import { BaseEvent } from './base-event';

export const PROPERTY_EVENT_SOURCE = 'cellwire.properties';

/** Published by every reactive cell after its own subscribers ran. */
export class PropertyChangedEvent extends BaseEvent {
  constructor(
    /** `undefined` when the cell is not registered in a store. */
    readonly propertyKey: string | undefined,
    readonly oldValue: unknown,
    readonly newValue: unknown,
    readonly valueType: AnyValueType
  ) {
    super(PROPERTY_EVENT_SOURCE);
  }
}

export class PropertyRegisteredEvent extends BaseEvent {
  constructor(
    readonly propertyKey: string,
    readonly cell: AnyCell,
    readonly persistent: boolean
  ) {
    super(PROPERTY_EVENT_SOURCE);
  }
}
