import { v4 as uuidv4 } from 'uuid';
import type { BusEvent } from '../types';

export abstract class BaseEvent implements BusEvent {
  readonly timestamp: Date;
  readonly eventId: string;
  readonly source: string | undefined;

  protected constructor(source?: string) {
    this.timestamp = new Date();
    this.eventId = uuidv4();
    this.source = source ?? new.target.name;
  }

  get [Symbol.toStringTag]() {
    return `${this.constructor.name}:${this.eventId}`;
  }
}
