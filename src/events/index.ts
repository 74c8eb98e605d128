export * from './base-event';
export * from './event-bus';
export * from './property-events';
