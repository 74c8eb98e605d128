export * from './cell';
export * from './cells/base-cell';
export * from './cells/computed-cell';
export * from './cells/listener-set';
export * from './cells/operators';
export * from './cells/reactive-cell';
export * from './cells/reactive-collection';
export * from './cells/reactive-dictionary';
export * from './converters';
export * from './errors';
export * from './events';
export * from './runtime';
export * from './store';
export * from './threading';
export type * from './types';
export * from './utils/is-debug';
export * from './value-type';
