export type * from './cell';
export type * from './events';
export type * from './helpers';
export type * from './store';
export type * from './threading';
