export * from './builtin-converters';
export * from './converter-registry';
export type * from './value-converter';
