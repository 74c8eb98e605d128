export * from './cell-error';
export * from './cell-not-writable';
export * from './cell-computation';
export * from './duplicate-entry';
export * from './property-not-found';
export * from './property-type-mismatch';
