export * from './constants';
export * from './Diagnostic';
export * from './errors';
export * from './Provider';
export * from './ResourceNode';
