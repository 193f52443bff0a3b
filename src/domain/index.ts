export * from './asset';
export * from './edge';
export * from './errors';
export * from './identity';
export * from './result';
export * from './run';
export * from './units';
