export * from './backends';
export * from './context';
export * from './executor';
export * from './launcher';
export * from './materializer';
export * from './outputs';
export * from './resolver';
export * from './state-machine';
export * from './template';
