export * from './store';
export * from './memory-store';
export * from './file-ledger-store';
export * from './lineage';
