export * from './enumerator';
export * from './watcher';
export * from './watcher-manager';
