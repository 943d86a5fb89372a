export * from './file-record';
export * from './date-format';
export * from './classify';
export * from './collision';
export * from './mover';
export * from './directory-lock';
export * from './engine';
