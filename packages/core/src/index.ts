// Contracts
export * from './contracts';
export * from './errors';

// Configuration
export * from './config/environment';

// Logging
export * from './logging';

// Database
export * from './db';

// Rules
export * from './rules';

// Placement
export * from './placement';

// Indexer
export * from './indexer';
