export * from './rule-set';
export * from './rule-store';
