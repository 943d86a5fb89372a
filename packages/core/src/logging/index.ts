export * from './logger';
export * from './outcome-recorder';
