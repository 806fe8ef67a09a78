export * from './types';
export * from './sanitize';
export * from './translator';
