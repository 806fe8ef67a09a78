export * from './types';
export * from './srtParser';
export * from './subtitleUtils';
