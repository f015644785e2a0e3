export * from './types';
export * from './validators';
export * from './geo';
export * from './digest';
