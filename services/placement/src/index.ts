export * from './config';
export * from './errors';
export * from './engine';
export * from './quote';
export * from './decision';
export * from './scheduler';
export * from './server';
export * from './profiles';
export { createPlacementHttpServer } from './http';
export { createRateLimiter } from './rate-limit';
export type { RateLimiter } from './rate-limit';
export { InMemoryNodeDirectory, readNodesFile } from './directory/memory';
export type { NodeDirectory } from './directory/types';
export { InMemoryDecisionStore } from './storage/memory';
export type { DecisionStore, PlacementQuery } from './storage/types';
