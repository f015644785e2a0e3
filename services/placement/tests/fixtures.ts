import type { NodeSnapshot, ResourceRequest } from '@vramfit/protocol';
import { defaultPlacementConfig } from '../src/config';
import type { PlacementConfig } from '../src/config';

export const makeNode = (overrides: Partial<NodeSnapshot> & { nodeId: string }): NodeSnapshot => ({
  name: overrides.nodeId,
  category: 'datacenter',
  region: 'us-east-1',
  primaryTotalGb: 80,
  primaryFreeGb: 80,
  secondaryTotalGb: 256,
  secondaryFreeGb: 256,
  pricePerGbSec: 0.0001,
  reliability: 95,
  active: true,
  ...overrides,
});

export const makeRequest = (overrides: Partial<ResourceRequest> = {}): ResourceRequest => ({
  requestId: 'req-1',
  requesterId: 'user-1',
  requiredPrimaryGb: 24,
  priority: 'normal',
  preferLocal: false,
  ...overrides,
});

export const makeConfig = (overrides: Partial<PlacementConfig> = {}): PlacementConfig => ({
  ...defaultPlacementConfig,
  ...overrides,
});

export const nodeA = makeNode({
  nodeId: 'node-a',
  name: 'NodeA',
  region: 'us-east-1',
  primaryFreeGb: 56,
  bandwidthGbps: 1935,
  latencyMs: 2.5,
});

export const nodeB = makeNode({
  nodeId: 'node-b',
  name: 'NodeB',
  region: 'us-west-2',
  primaryFreeGb: 80,
  bandwidthGbps: 3350,
  latencyMs: 1.8,
});

export const approx = (actual: number, expected: number, epsilon = 1e-9): boolean => {
  return Math.abs(actual - expected) < epsilon;
};

export const sequence = (prefix: string): (() => string) => {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
};
