import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  distanceKm,
  offsetNorthKm,
  parseDecision,
  parseModelProfiles,
  parseNodeSnapshots,
  parsePlacementRequestInput,
  stableDigest,
  validateDecision,
  validateResourceRequest,
} from '../src/index';
import type { Decision, NodeSnapshot } from '../src/types';

const node: NodeSnapshot = {
  nodeId: 'node-a',
  name: 'NodeA',
  category: 'datacenter',
  region: 'us-east-1',
  primaryTotalGb: 80,
  primaryFreeGb: 56,
  secondaryTotalGb: 256,
  secondaryFreeGb: 128,
  bandwidthGbps: 1935,
  latencyMs: 2.5,
  pricePerGbSec: 0.0001,
  reliability: 99,
  active: true,
};

const decision: Decision = {
  decisionId: 'dec-1',
  requestId: 'req-1',
  mode: 'quote',
  policy: 'headroom',
  outcome: 'selected',
  nodeId: 'node-a',
  nodeName: 'NodeA',
  score: 100,
  subScores: [{ name: 'headroom', value: 16 }],
  justification: 'ok',
  headroomGb: 32,
  distanceKm: null,
  estimatedCost: 8.64,
  eligibleCount: 1,
  eliminatedBy: null,
  snapshotAtMs: 1_000,
  createdAtMs: 1_000,
};

test('parsePlacementRequestInput accepts a minimal request', () => {
  const result = parsePlacementRequestInput({ requiredPrimaryGb: 24 });
  assert.equal(result.ok, true);
  if (result.ok) {
    assert.equal(result.value.requiredPrimaryGb, 24);
  }
});

test('parsePlacementRequestInput rejects non-positive amounts and malformed points', () => {
  const negative = parsePlacementRequestInput({ requiredPrimaryGb: 0 });
  assert.equal(negative.ok, false);
  if (!negative.ok) {
    assert.equal(negative.errors[0].startsWith('requiredPrimaryGb:'), true);
  }

  const badPoint = parsePlacementRequestInput({
    requiredPrimaryGb: 8,
    location: { latitude: 120, longitude: 0 },
  });
  assert.equal(badPoint.ok, false);
  if (!badPoint.ok) {
    assert.equal(badPoint.errors[0].startsWith('location.latitude:'), true);
  }
});

test('parsePlacementRequestInput rejects unknown fields', () => {
  const result = parsePlacementRequestInput({ requiredPrimaryGb: 8, gpu: 'A100' });
  assert.equal(result.ok, false);
});

test('validateResourceRequest requires resolved identity and flags', () => {
  assert.equal(validateResourceRequest({ requiredPrimaryGb: 8 }).ok, false);
  assert.equal(
    validateResourceRequest({
      requestId: 'req-1',
      requesterId: 'user-1',
      requiredPrimaryGb: 8,
      priority: 'high',
      preferLocal: false,
    }).ok,
    true,
  );
});

test('parseNodeSnapshots validates reliability range', () => {
  assert.equal(parseNodeSnapshots([node]).ok, true);
  const result = parseNodeSnapshots([{ ...node, reliability: 140 }]);
  assert.equal(result.ok, false);
  if (!result.ok) {
    assert.equal(result.errors[0].startsWith('0.reliability:'), true);
  }
});

test('parseModelProfiles reads a catalog', () => {
  const result = parseModelProfiles([
    { name: 'llama-13b', suggestedMinVramGb: 24, category: 'llm' },
  ]);
  assert.equal(result.ok, true);
  if (result.ok) {
    assert.equal(result.value[0].suggestedMinVramGb, 24);
  }
});

test('decisions survive a JSON round trip through the shared schema', () => {
  const parsed = parseDecision(JSON.parse(JSON.stringify(decision)));
  assert.equal(parsed.ok, true);
  if (parsed.ok) {
    assert.deepEqual(parsed.value, decision);
  }
  assert.equal(validateDecision({ ...decision, score: -1 }).ok, false);
});

test('distanceKm measures great-circle distance', () => {
  const origin = { latitude: 40, longitude: -74 };
  assert.equal(distanceKm(origin, origin), 0);
  const north = offsetNorthKm(origin, 500);
  assert.ok(Math.abs(distanceKm(origin, north) - 500) < 1e-6);
  const london = { latitude: 51.5074, longitude: -0.1278 };
  const paris = { latitude: 48.8566, longitude: 2.3522 };
  const km = distanceKm(london, paris);
  assert.ok(km > 340 && km < 345);
});

test('stableDigest ignores key order', () => {
  const a = stableDigest({ b: 1, a: [1, 2] });
  const b = stableDigest({ a: [1, 2], b: 1 });
  assert.equal(a, b);
  assert.equal(a.length, 64);
  assert.notEqual(stableDigest({ a: 1 }), a);
});
