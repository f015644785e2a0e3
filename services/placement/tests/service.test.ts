import { test } from 'node:test';
import assert from 'node:assert/strict';
import type { DirectorySnapshot } from '@vramfit/protocol';
import { InMemoryNodeDirectory } from '../src/directory/memory';
import type { NodeDirectory } from '../src/directory/types';
import { InvalidRequestError, RequestConflictError, SnapshotUnavailableError } from '../src/errors';
import { createModelProfileCatalog } from '../src/profiles';
import {
  createPlacementService,
  getPlacement,
  listPlacements,
  matchNodes,
  placeRequest,
  quote,
  resolveRequest,
} from '../src/server';
import { InMemoryDecisionStore } from '../src/storage/memory';
import { makeConfig, makeNode, nodeA, nodeB, sequence } from './fixtures';

const profiles = createModelProfileCatalog([
  { name: 'llama-3-8b', suggestedMinVramGb: 16, category: 'llm' },
]);

const setup = (directory: NodeDirectory = new InMemoryNodeDirectory([nodeA, nodeB], () => 1_000)) => {
  let now = 10_000;
  const store = new InMemoryDecisionStore();
  const service = createPlacementService(makeConfig(), {
    directory,
    store,
    profiles,
    nowMs: () => {
      now += 1;
      return now;
    },
    newId: sequence('id'),
  });
  return { service, store };
};

const failingDirectory: NodeDirectory = {
  snapshot: (): Promise<DirectorySnapshot> =>
    Promise.reject(new SnapshotUnavailableError('directory offline')),
};

test('resolveRequest fills defaults and infers primary capacity from the model profile', () => {
  const { service } = setup();
  const request = resolveRequest(service, { modelName: 'llama-3-8b', requestId: 'r-1' }, 'user-1', () => 'unused');
  assert.deepEqual(request, {
    requestId: 'r-1',
    requesterId: 'user-1',
    modelName: 'llama-3-8b',
    requiredPrimaryGb: 16,
    priority: 'normal',
    preferLocal: false,
  });
});

test('an explicit primary requirement wins over the model profile', () => {
  const { service } = setup();
  const request = resolveRequest(
    service,
    { modelName: 'llama-3-8b', requiredPrimaryGb: 40 },
    'user-1',
    () => 'generated',
  );
  assert.equal(request.requiredPrimaryGb, 40);
  assert.equal(request.requestId, 'generated');
});

test('resolveRequest rejects malformed and unresolvable input', () => {
  const { service } = setup();
  assert.throws(
    () => resolveRequest(service, { modelName: 'unknown-model' }, 'user-1', () => 'x'),
    (error: unknown) => {
      assert.ok(error instanceof InvalidRequestError);
      assert.deepEqual(error.details, [
        "modelName: no model profile named 'unknown-model' and requiredPrimaryGb was not given",
      ]);
      return true;
    },
  );
  assert.throws(
    () => resolveRequest(service, {}, 'user-1', () => 'x'),
    (error: unknown) =>
      error instanceof InvalidRequestError &&
      error.details[0] === 'requiredPrimaryGb: required when modelName is not given',
  );
  assert.throws(
    () => resolveRequest(service, { requiredPrimaryGb: -4 }, 'user-1', () => 'x'),
    (error: unknown) => error instanceof InvalidRequestError && error.details[0].startsWith('requiredPrimaryGb:'),
  );
  assert.throws(
    () => resolveRequest(service, { requiredPrimaryGb: 8 }, '', () => 'x'),
    (error: unknown) => error instanceof InvalidRequestError && error.details[0].startsWith('requesterId:'),
  );
});

test('placeRequest persists the request and its decision', async () => {
  const { service } = setup();
  const record = await placeRequest(service, { requiredPrimaryGb: 24, preferredRegion: 'us-east-1' }, 'user-1');

  assert.equal(record.request.requestId, 'id-1');
  assert.equal(record.decision.decisionId, 'id-2');
  assert.equal(record.decision.mode, 'stateful');
  assert.equal(record.decision.nodeId, 'node-a');
  assert.equal(record.decision.snapshotAtMs, 1_000);
  assert.equal(record.decision.createdAtMs, 10_001);
  assert.deepEqual(await getPlacement(service, 'id-1'), record);
});

test('a request that fits nowhere is still persisted with a null node', async () => {
  const { service } = setup();
  const record = await placeRequest(service, { requiredPrimaryGb: 500 }, 'user-1');
  assert.equal(record.decision.nodeId, null);
  assert.equal(record.decision.eliminatedBy, 'primary');
  assert.ok(record.decision.justification.includes('>= 500.0 GB primary free'));
  assert.equal((await listPlacements(service)).length, 1);
});

test('snapshot failures propagate unchanged and nothing is persisted', async () => {
  const { service, store } = setup(failingDirectory);
  await assert.rejects(
    placeRequest(service, { requiredPrimaryGb: 24 }, 'user-1'),
    (error: unknown) => error instanceof SnapshotUnavailableError && error.message === 'directory offline',
  );
  assert.deepEqual(await store.listPlacements(), []);
});

test('re-evaluating the same request adds a decision; changing it is a conflict', async () => {
  const { service } = setup();
  const first = await placeRequest(service, { requestId: 'r-9', requiredPrimaryGb: 24 }, 'user-1');
  const second = await placeRequest(service, { requestId: 'r-9', requiredPrimaryGb: 24 }, 'user-1');

  assert.notEqual(second.decision.decisionId, first.decision.decisionId);
  assert.equal((await getPlacement(service, 'r-9'))?.decision.decisionId, second.decision.decisionId);
  await assert.rejects(
    placeRequest(service, { requestId: 'r-9', requiredPrimaryGb: 30 }, 'user-1'),
    RequestConflictError,
  );
});

test('concurrent placements that disagree on a requestId store one consistent record', async () => {
  const { service } = setup();
  const results = await Promise.allSettled([
    placeRequest(service, { requestId: 'r-1', requiredPrimaryGb: 24, preferredRegion: 'us-east-1' }, 'user-1'),
    placeRequest(service, { requestId: 'r-1', requiredPrimaryGb: 70 }, 'user-1'),
  ]);

  const fulfilled = results.filter((result) => result.status === 'fulfilled');
  const rejected = results.filter((result) => result.status === 'rejected');
  assert.equal(fulfilled.length, 1);
  assert.equal(rejected.length, 1);
  const [failure] = rejected;
  assert.ok(failure.status === 'rejected' && failure.reason instanceof RequestConflictError);

  const stored = await getPlacement(service, 'r-1');
  assert.equal(stored?.request.requiredPrimaryGb, 24);
  assert.equal(stored?.decision.nodeId, 'node-a');
  assert.deepEqual(await listPlacements(service), [stored]);
});

test('quote is deterministic and never persisted', async () => {
  const { service, store } = setup();
  const first = await quote(service, { requiredPrimaryGb: 24 }, 'api-key:test');
  const second = await quote(service, { requiredPrimaryGb: 24 }, 'api-key:test');

  assert.deepEqual(second, first);
  assert.equal(first.mode, 'quote');
  assert.equal(first.createdAtMs, 1_000);
  assert.deepEqual(await store.listPlacements(), []);
});

test('matchNodes ranks every eligible node up to top k', async () => {
  const volunteer = makeNode({ nodeId: 'node-v', category: 'volunteer', primaryFreeGb: 40 });
  const { service } = setup(new InMemoryNodeDirectory([nodeA, nodeB, volunteer], () => 1_000));

  const matches = await matchNodes(service, { requiredPrimaryGb: 24 }, 'user-1');
  assert.deepEqual(
    matches.map((match) => match.nodeId),
    ['node-b', 'node-a', 'node-v'],
  );
  assert.equal(matches[0].score, 100);
  assert.equal(matches[2].score, 0);

  const top = await matchNodes(service, { requiredPrimaryGb: 24 }, 'user-1', 1);
  assert.equal(top.length, 1);
});

test('listPlacements filters by requester and organization', async () => {
  const { service } = setup();
  await placeRequest(service, { requiredPrimaryGb: 24, organizationId: 'org-1' }, 'user-1');
  await placeRequest(service, { requiredPrimaryGb: 24 }, 'user-2');

  assert.equal((await listPlacements(service, { requesterId: 'user-2' })).length, 1);
  assert.equal((await listPlacements(service, { organizationId: 'org-1' })).length, 1);
  const all = await listPlacements(service);
  assert.deepEqual(
    all.map((record) => record.request.requesterId),
    ['user-2', 'user-1'],
  );
});
