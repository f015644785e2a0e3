import { test } from 'node:test';
import assert from 'node:assert/strict';
import type { AddressInfo } from 'node:net';
import type { CandidateMatch, Decision, DirectorySnapshot, PlacementRecord } from '@vramfit/protocol';
import type { PlacementConfig } from '../src/config';
import { InMemoryNodeDirectory } from '../src/directory/memory';
import type { NodeDirectory } from '../src/directory/types';
import { SnapshotUnavailableError } from '../src/errors';
import { createPlacementHttpServer } from '../src/http';
import { createRateLimiter } from '../src/rate-limit';
import type { RateLimiter } from '../src/rate-limit';
import { createPlacementService } from '../src/server';
import { InMemoryDecisionStore } from '../src/storage/memory';
import { makeConfig, nodeA, nodeB } from './fixtures';

type Started = { baseUrl: string; close: () => Promise<void> };

const startPlacement = async (
  config: PlacementConfig = makeConfig(),
  directory: NodeDirectory = new InMemoryNodeDirectory([nodeA, nodeB], () => 1_000),
  quoteRateLimiter?: RateLimiter | null,
): Promise<Started> => {
  const service = createPlacementService(config, { directory, store: new InMemoryDecisionStore() });
  const server = createPlacementHttpServer(service, quoteRateLimiter);
  await new Promise<void>((resolve) => server.listen(0, resolve));
  const address = server.address() as AddressInfo;
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () => new Promise<void>((resolve) => server.close(() => resolve())),
  };
};

const post = (url: string, body: unknown, headers: Record<string, string> = {}): Promise<Response> => {
  return fetch(url, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...headers },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
};

test('health and status endpoints', async () => {
  const placement = await startPlacement();
  try {
    const health = await fetch(`${placement.baseUrl}/health`);
    assert.equal(health.status, 200);
    assert.deepEqual(await health.json(), { ok: true });

    const status = await fetch(`${placement.baseUrl}/status`);
    const body = (await status.json()) as { policy: string; quoteApiEnabled: boolean; directory: unknown };
    assert.equal(status.status, 200);
    assert.equal(body.policy, 'headroom');
    assert.equal(body.quoteApiEnabled, false);
    assert.deepEqual(body.directory, { capturedAtMs: 1_000, total: 2, active: 2 });
  } finally {
    await placement.close();
  }
});

test('placement requests are created, listed and fetched', async () => {
  const placement = await startPlacement();
  try {
    const created = await post(
      `${placement.baseUrl}/placement/requests`,
      { requestId: 'req-http-1', requiredPrimaryGb: 24, preferredRegion: 'us-east-1' },
      { 'x-requester-id': 'user-7' },
    );
    assert.equal(created.status, 201);
    const record = (await created.json()) as PlacementRecord;
    assert.equal(record.request.requesterId, 'user-7');
    assert.equal(record.decision.nodeId, 'node-a');
    assert.equal(record.decision.headroomGb, 32);

    const fetched = await fetch(`${placement.baseUrl}/placement/requests/req-http-1`);
    assert.equal(fetched.status, 200);
    assert.deepEqual(await fetched.json(), record);

    const listed = await fetch(`${placement.baseUrl}/placement/requests?requesterId=user-7`);
    const body = (await listed.json()) as { placements: PlacementRecord[] };
    assert.equal(body.placements.length, 1);

    const missing = await fetch(`${placement.baseUrl}/placement/requests/nope`);
    assert.equal(missing.status, 404);
    assert.deepEqual(await missing.json(), { error: 'not-found' });
  } finally {
    await placement.close();
  }
});

test('placement requests need a requester and a valid body', async () => {
  const placement = await startPlacement();
  try {
    const anonymous = await post(`${placement.baseUrl}/placement/requests`, { requiredPrimaryGb: 24 });
    assert.equal(anonymous.status, 401);

    const invalid = await post(
      `${placement.baseUrl}/placement/requests`,
      { requiredPrimaryGb: 0 },
      { 'x-requester-id': 'user-7' },
    );
    assert.equal(invalid.status, 400);
    const invalidBody = (await invalid.json()) as { error: string; details: string[] };
    assert.equal(invalidBody.error, 'invalid-request');
    assert.equal(invalidBody.details.length, 1);
    assert.ok(invalidBody.details[0].startsWith('requiredPrimaryGb:'));

    const malformed = await post(`${placement.baseUrl}/placement/requests`, '{not json', {
      'x-requester-id': 'user-7',
    });
    assert.equal(malformed.status, 400);
    assert.deepEqual(await malformed.json(), { error: 'invalid-json' });

    const badLimit = await fetch(`${placement.baseUrl}/placement/requests?limit=0`);
    assert.equal(badLimit.status, 400);
  } finally {
    await placement.close();
  }
});

test('oversized bodies are rejected', async () => {
  const placement = await startPlacement(makeConfig({ maxRequestBytes: 16 }));
  try {
    const response = await post(
      `${placement.baseUrl}/placement/requests`,
      { requiredPrimaryGb: 24, preferredRegion: 'us-east-1' },
      { 'x-requester-id': 'user-7' },
    );
    assert.equal(response.status, 413);
  } finally {
    await placement.close();
  }
});

test('public quotes require a configured api key', async () => {
  const disabled = await startPlacement();
  try {
    const response = await post(`${disabled.baseUrl}/public/placement/quote`, { requiredPrimaryGb: 24 });
    assert.equal(response.status, 503);
    assert.deepEqual(await response.json(), { error: 'quote-api-disabled' });
  } finally {
    await disabled.close();
  }

  const enabled = await startPlacement(makeConfig({ apiKeys: ['test-key'] }));
  try {
    const denied = await post(`${enabled.baseUrl}/public/placement/quote`, { requiredPrimaryGb: 24 }, {
      'x-api-key': 'wrong-key',
    });
    assert.equal(denied.status, 401);

    const first = await post(`${enabled.baseUrl}/public/placement/quote`, { requiredPrimaryGb: 24 }, {
      'x-api-key': 'test-key',
    });
    const second = await post(`${enabled.baseUrl}/public/placement/quote`, { requiredPrimaryGb: 24 }, {
      'x-api-key': 'test-key',
    });
    assert.equal(first.status, 200);
    const firstBody = (await first.json()) as { decision: Decision };
    assert.deepEqual(await second.json(), firstBody);
    assert.equal(firstBody.decision.mode, 'quote');
    assert.equal(firstBody.decision.nodeId, 'node-b');

    const listed = await fetch(`${enabled.baseUrl}/placement/requests`);
    assert.deepEqual(await listed.json(), { placements: [] });
  } finally {
    await enabled.close();
  }
});

test('public quotes are rate limited per key', async () => {
  const limiter = createRateLimiter(1, 60_000, () => 0);
  const placement = await startPlacement(makeConfig({ apiKeys: ['test-key'] }), undefined, limiter);
  try {
    const headers = { 'x-api-key': 'test-key' };
    const first = await post(`${placement.baseUrl}/public/placement/quote`, { requiredPrimaryGb: 24 }, headers);
    const second = await post(`${placement.baseUrl}/public/placement/quote`, { requiredPrimaryGb: 24 }, headers);
    assert.equal(first.status, 200);
    assert.equal(second.status, 429);
    assert.deepEqual(await second.json(), { error: 'rate-limited' });
  } finally {
    await placement.close();
  }
});

test('marketplace matches return ranked candidates', async () => {
  const placement = await startPlacement(makeConfig({ policy: 'marketplace' }));
  try {
    const response = await post(`${placement.baseUrl}/marketplace/matches?topK=1`, { requiredPrimaryGb: 24 }, {
      'x-requester-id': 'user-7',
    });
    assert.equal(response.status, 200);
    const body = (await response.json()) as { matches: CandidateMatch[] };
    assert.equal(body.matches.length, 1);
    assert.deepEqual(
      body.matches[0].subScores.map((entry) => entry.name),
      ['proximity', 'price', 'reliability', 'capacity', 'nodeType'],
    );
  } finally {
    await placement.close();
  }
});

test('directory failures surface as 503', async () => {
  const failing: NodeDirectory = {
    snapshot: (): Promise<DirectorySnapshot> => Promise.reject(new SnapshotUnavailableError('directory offline')),
  };
  const placement = await startPlacement(makeConfig(), failing);
  try {
    const response = await post(`${placement.baseUrl}/placement/requests`, { requiredPrimaryGb: 24 }, {
      'x-requester-id': 'user-7',
    });
    assert.equal(response.status, 503);
    assert.deepEqual(await response.json(), { error: 'snapshot-unavailable', message: 'directory offline' });
  } finally {
    await placement.close();
  }
});

test('metrics are exposed in prometheus format', async () => {
  const placement = await startPlacement();
  try {
    await post(`${placement.baseUrl}/placement/requests`, { requiredPrimaryGb: 24 }, { 'x-requester-id': 'user-7' });
    const response = await fetch(`${placement.baseUrl}/metrics`);
    assert.equal(response.status, 200);
    const text = await response.text();
    assert.ok(text.includes('placement_decisions_total{mode="stateful",policy="headroom",outcome="selected"}'));
  } finally {
    await placement.close();
  }
});
