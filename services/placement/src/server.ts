import { randomUUID } from 'node:crypto';
import { parsePlacementRequestInput, parseResourceRequest, stableDigest } from '@vramfit/protocol';
import type {
  CandidateMatch,
  Decision,
  DirectorySnapshot,
  ModelProfile,
  PlacementRecord,
  PlacementRequestInput,
  ResourceRequest,
} from '@vramfit/protocol';
import type { PlacementConfig } from './config';
import type { NodeDirectory } from './directory/types';
import { evaluatePlacement, matchCandidates } from './engine';
import { InvalidRequestError, RequestConflictError } from './errors';
import { logInfo, logWarn } from './logging';
import {
  placementDecisions,
  placementEvaluationDuration,
  placementInvalidRequests,
  placementSnapshotFailures,
  placementTracer,
} from './observability';
import { createModelProfileCatalog } from './profiles';
import type { ModelProfileCatalog } from './profiles';
import { quotePlacement } from './quote';
import type { DecisionStore, PlacementQuery } from './storage/types';

const MAX_LIST_LIMIT = 500;
const DERIVED_ID_LENGTH = 32;

export type PlacementService = {
  config: PlacementConfig;
  directory: NodeDirectory;
  store: DecisionStore;
  profiles: ModelProfileCatalog;
  nowMs: () => number;
  newId: () => string;
};

export type PlacementServiceDeps = {
  directory: NodeDirectory;
  store: DecisionStore;
  profiles?: ModelProfileCatalog;
  nowMs?: () => number;
  newId?: () => string;
};

export const createPlacementService = (
  config: PlacementConfig,
  deps: PlacementServiceDeps,
): PlacementService => {
  return {
    config,
    directory: deps.directory,
    store: deps.store,
    profiles: deps.profiles ?? createModelProfileCatalog([]),
    nowMs: deps.nowMs ?? Date.now,
    newId: deps.newId ?? randomUUID,
  };
};

/** Request id for calls that never persist, stable for identical input. */
export const derivedRequestId = (input: PlacementRequestInput, requesterId: string): string => {
  return `req-${stableDigest({ input, requesterId }).slice(0, DERIVED_ID_LENGTH)}`;
};

const reject = (errors: string[]): never => {
  placementInvalidRequests.inc();
  throw new InvalidRequestError(errors);
};

const resolvePrimaryGb = (service: PlacementService, input: PlacementRequestInput): number => {
  if (input.requiredPrimaryGb !== undefined) {
    return input.requiredPrimaryGb;
  }
  if (input.modelName === undefined) {
    return reject(['requiredPrimaryGb: required when modelName is not given']);
  }
  const profile = service.profiles.find(input.modelName);
  if (!profile) {
    return reject([
      `modelName: no model profile named '${input.modelName}' and requiredPrimaryGb was not given`,
    ]);
  }
  return profile.suggestedMinVramGb;
};

/**
 * Validates caller input and fills in defaults. Missing primary capacity is
 * taken from the model profile named by `modelName`.
 */
export const resolveRequest = (
  service: PlacementService,
  input: unknown,
  requesterId: string,
  fallbackRequestId: (input: PlacementRequestInput) => string,
): ResourceRequest => {
  const parsed = parsePlacementRequestInput(input);
  if (!parsed.ok) {
    return reject(parsed.errors);
  }
  const { requestId, ...rest } = parsed.value;
  const resolved = parseResourceRequest({
    ...rest,
    requestId: requestId ?? fallbackRequestId(parsed.value),
    requesterId,
    requiredPrimaryGb: resolvePrimaryGb(service, parsed.value),
    priority: rest.priority ?? 'normal',
    preferLocal: rest.preferLocal ?? false,
  });
  if (!resolved.ok) {
    return reject(resolved.errors);
  }
  return resolved.value;
};

const acquireSnapshot = async (service: PlacementService): Promise<DirectorySnapshot> => {
  try {
    return await service.directory.snapshot();
  } catch (error) {
    placementSnapshotFailures.inc();
    logWarn('[placement] node directory snapshot failed', error);
    throw error;
  }
};

const recordDecision = (decision: Decision): void => {
  placementDecisions.inc({ mode: decision.mode, policy: decision.policy, outcome: decision.outcome });
};

export const placeRequest = async (
  service: PlacementService,
  input: unknown,
  requesterId: string,
): Promise<PlacementRecord> => {
  const span = placementTracer.startSpan('placement.place', {
    attributes: { component: 'placement', 'placement.policy': service.config.policy },
  });
  try {
    const request = resolveRequest(service, input, requesterId, () => service.newId());
    span.setAttribute('placement.request_id', request.requestId);

    const existing = await service.store.getPlacement(request.requestId);
    if (existing && stableDigest(existing.request) !== stableDigest(request)) {
      throw new RequestConflictError(request.requestId);
    }

    const snapshot = await acquireSnapshot(service);
    const timer = placementEvaluationDuration.startTimer({ mode: 'stateful' });
    const { decision } = evaluatePlacement(request, snapshot, service.config, {
      mode: 'stateful',
      decisionId: service.newId(),
      nowMs: service.nowMs(),
    });
    timer();

    await service.store.savePlacement({ request, decision });
    recordDecision(decision);
    span.setAttribute('placement.outcome', decision.outcome);
    logInfo('[placement] decision recorded', {
      requestId: request.requestId,
      decisionId: decision.decisionId,
      nodeId: decision.nodeId,
      outcome: decision.outcome,
      score: decision.score,
    });
    return { request, decision };
  } finally {
    span.end();
  }
};

export const quote = async (
  service: PlacementService,
  input: unknown,
  requesterId: string,
): Promise<Decision> => {
  const span = placementTracer.startSpan('placement.quote', {
    attributes: { component: 'placement', 'placement.policy': service.config.policy },
  });
  try {
    const request = resolveRequest(service, input, requesterId, (parsed) =>
      derivedRequestId(parsed, requesterId),
    );
    const snapshot = await acquireSnapshot(service);
    const timer = placementEvaluationDuration.startTimer({ mode: 'quote' });
    const decision = quotePlacement(request, snapshot, service.config);
    timer();
    recordDecision(decision);
    span.setAttribute('placement.outcome', decision.outcome);
    return decision;
  } finally {
    span.end();
  }
};

export const matchNodes = async (
  service: PlacementService,
  input: unknown,
  requesterId: string,
  topK?: number,
): Promise<CandidateMatch[]> => {
  const span = placementTracer.startSpan('placement.match', {
    attributes: { component: 'placement', 'placement.policy': service.config.policy },
  });
  try {
    const request = resolveRequest(service, input, requesterId, (parsed) =>
      derivedRequestId(parsed, requesterId),
    );
    const snapshot = await acquireSnapshot(service);
    const limit = topK !== undefined && topK > 0 ? topK : service.config.matchesTopK;
    const matches = matchCandidates(request, snapshot, service.config, limit);
    span.setAttribute('placement.matches', matches.length);
    return matches;
  } finally {
    span.end();
  }
};

export const getPlacement = (
  service: PlacementService,
  requestId: string,
): Promise<PlacementRecord | null> => {
  return service.store.getPlacement(requestId);
};

export const listPlacements = (
  service: PlacementService,
  query: PlacementQuery = {},
): Promise<PlacementRecord[]> => {
  const limit = query.limit !== undefined ? Math.min(Math.max(1, query.limit), MAX_LIST_LIMIT) : undefined;
  return service.store.listPlacements({ ...query, limit });
};

export const listModelProfiles = (service: PlacementService): ModelProfile[] => {
  return service.profiles.list();
};
