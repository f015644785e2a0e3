import type {
  CandidateMatch,
  Decision,
  DecisionMode,
  DirectorySnapshot,
  ResourceRequest,
} from '@vramfit/protocol';
import type { PlacementConfig } from './config';
import { assembleDecision, estimateCost } from './decision';
import { createScoringPolicy, rankCandidates, selectNode } from './scheduler';
import type { SchedulingResult } from './scheduler';

export type EngineSettings = Pick<
  PlacementConfig,
  'policy' | 'headroomWeights' | 'marketplaceWeights' | 'defaultDurationSec' | 'restrictToOrganization'
>;

export type EvaluationOptions = {
  mode: DecisionMode;
  decisionId: string;
  nowMs: number;
};

export type Evaluation = {
  decision: Decision;
  result: SchedulingResult;
};

/**
 * Filter, score, select and assemble against one snapshot. No I/O and no
 * state outside the arguments.
 */
export const evaluatePlacement = (
  request: ResourceRequest,
  snapshot: DirectorySnapshot,
  settings: EngineSettings,
  options: EvaluationOptions,
): Evaluation => {
  const policy = createScoringPolicy(settings.policy, settings);
  const result = selectNode({
    request,
    nodes: snapshot.nodes,
    policy,
    restrictToOrganization: settings.restrictToOrganization,
  });
  const decision = assembleDecision(
    {
      request,
      nodes: snapshot.nodes,
      snapshotAtMs: snapshot.capturedAtMs,
      policy: policy.name,
      mode: options.mode,
      decisionId: options.decisionId,
      nowMs: options.nowMs,
      defaultDurationSec: settings.defaultDurationSec,
      filter: { restrictToOrganization: settings.restrictToOrganization },
    },
    result,
  );
  return { decision, result };
};

export const matchCandidates = (
  request: ResourceRequest,
  snapshot: DirectorySnapshot,
  settings: EngineSettings,
  topK: number,
): CandidateMatch[] => {
  const result = selectNode({
    request,
    nodes: snapshot.nodes,
    policy: createScoringPolicy(settings.policy, settings),
    restrictToOrganization: settings.restrictToOrganization,
  });
  return rankCandidates(result.ranked, topK).map((candidate) => ({
    nodeId: candidate.node.nodeId,
    nodeName: candidate.node.name,
    category: candidate.node.category,
    region: candidate.node.region,
    score: candidate.score,
    subScores: candidate.subScores,
    distanceKm: candidate.distanceKm,
    estimatedCost: estimateCost(request, candidate.node, settings.defaultDurationSec),
    latencyMs: candidate.node.latencyMs ?? 0,
  }));
};
