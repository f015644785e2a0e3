import type {
  Decision,
  DecisionMode,
  NodeSnapshot,
  ResourceRequest,
  ScoringPolicyName,
  SubScore,
} from '@vramfit/protocol';
import { explainElimination, formatGb } from './scheduler/filter';
import type { FilterOptions } from './scheduler/filter';
import type { ScoredCandidate, SchedulingResult } from './scheduler/types';

export type DecisionContext = {
  request: ResourceRequest;
  nodes: readonly NodeSnapshot[];
  snapshotAtMs: number;
  policy: ScoringPolicyName;
  mode: DecisionMode;
  decisionId: string;
  nowMs: number;
  defaultDurationSec: number;
  filter?: FilterOptions;
};

const DOMINANT_LIMIT = 2;

export const dominantSubScores = (subScores: readonly SubScore[]): SubScore[] => {
  return subScores
    .filter((entry) => entry.name !== 'normalized' && entry.value > 0)
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => b.entry.value - a.entry.value || a.index - b.index)
    .slice(0, DOMINANT_LIMIT)
    .map(({ entry }) => entry);
};

export const estimateCost = (
  request: ResourceRequest,
  node: NodeSnapshot,
  defaultDurationSec: number,
): number => {
  const totalGb = request.requiredPrimaryGb + (request.requiredSecondaryGb ?? 0);
  return totalGb * (request.durationSec ?? defaultDurationSec) * node.pricePerGbSec;
};

const plural = (count: number, word: string): string => `${count} ${word}${count === 1 ? '' : 's'}`;

export const buildJustification = (
  request: ResourceRequest,
  winner: ScoredCandidate,
  policy: ScoringPolicyName,
  eligibleCount: number,
): string => {
  const headroom = winner.node.primaryFreeGb - request.requiredPrimaryGb;
  const dominant = dominantSubScores(winner.subScores)
    .map((entry) => `${entry.name} (+${entry.value.toFixed(1)})`)
    .join(', ');
  const scale = policy === 'headroom' ? '/100' : '';
  return (
    `Node '${winner.node.name}' selected with ${formatGb(headroom)} GB primary headroom ` +
    `over the ${formatGb(request.requiredPrimaryGb)} GB requirement. ` +
    `Dominant factors: ${dominant || 'none'}. ` +
    `Fit score: ${winner.score.toFixed(1)}${scale} ` +
    `(${policy} policy, ${plural(eligibleCount, 'eligible candidate')}).`
  );
};

export const assembleDecision = (context: DecisionContext, result: SchedulingResult): Decision => {
  const { request } = context;
  const base = {
    decisionId: context.decisionId,
    requestId: request.requestId,
    mode: context.mode,
    policy: context.policy,
    eligibleCount: result.eligible.length,
    snapshotAtMs: context.snapshotAtMs,
    createdAtMs: context.nowMs,
  };

  if (!result.selected) {
    const elimination = explainElimination(request, context.nodes, context.filter);
    return {
      ...base,
      outcome: 'no-eligible-candidate',
      nodeId: null,
      nodeName: null,
      score: 0,
      subScores: [],
      justification: `No eligible node: ${elimination?.message ?? 'no candidate survived filtering'}.`,
      headroomGb: null,
      distanceKm: null,
      estimatedCost: null,
      eliminatedBy: elimination?.criterion ?? null,
    };
  }

  const winner = result.selected;
  return {
    ...base,
    outcome: 'selected',
    nodeId: winner.node.nodeId,
    nodeName: winner.node.name,
    score: winner.score,
    subScores: winner.subScores,
    justification: buildJustification(request, winner, context.policy, result.eligible.length),
    headroomGb: winner.node.primaryFreeGb - request.requiredPrimaryGb,
    distanceKm: winner.distanceKm,
    estimatedCost: estimateCost(request, winner.node, context.defaultDurationSec),
    eliminatedBy: null,
  };
};
