import { distanceKm } from '@vramfit/protocol';
import type { NodeSnapshot, ResourceRequest, ScoringPolicyName, SubScore } from '@vramfit/protocol';
import type { HeadroomWeights, MarketplaceWeights } from '../config';
import type { ScoredCandidate, ScoringPolicy } from './types';

export const NORMALIZED_SCORE_MAX = 100;

export const candidateDistanceKm = (node: NodeSnapshot, request: ResourceRequest): number | null => {
  if (!request.location || !node.location) {
    return null;
  }
  return distanceKm(request.location, node.location);
};

const sum = (subScores: SubScore[]): number => subScores.reduce((total, entry) => total + entry.value, 0);

// Folded rather than spread; eligible sets may exceed the call-argument limit.
const minOf = (values: number[]): number => values.reduce((low, value) => Math.min(low, value), Infinity);
const maxOf = (values: number[]): number => values.reduce((high, value) => Math.max(high, value), -Infinity);

export const headroomRawScore = (
  node: NodeSnapshot,
  request: ResourceRequest,
  weights: HeadroomWeights,
): SubScore[] => [
  { name: 'headroom', value: weights.headroom * (node.primaryFreeGb - request.requiredPrimaryGb) },
  { name: 'bandwidth', value: weights.bandwidth * (node.bandwidthGbps ?? 0) },
  { name: 'latency', value: 0 - weights.latency * (node.latencyMs ?? 0) },
];

/**
 * Linear headroom/bandwidth/latency score, rescaled to 0-100 against the
 * min and max raw scores of this request's eligible set.
 */
export const createHeadroomPolicy = (weights: HeadroomWeights): ScoringPolicy => ({
  name: 'headroom',
  score: (request, candidates) => {
    const raw = candidates.map((node) => {
      const subScores = headroomRawScore(node, request, weights);
      return { node, subScores, total: sum(subScores) };
    });
    const totals = raw.map((entry) => entry.total);
    const min = minOf(totals);
    const max = maxOf(totals);
    return raw.map(({ node, subScores, total }): ScoredCandidate => {
      const normalized =
        max === min ? NORMALIZED_SCORE_MAX : ((total - min) / (max - min)) * NORMALIZED_SCORE_MAX;
      return {
        node,
        score: normalized,
        subScores: [...subScores, { name: 'normalized', value: normalized, max: NORMALIZED_SCORE_MAX }],
        distanceKm: candidateDistanceKm(node, request),
      };
    });
  },
});

export const proximityScore = (
  km: number | null,
  request: ResourceRequest,
  weights: MarketplaceWeights,
): SubScore => {
  const multiplier = request.preferLocal ? weights.preferLocalMultiplier : 1;
  const max = weights.proximityCap * multiplier;
  if (km === null) {
    return { name: 'proximity', value: 0, max };
  }
  const base = Math.max(0, weights.proximityCap * (1 - km / weights.proximityRangeKm));
  return { name: 'proximity', value: base * multiplier, max };
};

export const priceScore = (price: number, cheapest: number, weights: MarketplaceWeights): SubScore => {
  const value = price <= 0 ? weights.priceCap : (weights.priceCap * cheapest) / price;
  return { name: 'price', value, max: weights.priceCap };
};

export const reliabilityScore = (reliability: number, weights: MarketplaceWeights): SubScore => {
  const clamped = Math.max(0, Math.min(100, reliability));
  return { name: 'reliability', value: (clamped / 100) * weights.reliabilityCap, max: weights.reliabilityCap };
};

export const capacityScore = (
  node: NodeSnapshot,
  request: ResourceRequest,
  weights: MarketplaceWeights,
): SubScore => {
  const needed = request.requiredPrimaryGb + (request.requiredSecondaryGb ?? 0);
  const available =
    node.primaryFreeGb + (request.requiredSecondaryGb !== undefined ? node.secondaryFreeGb : 0);
  const value = Math.min(weights.capacityCap, (weights.capacityRatioWeight * available) / needed);
  return { name: 'capacity', value, max: weights.capacityCap };
};

export const nodeTypeScore = (node: NodeSnapshot, weights: MarketplaceWeights): SubScore => ({
  name: 'nodeType',
  value: node.category === weights.bonusCategory ? weights.nodeTypeBonus : 0,
  max: weights.nodeTypeBonus,
});

/** Unweighted sum of proximity, price, reliability, capacity and node-type terms. */
export const createMarketplacePolicy = (weights: MarketplaceWeights): ScoringPolicy => ({
  name: 'marketplace',
  score: (request, candidates) => {
    const cheapest = minOf(candidates.map((node) => node.pricePerGbSec));
    return candidates.map((node): ScoredCandidate => {
      const km = candidateDistanceKm(node, request);
      const subScores = [
        proximityScore(km, request, weights),
        priceScore(node.pricePerGbSec, cheapest, weights),
        reliabilityScore(node.reliability, weights),
        capacityScore(node, request, weights),
        nodeTypeScore(node, weights),
      ];
      return { node, score: sum(subScores), subScores, distanceKm: km };
    });
  },
});

export const createScoringPolicy = (
  name: ScoringPolicyName,
  weights: { headroomWeights: HeadroomWeights; marketplaceWeights: MarketplaceWeights },
): ScoringPolicy => {
  switch (name) {
    case 'headroom':
      return createHeadroomPolicy(weights.headroomWeights);
    case 'marketplace':
      return createMarketplacePolicy(weights.marketplaceWeights);
  }
};
