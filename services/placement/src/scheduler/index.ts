import type { SchedulingInput, SchedulingResult } from './types';
import { filterEligibleNodes } from './filter';
import { compareCandidates, rankCandidates } from './ranking';

export { filterEligibleNodes, explainElimination, isEligible } from './filter';
export { compareCandidates, rankCandidates } from './ranking';
export {
  createHeadroomPolicy,
  createMarketplacePolicy,
  createScoringPolicy,
  candidateDistanceKm,
} from './score';
export type { ScoredCandidate, ScoringPolicy, SchedulingInput, SchedulingResult } from './types';

export const selectNode = (input: SchedulingInput): SchedulingResult => {
  const eligible = filterEligibleNodes(input.request, input.nodes, {
    restrictToOrganization: input.restrictToOrganization,
  });
  if (eligible.length === 0) {
    return { selected: null, reason: 'no-eligible-candidate', eligible, ranked: [] };
  }

  const scored = input.policy.score(input.request, eligible);
  let best = scored[0];
  for (const candidate of scored) {
    if (compareCandidates(candidate, best) < 0) {
      best = candidate;
    }
  }

  return { selected: best, eligible, ranked: rankCandidates(scored, undefined) };
};
