import type {
  NodeSnapshot,
  ResourceRequest,
  ScoringPolicyName,
  SubScore,
} from '@vramfit/protocol';

export type ScoredCandidate = {
  node: NodeSnapshot;
  score: number;
  subScores: SubScore[];
  distanceKm: number | null;
};

/**
 * A scoring strategy. `candidates` is the full eligible set for one request so
 * that set-relative terms (rescaling, price distribution) stay local to it.
 */
export type ScoringPolicy = {
  name: ScoringPolicyName;
  score(request: ResourceRequest, candidates: readonly NodeSnapshot[]): ScoredCandidate[];
};

export type SchedulingInput = {
  request: ResourceRequest;
  nodes: readonly NodeSnapshot[];
  policy: ScoringPolicy;
  restrictToOrganization?: boolean;
};

export type SchedulingResult =
  | {
      selected: ScoredCandidate;
      eligible: NodeSnapshot[];
      ranked: ScoredCandidate[];
    }
  | {
      selected: null;
      reason: 'no-eligible-candidate';
      eligible: NodeSnapshot[];
      ranked: ScoredCandidate[];
    };
