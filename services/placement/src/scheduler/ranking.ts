import type { ScoredCandidate } from './types';

/**
 * Total order over scored candidates: higher score, then higher reliability,
 * then lower price, then lower nodeId. Negative means `a` ranks first.
 */
export const compareCandidates = (a: ScoredCandidate, b: ScoredCandidate): number => {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.node.reliability !== b.node.reliability) {
    return b.node.reliability - a.node.reliability;
  }
  if (a.node.pricePerGbSec !== b.node.pricePerGbSec) {
    return a.node.pricePerGbSec - b.node.pricePerGbSec;
  }
  if (a.node.nodeId === b.node.nodeId) {
    return 0;
  }
  return a.node.nodeId < b.node.nodeId ? -1 : 1;
};

export const rankCandidates = (
  scored: readonly ScoredCandidate[],
  topK: number | undefined,
): ScoredCandidate[] => {
  const limit = topK && topK > 0 ? topK : scored.length;
  const ranked: ScoredCandidate[] = [];
  for (const candidate of scored) {
    let inserted = false;
    for (let i = 0; i < ranked.length; i += 1) {
      if (compareCandidates(candidate, ranked[i]) < 0) {
        ranked.splice(i, 0, candidate);
        inserted = true;
        break;
      }
    }
    if (!inserted) {
      ranked.push(candidate);
    }
    if (ranked.length > limit) {
      ranked.length = limit;
    }
  }
  return ranked;
};
