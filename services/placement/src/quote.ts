import { stableDigest } from '@vramfit/protocol';
import type { Decision, DirectorySnapshot, ResourceRequest } from '@vramfit/protocol';
import { evaluatePlacement } from './engine';
import type { EngineSettings } from './engine';

const QUOTE_ID_LENGTH = 32;

export const quoteDecisionId = (
  request: ResourceRequest,
  snapshot: DirectorySnapshot,
  settings: EngineSettings,
): string => {
  // Only the fields that influence scoring; callers may pass a full config.
  const { policy, headroomWeights, marketplaceWeights, defaultDurationSec, restrictToOrganization } = settings;
  const digest = stableDigest({
    request,
    snapshot,
    settings: { policy, headroomWeights, marketplaceWeights, defaultDurationSec, restrictToOrganization },
  });
  return `quote-${digest.slice(0, QUOTE_ID_LENGTH)}`;
};

/**
 * Stateless evaluation for external callers. The id is derived from the inputs
 * and the timestamp is the snapshot's capture time, so the same request
 * against the same snapshot yields the same decision.
 */
export const quotePlacement = (
  request: ResourceRequest,
  snapshot: DirectorySnapshot,
  settings: EngineSettings,
): Decision => {
  return evaluatePlacement(request, snapshot, settings, {
    mode: 'quote',
    decisionId: quoteDecisionId(request, snapshot, settings),
    nowMs: snapshot.capturedAtMs,
  }).decision;
};
