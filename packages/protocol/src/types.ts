export type GeoPoint = {
  latitude: number;
  longitude: number;
};

export type Priority = 'normal' | 'high';

export type NodeCategory = 'datacenter' | 'edge_cluster' | 'volunteer';

export type ResourceRequest = {
  readonly requestId: string;
  readonly requesterId: string;
  readonly organizationId?: string;
  readonly modelName?: string;
  readonly requiredPrimaryGb: number;
  readonly requiredSecondaryGb?: number;
  readonly preferredRegion?: string;
  readonly location?: Readonly<GeoPoint>;
  readonly maxDistanceKm?: number;
  readonly maxPricePerGbSec?: number;
  readonly priority: Priority;
  readonly preferLocal: boolean;
  readonly minReliability?: number;
  readonly durationSec?: number;
};

/**
 * Wire shape accepted from callers. `requiredPrimaryGb` may be omitted when
 * `modelName` resolves to a known model profile.
 */
export type PlacementRequestInput = {
  requestId?: string;
  organizationId?: string;
  modelName?: string;
  requiredPrimaryGb?: number;
  requiredSecondaryGb?: number;
  preferredRegion?: string;
  location?: GeoPoint;
  maxDistanceKm?: number;
  maxPricePerGbSec?: number;
  priority?: Priority;
  preferLocal?: boolean;
  minReliability?: number;
  durationSec?: number;
};

export type ModelCategory = 'llm' | 'diffusion' | 'other';

export type ModelProfile = {
  name: string;
  suggestedMinVramGb: number;
  suggestedBatchSize?: number;
  category: ModelCategory;
};

export type NodeSnapshot = {
  readonly nodeId: string;
  readonly name: string;
  readonly organizationId?: string;
  readonly category: NodeCategory;
  readonly location?: Readonly<GeoPoint>;
  readonly region: string;
  readonly primaryTotalGb: number;
  readonly primaryFreeGb: number;
  readonly secondaryTotalGb: number;
  readonly secondaryFreeGb: number;
  readonly bandwidthGbps?: number;
  readonly latencyMs?: number;
  readonly pricePerGbSec: number;
  readonly reliability: number;
  readonly active: boolean;
  readonly lastTelemetryMs?: number;
};

export type DirectorySnapshot = {
  readonly capturedAtMs: number;
  readonly nodes: readonly NodeSnapshot[];
};

export type ScoringPolicyName = 'headroom' | 'marketplace';

export type SubScoreName =
  | 'headroom'
  | 'bandwidth'
  | 'latency'
  | 'normalized'
  | 'proximity'
  | 'price'
  | 'reliability'
  | 'capacity'
  | 'nodeType';

export type SubScore = {
  name: SubScoreName;
  value: number;
  max?: number;
};

export type FilterCriterion =
  | 'snapshot'
  | 'active'
  | 'region'
  | 'organization'
  | 'primary'
  | 'secondary'
  | 'distance'
  | 'price'
  | 'reliability';

export type DecisionMode = 'stateful' | 'quote';

export type DecisionOutcome = 'selected' | 'no-eligible-candidate';

export type Decision = {
  readonly decisionId: string;
  readonly requestId: string;
  readonly mode: DecisionMode;
  readonly policy: ScoringPolicyName;
  readonly outcome: DecisionOutcome;
  readonly nodeId: string | null;
  readonly nodeName: string | null;
  readonly score: number;
  readonly subScores: readonly SubScore[];
  readonly justification: string;
  readonly headroomGb: number | null;
  readonly distanceKm: number | null;
  readonly estimatedCost: number | null;
  readonly eligibleCount: number;
  readonly eliminatedBy: FilterCriterion | null;
  readonly snapshotAtMs: number;
  readonly createdAtMs: number;
};

export type PlacementRecord = {
  request: ResourceRequest;
  decision: Decision;
};

export type CandidateMatch = {
  nodeId: string;
  nodeName: string;
  category: NodeCategory;
  region: string;
  score: number;
  subScores: SubScore[];
  distanceKm: number | null;
  estimatedCost: number;
  latencyMs: number;
};
