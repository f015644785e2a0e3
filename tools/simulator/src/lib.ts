import { defaultPlacementConfig, evaluatePlacement } from '@vramfit/placement';
import type { EngineSettings } from '@vramfit/placement';
import type {
  DirectorySnapshot,
  NodeCategory,
  NodeSnapshot,
  ResourceRequest,
  ScoringPolicyName,
} from '@vramfit/protocol';

export type SimulationConfig = {
  nodes: number;
  requests: number;
  seed: number;
  /** Requests evaluated against one snapshot before capacity is deducted. */
  batchSize: number;
  policy: ScoringPolicyName;
};

export type SimulationMetrics = {
  totalRequests: number;
  placedRequests: number;
  unplacedRequests: number;
  placementRate: number;
  overcommittedNodes: number;
  overcommittedGb: number;
  maxAssignmentsPerNode: number;
  avgScore: number;
  costPerRequestAvg: number;
  nodeUtilization: Record<string, number>;
};

export type BatchSweepResult = {
  batchSize: number;
  metrics: SimulationMetrics;
};

export type BatchSweepReport = {
  baseConfig: SimulationConfig;
  results: BatchSweepResult[];
};

const REGIONS = [
  { name: 'us-east-1', latitude: 38.9, longitude: -77.4 },
  { name: 'us-west-2', latitude: 45.5, longitude: -122.7 },
  { name: 'eu-central-1', latitude: 50.1, longitude: 8.7 },
];
const CATEGORIES: NodeCategory[] = ['datacenter', 'edge_cluster', 'volunteer'];
const GPU_SIZES_GB = [16, 24, 48, 80];

export const createRng = (seed: number): (() => number) => {
  let state = seed >>> 0 || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0xffffffff;
  };
};

const pick = <T>(rng: () => number, values: readonly T[]): T => {
  return values[Math.min(values.length - 1, Math.floor(rng() * values.length))];
};

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export const generateNodes = (count: number, rng: () => number): NodeSnapshot[] => {
  const nodes: NodeSnapshot[] = [];
  for (let i = 0; i < count; i += 1) {
    const region = pick(rng, REGIONS);
    const gpus = 1 + Math.floor(rng() * 4);
    const primaryTotalGb = pick(rng, GPU_SIZES_GB) * gpus;
    const secondaryTotalGb = primaryTotalGb * 4;
    nodes.push({
      nodeId: `node-${i + 1}`,
      name: `sim-${region.name}-${i + 1}`,
      category: pick(rng, CATEGORIES),
      region: region.name,
      location: {
        latitude: round(region.latitude + (rng() - 0.5) * 4, 4),
        longitude: round(region.longitude + (rng() - 0.5) * 4, 4),
      },
      primaryTotalGb,
      primaryFreeGb: round(primaryTotalGb * (0.2 + rng() * 0.8), 1),
      secondaryTotalGb,
      secondaryFreeGb: round(secondaryTotalGb * rng(), 1),
      bandwidthGbps: round(500 + rng() * 3000, 0),
      latencyMs: round(1 + rng() * 20, 1),
      pricePerGbSec: round(0.00001 + rng() * 0.0001, 7),
      reliability: round(70 + rng() * 30, 1),
      active: rng() > 0.05,
    });
  }
  return nodes;
};

export const generateRequests = (count: number, rng: () => number): ResourceRequest[] => {
  const requests: ResourceRequest[] = [];
  for (let i = 0; i < count; i += 1) {
    const region = pick(rng, REGIONS);
    requests.push({
      requestId: `req-${i + 1}`,
      requesterId: `tenant-${1 + Math.floor(rng() * 5)}`,
      requiredPrimaryGb: pick(rng, [8, 16, 24, 40, 80]),
      preferredRegion: rng() < 0.3 ? region.name : undefined,
      location: { latitude: region.latitude, longitude: region.longitude },
      priority: 'normal',
      preferLocal: rng() < 0.5,
    });
  }
  return requests;
};

const engineSettings = (policy: ScoringPolicyName): EngineSettings => ({
  ...defaultPlacementConfig,
  policy,
});

/**
 * Replays requests in batches. Every request in a batch sees the same
 * snapshot and capacity is only deducted once the batch is decided, which is
 * how concurrent callers behave without a reservation layer.
 */
const runSimulationWith = (
  nodes: NodeSnapshot[],
  requests: ResourceRequest[],
  config: SimulationConfig,
): SimulationMetrics => {
  const settings = engineSettings(config.policy);
  const batchSize = Math.max(1, Math.floor(config.batchSize));
  const free = new Map(nodes.map((node) => [node.nodeId, node.primaryFreeGb]));
  const committedGb = new Map<string, number>();
  const assignments = new Map<string, number>();
  let placed = 0;
  let totalCost = 0;
  let totalScore = 0;

  for (let start = 0; start < requests.length; start += batchSize) {
    const snapshot: DirectorySnapshot = {
      capturedAtMs: start,
      nodes: nodes.map((node) => ({ ...node, primaryFreeGb: Math.max(0, free.get(node.nodeId) ?? 0) })),
    };
    const claims: Array<{ nodeId: string; gb: number }> = [];

    for (const request of requests.slice(start, start + batchSize)) {
      const { decision } = evaluatePlacement(request, snapshot, settings, {
        mode: 'stateful',
        decisionId: `sim-${request.requestId}`,
        nowMs: start,
      });
      if (decision.nodeId === null) {
        continue;
      }
      placed += 1;
      totalCost += decision.estimatedCost ?? 0;
      totalScore += decision.score;
      assignments.set(decision.nodeId, (assignments.get(decision.nodeId) ?? 0) + 1);
      claims.push({ nodeId: decision.nodeId, gb: request.requiredPrimaryGb });
    }

    for (const claim of claims) {
      free.set(claim.nodeId, (free.get(claim.nodeId) ?? 0) - claim.gb);
      committedGb.set(claim.nodeId, (committedGb.get(claim.nodeId) ?? 0) + claim.gb);
    }
  }

  let overcommittedNodes = 0;
  let overcommittedGb = 0;
  const utilization: Record<string, number> = {};
  for (const node of nodes) {
    const remaining = free.get(node.nodeId) ?? 0;
    if (remaining < 0) {
      overcommittedNodes += 1;
      overcommittedGb += -remaining;
    }
    utilization[node.nodeId] =
      node.primaryTotalGb > 0 ? (committedGb.get(node.nodeId) ?? 0) / node.primaryTotalGb : 0;
  }

  return {
    totalRequests: requests.length,
    placedRequests: placed,
    unplacedRequests: requests.length - placed,
    placementRate: requests.length === 0 ? 0 : placed / requests.length,
    overcommittedNodes,
    overcommittedGb: round(overcommittedGb, 1),
    maxAssignmentsPerNode: [...assignments.values()].reduce((high, count) => Math.max(high, count), 0),
    avgScore: placed === 0 ? 0 : totalScore / placed,
    costPerRequestAvg: placed === 0 ? 0 : totalCost / placed,
    nodeUtilization: utilization,
  };
};

export const runSimulation = (config: SimulationConfig): SimulationMetrics => {
  const rng = createRng(config.seed);
  const nodes = generateNodes(config.nodes, rng);
  const requests = generateRequests(config.requests, rng);
  return runSimulationWith(nodes, requests, config);
};

/** Same pool and workload at several batch sizes. */
export const runBatchSweep = (config: SimulationConfig, batchSizes: number[]): BatchSweepReport => {
  const rng = createRng(config.seed);
  const nodes = generateNodes(config.nodes, rng);
  const requests = generateRequests(config.requests, rng);

  return {
    baseConfig: config,
    results: batchSizes.map((batchSize) => ({
      batchSize,
      metrics: runSimulationWith(nodes, requests, { ...config, batchSize }),
    })),
  };
};

export const formatMarkdownSummary = (metrics: SimulationMetrics): string => {
  return `# Placement Simulation Summary\n\n` +
    `- Total requests: ${metrics.totalRequests}\n` +
    `- Placed requests: ${metrics.placedRequests}\n` +
    `- Unplaced requests: ${metrics.unplacedRequests}\n` +
    `- Placement rate: ${(metrics.placementRate * 100).toFixed(2)}%\n` +
    `- Over-committed nodes: ${metrics.overcommittedNodes} (${metrics.overcommittedGb.toFixed(1)} GB)\n` +
    `- Max assignments on one node: ${metrics.maxAssignmentsPerNode}\n` +
    `- Avg fit score: ${metrics.avgScore.toFixed(2)}\n` +
    `- Avg estimated cost: ${metrics.costPerRequestAvg.toFixed(6)}\n`;
};

export const formatSweepSummary = (report: BatchSweepReport): string => {
  const lines = ['# Batch Size Sweep', ''];
  for (const result of report.results) {
    lines.push(
      `- batch ${result.batchSize}: placed ${(result.metrics.placementRate * 100).toFixed(2)}%, ` +
        `over-committed ${result.metrics.overcommittedNodes} nodes / ${result.metrics.overcommittedGb.toFixed(1)} GB`,
    );
  }
  return lines.join('\n');
};
