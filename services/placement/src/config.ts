import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import type { NodeCategory, ScoringPolicyName } from '@vramfit/protocol';

export type HeadroomWeights = {
  headroom: number;
  bandwidth: number;
  latency: number;
};

export type MarketplaceWeights = {
  proximityCap: number;
  proximityRangeKm: number;
  preferLocalMultiplier: number;
  priceCap: number;
  reliabilityCap: number;
  capacityCap: number;
  capacityRatioWeight: number;
  nodeTypeBonus: number;
  bonusCategory: NodeCategory;
};

export type PlacementDbConfig = {
  url: string;
  ssl?: boolean;
};

export type PlacementConfig = {
  serviceId: string;
  endpoint: string;
  port: number;
  policy: ScoringPolicyName;
  headroomWeights: HeadroomWeights;
  marketplaceWeights: MarketplaceWeights;
  defaultDurationSec: number;
  restrictToOrganization: boolean;
  matchesTopK: number;
  maxRequestBytes?: number;
  apiKeys?: string[];
  quoteRateLimitMax?: number;
  quoteRateLimitWindowMs?: number;
  nodesPath?: string;
  modelProfilesPath?: string;
  db?: PlacementDbConfig;
};

export const defaultHeadroomWeights: HeadroomWeights = {
  headroom: 0.5,
  bandwidth: 0.3,
  latency: 0.2,
};

export const defaultMarketplaceWeights: MarketplaceWeights = {
  proximityCap: 100,
  proximityRangeKm: 1000,
  preferLocalMultiplier: 3,
  priceCap: 50,
  reliabilityCap: 50,
  capacityCap: 30,
  capacityRatioWeight: 10,
  nodeTypeBonus: 20,
  bonusCategory: 'volunteer',
};

export const defaultPlacementConfig: PlacementConfig = {
  serviceId: 'placement-1',
  endpoint: 'http://localhost:8080',
  port: 8080,
  policy: 'headroom',
  headroomWeights: defaultHeadroomWeights,
  marketplaceWeights: defaultMarketplaceWeights,
  defaultDurationSec: 3600,
  restrictToOrganization: false,
  matchesTopK: 10,
  maxRequestBytes: 64 * 1024,
  apiKeys: undefined,
  quoteRateLimitMax: undefined,
  quoteRateLimitWindowMs: undefined,
};

export type Env = Record<string, string | undefined>;

export const parseList = (value?: string): string[] | undefined => {
  return value
    ?.split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

export const parseNumber = (value?: string, float = false): number | undefined => {
  if (!value) return undefined;
  const parsed = float ? Number.parseFloat(value) : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) return fallback;
  return value.toLowerCase() === 'true';
};

const parsePolicy = (value?: string): ScoringPolicyName | undefined => {
  if (value === 'headroom' || value === 'marketplace') {
    return value;
  }
  return undefined;
};

const parseCategory = (value?: string): NodeCategory | undefined => {
  if (value === 'datacenter' || value === 'edge_cluster' || value === 'volunteer') {
    return value;
  }
  return undefined;
};

export const buildConfig = (env: Env): PlacementConfig => {
  const defaults = defaultPlacementConfig;
  const headroom = defaults.headroomWeights;
  const market = defaults.marketplaceWeights;
  const dbUrl = env.PLACEMENT_DB_URL;

  return {
    ...defaults,
    serviceId: env.PLACEMENT_ID ?? defaults.serviceId,
    endpoint: env.PLACEMENT_ENDPOINT ?? defaults.endpoint,
    port: parseNumber(env.PLACEMENT_PORT) ?? defaults.port,
    policy: parsePolicy(env.PLACEMENT_POLICY) ?? defaults.policy,
    headroomWeights: {
      headroom: parseNumber(env.PLACEMENT_W_HEADROOM, true) ?? headroom.headroom,
      bandwidth: parseNumber(env.PLACEMENT_W_BANDWIDTH, true) ?? headroom.bandwidth,
      latency: parseNumber(env.PLACEMENT_W_LATENCY, true) ?? headroom.latency,
    },
    marketplaceWeights: {
      proximityCap: parseNumber(env.PLACEMENT_PROXIMITY_CAP, true) ?? market.proximityCap,
      proximityRangeKm: parseNumber(env.PLACEMENT_PROXIMITY_RANGE_KM, true) ?? market.proximityRangeKm,
      preferLocalMultiplier:
        parseNumber(env.PLACEMENT_PREFER_LOCAL_MULTIPLIER, true) ?? market.preferLocalMultiplier,
      priceCap: parseNumber(env.PLACEMENT_PRICE_CAP, true) ?? market.priceCap,
      reliabilityCap: parseNumber(env.PLACEMENT_RELIABILITY_CAP, true) ?? market.reliabilityCap,
      capacityCap: parseNumber(env.PLACEMENT_CAPACITY_CAP, true) ?? market.capacityCap,
      capacityRatioWeight:
        parseNumber(env.PLACEMENT_CAPACITY_RATIO_WEIGHT, true) ?? market.capacityRatioWeight,
      nodeTypeBonus: parseNumber(env.PLACEMENT_NODE_TYPE_BONUS, true) ?? market.nodeTypeBonus,
      bonusCategory: parseCategory(env.PLACEMENT_BONUS_CATEGORY) ?? market.bonusCategory,
    },
    defaultDurationSec: parseNumber(env.PLACEMENT_DEFAULT_DURATION_SEC) ?? defaults.defaultDurationSec,
    restrictToOrganization: parseBoolean(env.PLACEMENT_RESTRICT_TO_ORG, defaults.restrictToOrganization),
    matchesTopK: parseNumber(env.PLACEMENT_MATCHES_TOP_K) ?? defaults.matchesTopK,
    maxRequestBytes: parseNumber(env.PLACEMENT_MAX_REQUEST_BYTES) ?? defaults.maxRequestBytes,
    apiKeys: parseList(env.PLACEMENT_API_KEYS),
    quoteRateLimitMax: parseNumber(env.PLACEMENT_QUOTE_RATE_LIMIT_MAX),
    quoteRateLimitWindowMs: parseNumber(env.PLACEMENT_QUOTE_RATE_LIMIT_WINDOW_MS),
    nodesPath: env.PLACEMENT_NODES_PATH,
    modelProfilesPath: env.PLACEMENT_MODEL_PROFILES_PATH,
    db: dbUrl ? { url: dbUrl, ssl: parseBoolean(env.PLACEMENT_DB_SSL, false) } : undefined,
  };
};

const dynamicConfigSchema = z
  .object({
    serviceId: z.string().min(1),
    endpoint: z.string().min(1),
    port: z.number().int().nonnegative(),
    policy: z.enum(['headroom', 'marketplace']),
    headroomWeights: z
      .object({ headroom: z.number(), bandwidth: z.number(), latency: z.number() })
      .partial(),
    marketplaceWeights: z
      .object({
        proximityCap: z.number(),
        proximityRangeKm: z.number(),
        preferLocalMultiplier: z.number(),
        priceCap: z.number(),
        reliabilityCap: z.number(),
        capacityCap: z.number(),
        capacityRatioWeight: z.number(),
        nodeTypeBonus: z.number(),
        bonusCategory: z.enum(['datacenter', 'edge_cluster', 'volunteer']),
      })
      .partial(),
    defaultDurationSec: z.number(),
    restrictToOrganization: z.boolean(),
    matchesTopK: z.number().int(),
    maxRequestBytes: z.number().int(),
    apiKeys: z.array(z.string()),
    quoteRateLimitMax: z.number().int(),
    quoteRateLimitWindowMs: z.number().int(),
    nodesPath: z.string(),
    modelProfilesPath: z.string(),
  })
  .partial()
  .strict();

export type DynamicConfig = z.infer<typeof dynamicConfigSchema>;

/**
 * Optional JSON override file. Weight blocks are merged field by field, so a
 * file may name a single weight.
 */
export const loadDynamicConfig = (path = 'config.json'): DynamicConfig => {
  if (!existsSync(path)) {
    return {};
  }
  const parsed = dynamicConfigSchema.safeParse(JSON.parse(readFileSync(path, 'utf8')));
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`);
    throw new Error(`invalid ${path}: ${details.join('; ')}`);
  }
  return parsed.data;
};

export const mergeConfig = (base: PlacementConfig, override: DynamicConfig): PlacementConfig => ({
  ...base,
  ...override,
  headroomWeights: { ...base.headroomWeights, ...override.headroomWeights },
  marketplaceWeights: { ...base.marketplaceWeights, ...override.marketplaceWeights },
});

export const validateConfig = (config: PlacementConfig): string[] => {
  const issues: string[] = [];
  if (!Number.isInteger(config.port) || config.port < 0) issues.push('PLACEMENT_PORT must be a port number.');
  if (config.defaultDurationSec <= 0) issues.push('PLACEMENT_DEFAULT_DURATION_SEC must be positive.');
  if (config.matchesTopK <= 0) issues.push('PLACEMENT_MATCHES_TOP_K must be positive.');
  if (config.marketplaceWeights.proximityRangeKm <= 0) {
    issues.push('PLACEMENT_PROXIMITY_RANGE_KM must be positive.');
  }
  const weights = [
    ...Object.values(config.headroomWeights),
    config.marketplaceWeights.proximityCap,
    config.marketplaceWeights.preferLocalMultiplier,
    config.marketplaceWeights.priceCap,
    config.marketplaceWeights.reliabilityCap,
    config.marketplaceWeights.capacityCap,
    config.marketplaceWeights.capacityRatioWeight,
    config.marketplaceWeights.nodeTypeBonus,
  ];
  if (weights.some((weight) => !Number.isFinite(weight) || weight < 0)) {
    issues.push('scoring weights must be finite and non-negative.');
  }
  return issues;
};
