import { z } from 'zod';
import type {
  Decision,
  GeoPoint,
  ModelProfile,
  NodeSnapshot,
  PlacementRecord,
  PlacementRequestInput,
  ResourceRequest,
} from './types';

export type ValidationResult = { ok: true } | { ok: false; errors: string[] };

export type ParseResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

type Validator = (value: unknown) => ValidationResult;

type Parser<T> = (value: unknown) => ParseResult<T>;

const toErrors = (issues: z.ZodIssue[]): string[] => {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'value';
    return `${path}: ${issue.message}`;
  });
};

const parseWithSchema = <T>(schema: z.ZodType<T>, value: unknown): ParseResult<T> => {
  const result = schema.safeParse(value);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, errors: toErrors(result.error.issues) };
};

const validateWithSchema = <T>(schema: z.ZodType<T>, value: unknown): ValidationResult => {
  const result = parseWithSchema(schema, value);
  return result.ok ? { ok: true } : result;
};

const finite = () => z.number().finite();
const positive = () => finite().positive();
const nonNegative = () => finite().nonnegative();

const geoPointSchema: z.ZodType<GeoPoint> = z.object({
  latitude: finite().min(-90).max(90),
  longitude: finite().min(-180).max(180),
});

const prioritySchema = z.enum(['normal', 'high']);

const placementRequestInputSchema: z.ZodType<PlacementRequestInput> = z
  .object({
    requestId: z.string().min(1).optional(),
    organizationId: z.string().min(1).optional(),
    modelName: z.string().min(1).optional(),
    requiredPrimaryGb: positive().optional(),
    requiredSecondaryGb: positive().optional(),
    preferredRegion: z.string().min(1).optional(),
    location: geoPointSchema.optional(),
    maxDistanceKm: positive().optional(),
    maxPricePerGbSec: positive().optional(),
    priority: prioritySchema.optional(),
    preferLocal: z.boolean().optional(),
    minReliability: finite().min(0).max(100).optional(),
    durationSec: positive().optional(),
  })
  .strict();

const resourceRequestSchema: z.ZodType<ResourceRequest> = z.object({
  requestId: z.string().min(1),
  requesterId: z.string().min(1),
  organizationId: z.string().min(1).optional(),
  modelName: z.string().min(1).optional(),
  requiredPrimaryGb: positive(),
  requiredSecondaryGb: positive().optional(),
  preferredRegion: z.string().min(1).optional(),
  location: geoPointSchema.optional(),
  maxDistanceKm: positive().optional(),
  maxPricePerGbSec: positive().optional(),
  priority: prioritySchema,
  preferLocal: z.boolean(),
  minReliability: finite().min(0).max(100).optional(),
  durationSec: positive().optional(),
});

const modelProfileSchema: z.ZodType<ModelProfile> = z.object({
  name: z.string().min(1),
  suggestedMinVramGb: positive(),
  suggestedBatchSize: z.number().int().positive().optional(),
  category: z.enum(['llm', 'diffusion', 'other']),
});

const nodeSnapshotSchema: z.ZodType<NodeSnapshot> = z.object({
  nodeId: z.string().min(1),
  name: z.string().min(1),
  organizationId: z.string().min(1).optional(),
  category: z.enum(['datacenter', 'edge_cluster', 'volunteer']),
  location: geoPointSchema.optional(),
  region: z.string(),
  primaryTotalGb: nonNegative(),
  primaryFreeGb: nonNegative(),
  secondaryTotalGb: nonNegative(),
  secondaryFreeGb: nonNegative(),
  bandwidthGbps: nonNegative().optional(),
  latencyMs: nonNegative().optional(),
  pricePerGbSec: nonNegative(),
  reliability: finite().min(0).max(100),
  active: z.boolean(),
  lastTelemetryMs: finite().optional(),
});

const subScoreSchema = z.object({
  name: z.enum([
    'headroom',
    'bandwidth',
    'latency',
    'normalized',
    'proximity',
    'price',
    'reliability',
    'capacity',
    'nodeType',
  ]),
  value: finite(),
  max: finite().optional(),
});

const decisionSchema: z.ZodType<Decision> = z.object({
  decisionId: z.string().min(1),
  requestId: z.string().min(1),
  mode: z.enum(['stateful', 'quote']),
  policy: z.enum(['headroom', 'marketplace']),
  outcome: z.enum(['selected', 'no-eligible-candidate']),
  nodeId: z.string().nullable(),
  nodeName: z.string().nullable(),
  score: nonNegative(),
  subScores: z.array(subScoreSchema),
  justification: z.string().min(1),
  headroomGb: finite().nullable(),
  distanceKm: finite().nullable(),
  estimatedCost: finite().nullable(),
  eligibleCount: z.number().int().nonnegative(),
  eliminatedBy: z
    .enum([
      'snapshot',
      'active',
      'region',
      'organization',
      'primary',
      'secondary',
      'distance',
      'price',
      'reliability',
    ])
    .nullable(),
  snapshotAtMs: finite(),
  createdAtMs: finite(),
});

const placementRecordSchema: z.ZodType<PlacementRecord> = z.object({
  request: resourceRequestSchema,
  decision: decisionSchema,
});

export const validateResourceRequest: Validator = (value) =>
  validateWithSchema(resourceRequestSchema, value);

export const validateNodeSnapshot: Validator = (value) =>
  validateWithSchema(nodeSnapshotSchema, value);

export const validateDecision: Validator = (value) => validateWithSchema(decisionSchema, value);

export const parsePlacementRequestInput: Parser<PlacementRequestInput> = (value) =>
  parseWithSchema(placementRequestInputSchema, value);

export const parseResourceRequest: Parser<ResourceRequest> = (value) =>
  parseWithSchema(resourceRequestSchema, value);

export const parseModelProfiles: Parser<ModelProfile[]> = (value) =>
  parseWithSchema(z.array(modelProfileSchema), value);

export const parseNodeSnapshot: Parser<NodeSnapshot> = (value) =>
  parseWithSchema(nodeSnapshotSchema, value);

export const parseNodeSnapshots: Parser<NodeSnapshot[]> = (value) =>
  parseWithSchema(z.array(nodeSnapshotSchema), value);

export const parseDecision: Parser<Decision> = (value) => parseWithSchema(decisionSchema, value);

export const parsePlacementRecord: Parser<PlacementRecord> = (value) =>
  parseWithSchema(placementRecordSchema, value);
