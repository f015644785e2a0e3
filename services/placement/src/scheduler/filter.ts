import { distanceKm } from '@vramfit/protocol';
import type { FilterCriterion, NodeSnapshot, ResourceRequest } from '@vramfit/protocol';

export type FilterOptions = {
  restrictToOrganization?: boolean;
};

type Criterion = {
  name: Exclude<FilterCriterion, 'snapshot'>;
  applies: (request: ResourceRequest, options: FilterOptions) => boolean;
  accepts: (node: NodeSnapshot, request: ResourceRequest) => boolean;
};

export const formatGb = (value: number): string => value.toFixed(1);

const nodeDistanceKm = (node: NodeSnapshot, request: ResourceRequest): number | null => {
  if (!request.location || !node.location) {
    return null;
  }
  return distanceKm(request.location, node.location);
};

// Order matters only for explainElimination; eligibility is the conjunction.
const CRITERIA: Criterion[] = [
  {
    name: 'active',
    applies: () => true,
    accepts: (node) => node.active,
  },
  {
    name: 'region',
    applies: (request) => request.preferredRegion !== undefined,
    accepts: (node, request) => node.region === request.preferredRegion,
  },
  {
    name: 'organization',
    applies: (request, options) => Boolean(options.restrictToOrganization && request.organizationId),
    accepts: (node, request) => node.organizationId === request.organizationId,
  },
  {
    name: 'primary',
    applies: () => true,
    accepts: (node, request) => node.primaryFreeGb >= request.requiredPrimaryGb,
  },
  {
    name: 'secondary',
    applies: (request) => request.requiredSecondaryGb !== undefined,
    accepts: (node, request) => node.secondaryFreeGb >= (request.requiredSecondaryGb ?? 0),
  },
  {
    name: 'distance',
    applies: (request) => request.location !== undefined && request.maxDistanceKm !== undefined,
    accepts: (node, request) => {
      const km = nodeDistanceKm(node, request);
      return km !== null && km <= (request.maxDistanceKm ?? Infinity);
    },
  },
  {
    name: 'price',
    applies: (request) => request.maxPricePerGbSec !== undefined,
    accepts: (node, request) => node.pricePerGbSec <= (request.maxPricePerGbSec ?? Infinity),
  },
  {
    name: 'reliability',
    applies: (request) => request.minReliability !== undefined,
    accepts: (node, request) => node.reliability >= (request.minReliability ?? 0),
  },
];

const activeCriteria = (request: ResourceRequest, options: FilterOptions): Criterion[] => {
  return CRITERIA.filter((criterion) => criterion.applies(request, options));
};

export const isEligible = (
  node: NodeSnapshot,
  request: ResourceRequest,
  options: FilterOptions = {},
): boolean => {
  return activeCriteria(request, options).every((criterion) => criterion.accepts(node, request));
};

export const filterEligibleNodes = (
  request: ResourceRequest,
  nodes: readonly NodeSnapshot[],
  options: FilterOptions = {},
): NodeSnapshot[] => {
  const criteria = activeCriteria(request, options);
  return nodes.filter((node) => criteria.every((criterion) => criterion.accepts(node, request)));
};

export type Elimination = {
  criterion: FilterCriterion;
  message: string;
};

const maxOf = (values: number[]): number => values.reduce((best, value) => Math.max(best, value), 0);
const minOf = (values: number[]): number => values.reduce((best, value) => Math.min(best, value), Infinity);

const describe = (
  criterion: Criterion['name'],
  request: ResourceRequest,
  survivors: NodeSnapshot[],
): string => {
  const inRegion = request.preferredRegion ? ` in region '${request.preferredRegion}'` : '';
  switch (criterion) {
    case 'active':
      return 'no active node in the directory snapshot';
    case 'region':
      return `no active node in region '${request.preferredRegion ?? ''}'`;
    case 'organization':
      return `no active node${inRegion} belongs to organization '${request.organizationId ?? ''}'`;
    case 'primary':
      return (
        `no active node${inRegion} has >= ${formatGb(request.requiredPrimaryGb)} GB primary free ` +
        `(largest available: ${formatGb(maxOf(survivors.map((node) => node.primaryFreeGb)))} GB)`
      );
    case 'secondary':
      return (
        `no active node${inRegion} with enough primary capacity has >= ` +
        `${formatGb(request.requiredSecondaryGb ?? 0)} GB secondary free ` +
        `(largest available: ${formatGb(maxOf(survivors.map((node) => node.secondaryFreeGb)))} GB)`
      );
    case 'distance': {
      const distances = survivors
        .map((node) => nodeDistanceKm(node, request))
        .filter((km): km is number => km !== null);
      const nearest =
        distances.length > 0
          ? `nearest: ${minOf(distances).toFixed(1)} km`
          : 'no candidate reports a location';
      return `no node with enough capacity lies within ${request.maxDistanceKm ?? 0} km of the requested location (${nearest})`;
    }
    case 'price': {
      const cheapest = minOf(survivors.map((node) => node.pricePerGbSec));
      return `no node with enough capacity is priced at or below ${request.maxPricePerGbSec ?? 0} per GB-second (cheapest: ${cheapest})`;
    }
    case 'reliability': {
      const best = maxOf(survivors.map((node) => node.reliability));
      return `no node with enough capacity has reliability >= ${request.minReliability ?? 0} (best: ${best})`;
    }
  }
};

/**
 * Names the criterion that removed the last remaining candidate, applying the
 * criteria one at a time. Returns null when at least one node is eligible.
 */
export const explainElimination = (
  request: ResourceRequest,
  nodes: readonly NodeSnapshot[],
  options: FilterOptions = {},
): Elimination | null => {
  if (nodes.length === 0) {
    return { criterion: 'snapshot', message: 'node directory snapshot contains no nodes' };
  }
  let survivors = [...nodes];
  for (const criterion of activeCriteria(request, options)) {
    const next = survivors.filter((node) => criterion.accepts(node, request));
    if (next.length === 0) {
      return { criterion: criterion.name, message: describe(criterion.name, request, survivors) };
    }
    survivors = next;
  }
  return null;
};
