import { stableDigest } from '@vramfit/protocol';
import type { Decision, PlacementRecord, ResourceRequest } from '@vramfit/protocol';
import { RequestConflictError } from '../errors';
import { DEFAULT_LIST_LIMIT } from './types';
import type { DecisionStore, PlacementQuery } from './types';

const newestFirst = (a: Decision, b: Decision): number => b.createdAtMs - a.createdAtMs;

export class InMemoryDecisionStore implements DecisionStore {
  private requests = new Map<string, ResourceRequest>();
  private decisions: Decision[] = [];

  async savePlacement(record: PlacementRecord): Promise<void> {
    if (this.decisions.some((entry) => entry.decisionId === record.decision.decisionId)) {
      throw new Error(`decision ${record.decision.decisionId} already stored`);
    }
    const existing = this.requests.get(record.request.requestId);
    if (existing && stableDigest(existing) !== stableDigest(record.request)) {
      throw new RequestConflictError(record.request.requestId);
    }
    if (!existing) {
      this.requests.set(record.request.requestId, record.request);
    }
    this.decisions.push(record.decision);
  }

  async getPlacement(requestId: string): Promise<PlacementRecord | null> {
    const request = this.requests.get(requestId);
    if (!request) {
      return null;
    }
    // Later pushes win ties on createdAtMs.
    let latest: Decision | undefined;
    for (const decision of this.decisions) {
      if (decision.requestId === requestId && (!latest || decision.createdAtMs >= latest.createdAtMs)) {
        latest = decision;
      }
    }
    return latest ? { request, decision: latest } : null;
  }

  async listPlacements(query: PlacementQuery = {}): Promise<PlacementRecord[]> {
    const limit = query.limit ?? DEFAULT_LIST_LIMIT;
    const records: PlacementRecord[] = [];
    for (const decision of [...this.decisions].reverse().sort(newestFirst)) {
      const request = this.requests.get(decision.requestId);
      if (!request) {
        continue;
      }
      if (query.organizationId !== undefined && request.organizationId !== query.organizationId) {
        continue;
      }
      if (query.requesterId !== undefined && request.requesterId !== query.requesterId) {
        continue;
      }
      records.push({ request, decision });
      if (records.length >= limit) {
        break;
      }
    }
    return records;
  }
}
