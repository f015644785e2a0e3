import type { PlacementRecord } from '@vramfit/protocol';

export type PlacementQuery = {
  organizationId?: string;
  requesterId?: string;
  limit?: number;
};

/**
 * Persists stateful placements. A request may be evaluated more than once;
 * every evaluation is a new decision and the latest one wins on read.
 * `savePlacement` rejects with `RequestConflictError` when the requestId is
 * already stored with different content; the check and the write are atomic.
 */
export type DecisionStore = {
  savePlacement(record: PlacementRecord): Promise<void>;
  getPlacement(requestId: string): Promise<PlacementRecord | null>;
  listPlacements(query?: PlacementQuery): Promise<PlacementRecord[]>;
};

export const DEFAULT_LIST_LIMIT = 100;
