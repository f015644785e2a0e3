export type PlacementErrorCode = 'invalid-request' | 'request-conflict' | 'snapshot-unavailable';

export class PlacementError extends Error {
  readonly code: PlacementErrorCode;
  readonly details: string[];

  constructor(code: PlacementErrorCode, message: string, details: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Rejected before filtering; never reaches scoring. */
export class InvalidRequestError extends PlacementError {
  constructor(details: string[]) {
    super('invalid-request', `invalid placement request: ${details.join('; ')}`, details);
  }
}

/** A caller-supplied requestId already names a different request. */
export class RequestConflictError extends PlacementError {
  constructor(requestId: string) {
    super('request-conflict', `request ${requestId} already exists with different parameters`);
  }
}

/** Raised by a node directory; the service passes it through untouched. */
export class SnapshotUnavailableError extends PlacementError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('snapshot-unavailable', message, [], options);
  }
}

export const isPlacementError = (error: unknown): error is PlacementError => {
  return error instanceof PlacementError;
};
