export class EngineError extends Error {
  constructor(message: string, public readonly code: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when a classification built against one snapshot generation reaches
 * retrieval with another. Requests must never mix generations.
 */
export class StaleSnapshotError extends EngineError {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(`Snapshot generation changed mid-request (expected ${expected}, got ${actual})`, 'STALE_SNAPSHOT', 500);
  }
}

export class SnapshotIntegrityError extends EngineError {
  constructor(message: string, public readonly violations: string[] = []) {
    super(message, 'SNAPSHOT_INTEGRITY', 500);
  }
}

export class SnapshotUnavailableError extends EngineError {
  constructor() {
    super('No dataset snapshot has been loaded yet', 'SNAPSHOT_UNAVAILABLE', 503);
  }
}
