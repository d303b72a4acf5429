import type { RelationFailure } from './types.js';

export class RelationError extends Error {
  readonly failure: RelationFailure;

  constructor(failure: RelationFailure) {
    super(failure.status.message);
    this.name = 'RelationError';
    this.failure = failure;
  }
}

export class StateStoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StateStoreError';
  }
}
