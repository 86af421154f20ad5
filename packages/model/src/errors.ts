/** Thrown when a plain record cannot be turned back into a model entity. */
export class RecordError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordError';
  }
}

/** Thrown when a tree edit would break the single-parent invariant. */
export class HierarchyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HierarchyError';
  }
}
