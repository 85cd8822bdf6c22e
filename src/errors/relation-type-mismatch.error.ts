/**
 * Thrown when a record of the wrong type is assigned to, or added to, a relation.
 */
export class RelationTypeMismatchError extends Error {
  public readonly relationName: string;

  /** Declared target type name */
  public readonly expected: string;

  /** Runtime type name of the rejected record */
  public readonly received: string;

  public constructor(relationName: string, expected: string, received: string) {
    super(`Relation "${relationName}" expects ${expected}, got ${received}.`);
    this.name = "RelationTypeMismatchError";
    this.relationName = relationName;
    this.expected = expected;
    this.received = received;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RelationTypeMismatchError);
    }
  }
}
