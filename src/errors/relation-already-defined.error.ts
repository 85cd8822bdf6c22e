/**
 * Thrown at declaration time when a model declares two relations under the same name.
 *
 * @example
 * ```typescript
 * Person.referencesMany("cars");
 * Person.referencesMany("cars"); // throws RelationAlreadyDefinedError
 * ```
 */
export class RelationAlreadyDefinedError extends Error {
  public readonly relationName: string;

  public readonly modelName: string;

  public constructor(relationName: string, modelName: string) {
    super(`Relation "${relationName}" is already defined on ${modelName}.`);
    this.name = "RelationAlreadyDefinedError";
    this.relationName = relationName;
    this.modelName = modelName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RelationAlreadyDefinedError);
    }
  }
}
