/**
 * Thrown when a record id cannot be resolved.
 *
 * Relation proxies raise it from `find()`; `include()` converts it into `false`.
 */
export class RecordNotFoundError extends Error {
  /**
   * Name of the model that was looked up.
   */
  public readonly modelName: string;

  /**
   * The id that could not be found.
   */
  public readonly id: string;

  public constructor(modelName: string, id: string) {
    super(`Could not find ${modelName} with id=${id}`);
    this.name = "RecordNotFoundError";
    this.modelName = modelName;
    this.id = id;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RecordNotFoundError);
    }
  }
}
