/**
 * Thrown when a finder option cannot be honored because the relation's
 * foreign keys are a plain id list stored on the owner.
 */
export class UnsupportedFinderOptionError extends Error {
  /**
   * The rejected option names.
   */
  public readonly options: string[];

  public readonly modelName: string;

  public constructor(options: string[], modelName: string) {
    super(
      `Unsupported finder option(s) ${options.join(", ")} for ${modelName}: foreign keys are stored in the owner.`,
    );
    this.name = "UnsupportedFinderOptionError";
    this.options = options;
    this.modelName = modelName;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnsupportedFinderOptionError);
    }
  }
}
