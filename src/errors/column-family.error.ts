/**
 * Thrown for invalid column family declarations.
 */
export class ColumnFamilyError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = "ColumnFamilyError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ColumnFamilyError);
    }
  }
}
