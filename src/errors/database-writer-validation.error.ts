import { colors } from "@mongez/copper";
import type { ValidationResult } from "@warlock.js/seal";

type FieldError = {
  error: string;
  type?: string;
};

/**
 * Error thrown when a record fails validation while being saved.
 *
 * Relation mutations never throw it: an invalid candidate makes `add()` return
 * an unsuccessful result instead.
 *
 * @example
 * ```typescript
 * try {
 *   await new Car({}).save();
 * } catch (error) {
 *   if (error instanceof DatabaseWriterValidationError) {
 *     error.hasFieldError("name"); // true
 *   }
 * }
 * ```
 */
export class DatabaseWriterValidationError extends Error {
  /**
   * Validation errors reported by @warlock.js/seal.
   */
  public readonly errors: ValidationResult["errors"];

  public constructor(message: string, errors: ValidationResult["errors"]) {
    super(message);
    this.name = "DatabaseWriterValidationError";
    this.errors = errors;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatabaseWriterValidationError);
    }
  }

  [Symbol.for("nodejs.util.inspect.custom")](): string {
    return this.toString();
  }

  /**
   * Colored, field by field breakdown of the validation errors.
   */
  public toString(): string {
    const modelMatch = this.message.match(/\[(\w+)\s+Model\]/);
    const modelName = modelMatch ? modelMatch[1] : "Model";
    const operation = this.message.includes("Insert") ? "Insert" : "Update";

    const lines: string[] = ["", colors.red(`❌ Validation Error: ${modelName} (${operation})`), ""];

    const errorsByField = new Map<string, FieldError[]>();

    for (const err of this.errors) {
      const fieldName = err.input || "unknown";
      const fieldErrors = errorsByField.get(fieldName) ?? [];

      fieldErrors.push({ error: err.error, type: err.type });
      errorsByField.set(fieldName, fieldErrors);
    }

    for (const [fieldName, fieldErrors] of errorsByField) {
      lines.push(colors.yellow(`  Field: ${fieldName}`));

      for (const fieldError of fieldErrors) {
        lines.push(colors.white(`  Error: ${fieldError.error}`));

        if (fieldError.type) {
          lines.push(colors.cyan(`  Type:  ${fieldError.type}`));
        }
      }

      lines.push("");
    }

    return lines.join("\n");
  }

  public getFieldErrors(fieldPath: string): ValidationResult["errors"] {
    return this.errors.filter((err) => err.input === fieldPath);
  }

  public hasFieldError(fieldPath: string): boolean {
    return this.errors.some((err) => err.input === fieldPath);
  }
}
