/**
 * Writer service contract for persisting models.
 *
 * The writer orchestrates the complete save pipeline:
 * 1. Validation (via @warlock.js/seal)
 * 2. Id generation (for new records)
 * 3. Event emission (saving, validating, validated, creating/updating, saved, created/updated)
 * 4. Driver execution (insert or partial update)
 * 5. Post-save cleanup (reset dirty tracker, commit embedded relations, update `isNew`)
 */
export interface WriterContract {
  /**
   * Insert the model when it is new, otherwise write its changes.
   *
   * @throws {DatabaseWriterValidationError} If validation fails
   */
  save(options?: WriterOptions): Promise<WriterResult>;
}

/**
 * Options for controlling the save operation.
 */
export type WriterOptions = {
  /**
   * Skip validation and casting.
   *
   * @default false
   */
  skipValidation?: boolean;

  /**
   * Skip lifecycle event emission.
   *
   * @default false
   */
  skipEvents?: boolean;
};

/**
 * Result returned after a save operation.
 */
export type WriterResult = {
  /**
   * Whether the save operation succeeded.
   */
  success: boolean;

  /**
   * The saved attributes.
   */
  document: Record<string, unknown>;

  /**
   * Whether this was an insert operation.
   */
  isNew: boolean;

  /**
   * Number of rows modified (for updates only).
   */
  modifiedCount?: number;
};
