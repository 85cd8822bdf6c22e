/**
 * Remover service contract for deleting models.
 */
export interface RemoverContract {
  /**
   * Delete the model's row.
   *
   * Embedded records are detached from their owner and the owner is saved instead.
   *
   * @throws {Error} If the model was never saved or its row is missing
   */
  destroy(options?: RemoverOptions): Promise<RemoverResult>;
}

/**
 * Options for controlling the delete operation.
 */
export type RemoverOptions = {
  /**
   * Skip lifecycle event emission.
   *
   * @default false
   */
  skipEvents?: boolean;
};

/**
 * Result returned after a delete operation.
 */
export type RemoverResult = {
  success: boolean;
  deletedCount: number;
  /** Whether the record was removed from its owner's embedded collection */
  embedded: boolean;
};
