/**
 * Options for generating a new id.
 */
export type GenerateIdOptions = {
  /** The table name */
  table: string;
  /** Initial id value for the first record (default: 1) */
  initialId?: number;
  /** Amount to increment by for each new record (default: 1) */
  incrementIdBy?: number;
};

/**
 * Contract for drivers that generate sequential ids themselves.
 *
 * Generated ids are numbers; models store them as strings.
 *
 * @example
 * ```typescript
 * const idGenerator = dataSource.idGenerator;
 *
 * if (idGenerator) {
 *   const id = await idGenerator.generateNextId({ table: "people" });
 * }
 * ```
 */
export interface IdGeneratorContract {
  /**
   * Generate the next id for a table.
   */
  generateNextId(options: GenerateIdOptions): Promise<number>;

  /**
   * Get the last generated id for a table, 0 when none was generated yet.
   */
  getLastId(table: string): Promise<number>;

  /**
   * Set the last generated id for a table.
   */
  setLastId(table: string, id: number): Promise<void>;
}
