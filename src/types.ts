import type { MongoClientOptions } from "mongodb";

export type DatabaseConfigurations = {
  /**
   * Database host
   */
  host?: string;
  /**
   * Database port
   */
  port?: number;
  /**
   * Database username
   */
  username?: string;
  /**
   * Database password
   */
  password?: string;
  /**
   * Database name
   */
  database?: string;
  /**
   * Database URL string
   */
  url?: string;
  /**
   * Debug level
   * Could be one of the following values: `error`, `warn`, `info`
   * @default `warn`
   */
  debugLevel?: DebugLevel;
  /**
   * Model configurations
   */
  model?: {
    /**
     * Define the initial value of the id
     *
     * @default 1
     */
    initialId?: number;
    /**
     * Define the amount to be incremented by for the next generated id
     *
     * @default 1
     */
    autoIncrementBy?: number;
  };
  /**
   * Relation proxies configurations
   */
  relations?: {
    /**
     * Number of records fetched per batch by `findInBatches` and `findEach`
     *
     * @default 1000
     */
    batchSize?: number;
  };
} & Partial<MongoClientOptions>;

export type DebugLevel = "error" | "warn" | "info";

/**
 * How unknown attributes are handled when a model is validated.
 *
 * - `strip`: drop attributes the schema does not declare
 * - `fail`: reject the record
 * - `allow`: keep them as they are
 */
export type StrictMode = "strip" | "fail" | "allow";

/**
 * Model settings a driver or a data source may provide as defaults.
 */
export type ModelDefaults = {
  autoGenerateId?: boolean;
  initialId?: number;
  incrementIdBy?: number;
  strictMode?: StrictMode;
  defaultColumnFamily?: string;
};
