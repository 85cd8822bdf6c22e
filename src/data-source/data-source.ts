import type { CoderContract, DriverContract, IdGeneratorContract } from "../contracts";
import { jsonCoder } from "../serialization/json-coder";
import type { ModelDefaults } from "../types";

/**
 * Configuration options used when registering a data source.
 */
export type DataSourceOptions = {
  /** Unique name identifying the data source. */
  name: string;
  /** Driver bound to the data source. */
  driver: DriverContract;
  /** Whether this data source should be considered the default one. */
  isDefault?: boolean;
  /**
   * Coder used for records embedded in their owner's row.
   *
   * @default jsonCoder
   */
  coder?: CoderContract;
  /**
   * Default model configuration for all models using this data source.
   *
   * These defaults override driver defaults but are overridden by
   * individual model static properties.
   */
  modelDefaults?: Partial<ModelDefaults>;
};

/**
 * Wrapper that couples a driver with its metadata.
 *
 * @example
 * ```typescript
 * const dataSource = new DataSource({
 *   name: "primary",
 *   driver: new MemoryDriver(),
 *   isDefault: true,
 * });
 *
 * const idGenerator = dataSource.idGenerator;
 * ```
 */
export class DataSource {
  /** Unique name identifying this data source. */
  public readonly name: string;

  /** Driver executing the storage operations. */
  public readonly driver: DriverContract;

  /** Whether this is the default data source. */
  public readonly isDefault: boolean;

  /** Coder for embedded records. */
  public readonly coder: CoderContract;

  /** Default model configuration for all models using this data source. */
  public readonly modelDefaults?: Partial<ModelDefaults>;

  public constructor(options: DataSourceOptions) {
    this.name = options.name;
    this.driver = options.driver;
    this.isDefault = Boolean(options.isDefault);
    this.coder = options.coder ?? jsonCoder;
    this.modelDefaults = options.modelDefaults;
  }

  /**
   * Get the id generator from the driver, if it provides one.
   */
  public get idGenerator(): IdGeneratorContract | undefined {
    return this.driver.getIdGenerator?.();
  }
}
