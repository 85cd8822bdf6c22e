import type { ModelDefaults } from "../types";
import type { IdGeneratorContract } from "./database-id-generator.contract";

/** Supported driver lifecycle events. */
export type DriverEvent = "connected" | "disconnected" | string;

/** Listener signature for driver lifecycle events. */
export type DriverEventListener = (...args: unknown[]) => void;

/**
 * Column families of a stored row: family name → column name → value.
 */
export type ColumnFamilies = Record<string, Record<string, unknown>>;

/**
 * A row as the store holds it: an id and its column families.
 */
export type StoredRow = {
  id: string;
  families: ColumnFamilies;
};

/** Result returned after insert operations. */
export type InsertResult = {
  row: StoredRow;
};

/** Result returned after update operations. */
export type UpdateResult = {
  modifiedCount: number;
};

/**
 * Partial update of a single row.
 *
 * Keys are `family.column` paths; the first dot separates the family from
 * the column so column names may contain dots themselves.
 *
 * @example
 * ```typescript
 * {
 *   $set: { "info.car_ids": ["1", "2"], "addresses.7": "{\"street\":\"Main\"}" },
 *   $unset: { "info.boss_id": 1 },
 * }
 * ```
 */
export type UpdateOperations = {
  /** Set column values */
  $set?: Record<string, unknown>;
  /** Remove columns */
  $unset?: Record<string, 1 | true | "">;
};

/**
 * Options of a row scan.
 */
export type ScanOptions = {
  /** Only rows whose id starts with this prefix */
  startsWith?: string;
  /** Maximum number of rows */
  limit?: number;
};

/**
 * Contract every storage driver must fulfil.
 *
 * Rows are addressed by their string id; lookups never throw on a miss.
 */
export interface DriverContract {
  /** Driver name, e.g. `memory`, `mongodb`. */
  readonly name: string;

  /** Whether the driver currently holds a live connection. */
  readonly isConnected: boolean;

  /**
   * Model settings this driver recommends; data source defaults override them.
   */
  readonly modelDefaults?: Partial<ModelDefaults>;

  /** Connect to the underlying store. */
  connect(): Promise<void>;

  /** Disconnect from the underlying store. */
  disconnect(): Promise<void>;

  /** Subscribe to driver lifecycle events. */
  on(event: DriverEvent, listener: DriverEventListener): void;

  /** Fetch a single row, `null` when it does not exist. */
  find(table: string, id: string): Promise<StoredRow | null>;

  /**
   * Fetch several rows in one call.
   *
   * Missing ids are skipped; found rows come back in the requested order, each once.
   */
  findMany(table: string, ids: string[]): Promise<StoredRow[]>;

  /** Scan rows ordered by id. */
  scan(table: string, options?: ScanOptions): Promise<StoredRow[]>;

  /** Whether a row with the given id exists. */
  exists(table: string, id: string): Promise<boolean>;

  /** Insert a new row. */
  insert(table: string, row: StoredRow): Promise<InsertResult>;

  /** Apply a partial update to an existing row. */
  update(table: string, id: string, operations: UpdateOperations): Promise<UpdateResult>;

  /** Delete a row, returning the number of deleted rows. */
  delete(table: string, id: string): Promise<number>;

  /** Remove every row of a table. */
  truncateTable(table: string): Promise<number>;

  /**
   * Id generator provided by the driver, if it generates ids itself.
   */
  getIdGenerator?(): IdGeneratorContract | undefined;
}
