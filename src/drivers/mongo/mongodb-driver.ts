import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import type { Collection, Db, Document, Filter, MongoClient, MongoClientOptions } from "mongodb";
import { EventEmitter } from "node:events";
import type {
  ColumnFamilies,
  DriverContract,
  DriverEvent,
  DriverEventListener,
  IdGeneratorContract,
  InsertResult,
  ScanOptions,
  StoredRow,
  UpdateOperations,
  UpdateResult,
} from "../../contracts";
import { MongoIdGenerator } from "./mongo-id-generator";

/**
 * A row stored as a document: `_id` is the row id, every other top-level key a column family.
 */
interface RowDocument extends Document {
  _id: string;
}

export type MongoDriverConfig = {
  database: string;
  uri?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  authSource?: string;
  clientOptions?: MongoClientOptions;
};

function isFamily(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * MongoDB driver storing each table as a collection of column-family documents.
 *
 * @example
 * ```typescript
 * const driver = new MongoDbDriver({ database: "app", host: "localhost" });
 * await driver.connect();
 *
 * dataSourceRegistry.register({ name: "primary", driver, isDefault: true });
 * ```
 */
export class MongoDbDriver implements DriverContract {
  private readonly events = new EventEmitter();
  public client?: MongoClient;
  public database?: Db;
  private connected = false;
  private idGeneratorInstance?: IdGeneratorContract;

  /**
   * The name of this driver.
   */
  public readonly name = "mongodb";

  public constructor(private readonly config: MongoDriverConfig) {}

  /**
   * Indicates whether the driver currently maintains an active connection.
   */
  public get isConnected(): boolean {
    return this.connected;
  }

  /**
   * Get the MongoDB database instance.
   *
   * @throws {Error} If not connected
   */
  public getDatabase(): Db {
    if (!this.database) {
      throw new Error(
        "Database not available. Ensure the driver is connected before accessing the database.",
      );
    }
    return this.database;
  }

  /**
   * Id generator backed by a counters collection, created on first access.
   */
  public getIdGenerator(): IdGeneratorContract {
    if (!this.idGeneratorInstance) {
      this.idGeneratorInstance = new MongoIdGenerator(this);
    }

    return this.idGeneratorInstance;
  }

  /**
   * Establish a MongoDB connection using the configured options.
   * Throws if the connection attempt fails.
   */
  public async connect(): Promise<void> {
    if (this.connected) {
      return;
    }

    const uri = this.resolveUri();
    const { MongoClient } = await import("mongodb");

    const client = new MongoClient(uri, this.buildClientOptions());

    try {
      log.info(
        "database",
        "connection",
        `Connecting to database ${colors.bold(colors.yellowBright(this.config.database))}`,
      );
      await client.connect();
      this.client = client;
      this.database = client.db(this.config.database);
      this.connected = true;
      log.success("database", "connection", "Connected to database");

      client.on("close", () => {
        if (this.connected) {
          this.connected = false;
          this.emit("disconnected");
          log.warn("database", "connection", "Disconnected from database");
        }
      });

      this.emit("connected");
    } catch (error) {
      log.error("database", "connection", `Failed to connect to database: ${String(error)}`);
      await client.close();
      this.emit("disconnected");
      throw error;
    }
  }

  /**
   * Close the underlying MongoDB connection.
   */
  public async disconnect(): Promise<void> {
    if (!this.client) {
      return;
    }

    try {
      await this.client.close();
    } finally {
      this.connected = false;
      this.emit("disconnected");
    }
  }

  /**
   * Subscribe to driver lifecycle events.
   */
  public on(event: DriverEvent, listener: DriverEventListener): void {
    this.events.on(event, listener);
  }

  public async find(table: string, id: string): Promise<StoredRow | null> {
    const document = await this.collection(table).findOne({ _id: id });

    return document ? this.toRow(document) : null;
  }

  /**
   * Fetch several rows with a single `$in` query, in the requested order.
   */
  public async findMany(table: string, ids: string[]): Promise<StoredRow[]> {
    const uniqueIds = Array.from(new Set(ids));

    if (uniqueIds.length === 0) {
      return [];
    }

    const documents = await this.collection(table)
      .find({ _id: { $in: uniqueIds } })
      .toArray();

    const rows = new Map(documents.map((document) => [document._id, this.toRow(document)]));

    return uniqueIds.flatMap((id) => {
      const row = rows.get(id);
      return row ? [row] : [];
    });
  }

  public async scan(table: string, options: ScanOptions = {}): Promise<StoredRow[]> {
    const filter: Filter<RowDocument> = options.startsWith
      ? { _id: { $regex: `^${escapeRegExp(options.startsWith)}` } }
      : {};

    let cursor = this.collection(table).find(filter).sort({ _id: 1 });

    if (options.limit !== undefined) {
      cursor = cursor.limit(options.limit);
    }

    const documents = await cursor.toArray();

    return documents.map((document) => this.toRow(document));
  }

  public async exists(table: string, id: string): Promise<boolean> {
    const count = await this.collection(table).countDocuments({ _id: id }, { limit: 1 });

    return count > 0;
  }

  /**
   * Insert a row as a single document.
   */
  public async insert(table: string, row: StoredRow): Promise<InsertResult> {
    await this.collection(table).insertOne({ ...row.families, _id: row.id });

    return { row };
  }

  /**
   * Apply `family.column` operations; MongoDB resolves the paths natively.
   */
  public async update(
    table: string,
    id: string,
    operations: UpdateOperations,
  ): Promise<UpdateResult> {
    const update: Document = {};

    if (operations.$set) {
      update.$set = operations.$set;
    }

    if (operations.$unset) {
      update.$unset = Object.fromEntries(Object.keys(operations.$unset).map((path) => [path, ""]));
    }

    const result = await this.collection(table).updateOne({ _id: id }, update);

    return { modifiedCount: result.modifiedCount };
  }

  public async delete(table: string, id: string): Promise<number> {
    const result = await this.collection(table).deleteOne({ _id: id });

    return result.deletedCount;
  }

  public async truncateTable(table: string): Promise<number> {
    const result = await this.collection(table).deleteMany({});

    return result.deletedCount;
  }

  private collection(table: string): Collection<RowDocument> {
    return this.getDatabase().collection<RowDocument>(table);
  }

  private toRow(document: RowDocument): StoredRow {
    const families: ColumnFamilies = {};

    for (const [family, columns] of Object.entries(document)) {
      if (family === "_id" || !isFamily(columns)) continue;

      families[family] = { ...columns };
    }

    return { id: document._id, families };
  }

  /**
   * Resolve the Mongo connection string based on provided options.
   */
  private resolveUri(): string {
    if (this.config.uri) {
      return this.config.uri;
    }

    const host = this.config.host ?? "localhost";
    const port = this.config.port ?? 27017;

    return `mongodb://${host}:${port}`;
  }

  /**
   * Build the Mongo client options derived from the driver configuration.
   */
  private buildClientOptions(): MongoClientOptions {
    const baseOptions: MongoClientOptions = {
      ...(this.config.clientOptions ?? {}),
    };

    if (this.config.username && !baseOptions.auth) {
      baseOptions.auth = {
        username: this.config.username,
        password: this.config.password,
      };
    }

    if (this.config.authSource && !baseOptions.authSource) {
      baseOptions.authSource = this.config.authSource;
    }

    return baseOptions;
  }

  private emit(event: DriverEvent, ...args: unknown[]): void {
    this.events.emit(event, ...args);
  }
}
