import { clone } from "@mongez/reinforcements";
import { log } from "@warlock.js/logger";
import { EventEmitter } from "node:events";
import { shouldLog } from "../../config";
import type {
  ColumnFamilies,
  DriverContract,
  DriverEvent,
  DriverEventListener,
  InsertResult,
  ScanOptions,
  StoredRow,
  UpdateOperations,
  UpdateResult,
} from "../../contracts";
import type { ModelDefaults } from "../../types";
import { applyUpdateOperations } from "../../utils/column-path";
import { MemoryIdGenerator } from "./memory-id-generator";

/**
 * Driver keeping every table in process; scans are ordered by id.
 *
 * Rows are copied on the way in and on the way out, so callers never share
 * state with the store.
 *
 * @example
 * ```typescript
 * const driver = new MemoryDriver();
 * dataSourceRegistry.register({ name: "memory", driver, isDefault: true });
 * ```
 */
export class MemoryDriver implements DriverContract {
  public readonly name = "memory";

  public readonly modelDefaults: Partial<ModelDefaults> = {
    autoGenerateId: true,
  };

  private readonly events = new EventEmitter();

  private readonly tables = new Map<string, Map<string, ColumnFamilies>>();

  private readonly idGenerator = new MemoryIdGenerator();

  private connected = false;

  public get isConnected(): boolean {
    return this.connected;
  }

  public async connect(): Promise<void> {
    if (this.connected) return;

    this.connected = true;
    this.events.emit("connected");
  }

  public async disconnect(): Promise<void> {
    if (!this.connected) return;

    this.connected = false;
    this.events.emit("disconnected");
  }

  public on(event: DriverEvent, listener: DriverEventListener): void {
    this.events.on(event, listener);
  }

  public getIdGenerator(): MemoryIdGenerator {
    return this.idGenerator;
  }

  public async find(table: string, id: string): Promise<StoredRow | null> {
    const families = this.table(table).get(id);

    return families ? { id, families: clone(families) } : null;
  }

  public async findMany(table: string, ids: string[]): Promise<StoredRow[]> {
    const rows = this.table(table);

    return Array.from(new Set(ids)).flatMap((id) => {
      const families = rows.get(id);
      return families ? [{ id, families: clone(families) }] : [];
    });
  }

  public async scan(table: string, options: ScanOptions = {}): Promise<StoredRow[]> {
    const { startsWith, limit } = options;

    const ids = Array.from(this.table(table).keys())
      .filter((id) => startsWith === undefined || id.startsWith(startsWith))
      .sort();

    return this.findMany(table, limit === undefined ? ids : ids.slice(0, limit));
  }

  public async exists(table: string, id: string): Promise<boolean> {
    return this.table(table).has(id);
  }

  /**
   * @throws {Error} When a row with the same id exists
   */
  public async insert(table: string, row: StoredRow): Promise<InsertResult> {
    const rows = this.table(table);

    if (rows.has(row.id)) {
      throw new Error(`Duplicate id "${row.id}" in table "${table}".`);
    }

    rows.set(row.id, clone(row.families));

    if (shouldLog("info")) {
      log.info("database.memory", "insert", `Inserted ${table}#${row.id}`);
    }

    return { row: { id: row.id, families: clone(row.families) } };
  }

  public async update(
    table: string,
    id: string,
    operations: UpdateOperations,
  ): Promise<UpdateResult> {
    const families = this.table(table).get(id);

    if (!families) {
      return { modifiedCount: 0 };
    }

    applyUpdateOperations(families, clone(operations));

    return { modifiedCount: 1 };
  }

  public async delete(table: string, id: string): Promise<number> {
    return this.table(table).delete(id) ? 1 : 0;
  }

  public async truncateTable(table: string): Promise<number> {
    const rows = this.table(table);
    const count = rows.size;

    rows.clear();

    return count;
  }

  /**
   * Drop every table and id counter.
   */
  public reset(): void {
    this.tables.clear();
    this.idGenerator.reset();
  }

  private table(name: string): Map<string, ColumnFamilies> {
    let rows = this.tables.get(name);

    if (!rows) {
      rows = new Map();
      this.tables.set(name, rows);
    }

    return rows;
  }
}
