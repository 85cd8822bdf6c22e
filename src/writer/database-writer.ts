import { clone, Random } from "@mongez/reinforcements";
import { getDatabaseConfig } from "../config";
import type {
  ColumnFamilies,
  DriverContract,
  StoredRow,
  UpdateOperations,
  UpdateResult,
} from "../contracts/database-driver.contract";
import type {
  WriterContract,
  WriterOptions,
  WriterResult,
} from "../contracts/database-writer.contract";
import { DatabaseWriterValidationError } from "../errors/database-writer-validation.error";
import type { OnSavingEventContext } from "../events/model-events";
import type { Model, ModelClass } from "../model/model";
import { applyUpdateOperations } from "../utils/column-path";
import { ModelValidator } from "../validation/model-validator";
import type { DataSource } from "./../data-source/data-source";

/**
 * Database writer service that orchestrates model persistence.
 *
 * Handles the complete save pipeline:
 * 1. Check for changes (skip if no changes and not new)
 * 2. Emit `saving` event (for data enrichment)
 * 3. Validate and cast data via @warlock.js/seal schema
 * 4. Generate id (for new records without one)
 * 5. Emit `creating`/`updating` events
 * 6. Insert the row, or apply a partial update built from the dirty
 *    attributes and the embedded relations' update hashes
 * 7. Reset dirty tracker, commit embedded relations and update `isNew`
 * 8. Emit `saved` and `created`/`updated` events
 *
 * Attributes are split into the model's column families; an attribute no
 * family declares goes to the default family.
 *
 * @example
 * ```typescript
 * const person = new Person({ name: "Alice" });
 * await new DatabaseWriter(person).save();
 * // row { id: "1", families: { info: { name: "Alice" } } }
 *
 * person.set("name", "Alice Smith");
 * await new DatabaseWriter(person).save();
 * // update { $set: { "info.name": "Alice Smith" } }
 * ```
 */
export class DatabaseWriter implements WriterContract {
  /** The model instance being persisted */
  private readonly model: Model;

  /** Model constructor reference */
  private readonly ctor: ModelClass;

  /** Data source containing driver and id generator */
  private readonly dataSource: DataSource;

  private readonly driver: DriverContract;

  private readonly table: string;

  private readonly primaryKey: string;

  public constructor(model: Model) {
    this.model = model;
    this.ctor = model.self();
    this.dataSource = this.ctor.getDataSource();
    this.driver = this.dataSource.driver;
    this.table = this.ctor.table;
    this.primaryKey = this.ctor.primaryKey;
  }

  /**
   * Save the model instance to the database.
   *
   * @throws {DatabaseWriterValidationError} If validation fails
   */
  public async save(options: WriterOptions = {}): Promise<WriterResult> {
    const isInsert = this.model.isNew;

    if (!isInsert && !this.model.hasChanges()) {
      return {
        success: true,
        document: this.model.data,
        isNew: false,
        modifiedCount: 0,
      };
    }

    const context: OnSavingEventContext = {
      isInsert,
      mode: isInsert ? "insert" : "update",
    };

    if (!options.skipEvents) {
      await this.model.emitEvent("saving", context);
    }

    await this.validateAndCast(context, options);

    let modifiedCount: number | undefined;

    if (isInsert) {
      await this.performInsert(options);
    } else {
      modifiedCount = (await this.performUpdate(options)).modifiedCount;
    }

    this.model.dirtyTracker.reset();
    this.model.isNew = false;

    for (const proxy of this.model.embeddedRelationProxies()) {
      proxy.flushed();
    }

    if (!options.skipEvents) {
      await this.model.emitEvent("saved");
      await this.model.emitEvent(isInsert ? "created" : "updated");
    }

    return {
      success: true,
      document: this.model.data,
      isNew: isInsert,
      modifiedCount,
    };
  }

  /**
   * Generate an id for the model and assign it.
   *
   * Uses the driver's id generator when it has one, a random id otherwise.
   */
  public async generateId(): Promise<string> {
    const idGenerator = this.dataSource.idGenerator;

    const id = idGenerator
      ? String(
          await idGenerator.generateNextId({
            table: this.table,
            initialId: this.resolveInitialId(),
            incrementIdBy: this.resolveIncrementBy(),
          }),
        )
      : Random.id();

    this.model.set(this.primaryKey, id);

    return id;
  }

  /**
   * Validate and cast model data using the schema.
   *
   * @throws {DatabaseWriterValidationError} If validation fails
   */
  private async validateAndCast(
    context: OnSavingEventContext,
    options: WriterOptions,
  ): Promise<void> {
    if (!options.skipEvents) {
      await this.model.emitEvent("validating", context);
    }

    if (options.skipValidation) {
      return;
    }

    const validator = new ModelValidator(this.model);

    if (!validator.buildSchema()) {
      return;
    }

    const result = await validator.validate();

    if (!result.isValid) {
      const error = new DatabaseWriterValidationError(
        `[${this.ctor.getModelName()} Model] ${context.isInsert ? "Insert" : "Update"} Validation failed`,
        result.errors,
      );

      if (!options.skipEvents) {
        await this.model.emitEvent("validated", { result, error });
      }

      throw error;
    }

    this.model.replaceData(result.data);

    if (!options.skipEvents) {
      await this.model.emitEvent("validated", { result });
    }
  }

  private async performInsert(options: WriterOptions): Promise<void> {
    const id = await this.resolveInsertId();

    if (!options.skipEvents) {
      await this.model.emitEvent("creating");
    }

    const result = await this.driver.insert(this.table, this.buildRow(id));

    this.model.rawData = clone(result.row.families);
  }

  private async performUpdate(options: WriterOptions): Promise<UpdateResult> {
    if (!options.skipEvents) {
      await this.model.emitEvent("updating");
    }

    const id = this.model.id;

    if (id === undefined) {
      throw new Error(`Cannot update ${this.ctor.getModelName()} without "${this.primaryKey}".`);
    }

    const operations = this.buildUpdateOperations();

    if (!operations.$set && !operations.$unset) {
      return { modifiedCount: 0 };
    }

    const result = await this.driver.update(this.table, id, operations);

    applyUpdateOperations(this.model.rawData, operations);

    return result;
  }

  private async resolveInsertId(): Promise<string> {
    const id = this.model.id;

    if (id !== undefined) {
      return id;
    }

    if (this.ctor.autoGenerateId === false) {
      throw new Error(
        `${this.ctor.getModelName()} does not generate ids; set "${this.primaryKey}" before saving.`,
      );
    }

    return this.generateId();
  }

  /**
   * Split the attributes into column families and add the embedded records.
   */
  private buildRow(id: string): StoredRow {
    const families: ColumnFamilies = {};

    for (const [attribute, value] of Object.entries(this.model.data)) {
      if (attribute === this.primaryKey || value === undefined) continue;

      const family = this.ctor.columnFamilyOf(attribute);

      families[family] ??= {};
      families[family][attribute] = value;
    }

    for (const proxy of this.model.embeddedRelationProxies()) {
      const family = proxy.metadata.storeIn ?? proxy.name;

      for (const [embeddedId, payload] of Object.entries(proxy.updateHash())) {
        if (payload === null) continue;

        families[family] ??= {};
        families[family][embeddedId] = payload;
      }
    }

    return { id, families };
  }

  /**
   * Build update operations from the changed attributes and embedded relations.
   *
   * @example
   * ```typescript
   * person.set("car_ids", ["1", "2"]);
   * person.unset("boss_id");
   *
   * // {
   * //   $set: { "info.car_ids": ["1", "2"] },
   * //   $unset: { "info.boss_id": 1 }
   * // }
   * ```
   */
  private buildUpdateOperations(): UpdateOperations {
    const $set: Record<string, unknown> = {};
    const $unset: Record<string, 1> = {};
    const tracker = this.model.dirtyTracker;

    for (const attribute of tracker.getChangedAttributes()) {
      if (attribute === this.primaryKey) continue;

      const path = `${this.ctor.columnFamilyOf(attribute)}.${attribute}`;
      const value = this.model.get(attribute);

      if (value === undefined) {
        $unset[path] = 1;
      } else {
        $set[path] = value;
      }
    }

    for (const attribute of tracker.getRemovedAttributes()) {
      if (attribute === this.primaryKey) continue;

      $unset[`${this.ctor.columnFamilyOf(attribute)}.${attribute}`] = 1;
    }

    for (const proxy of this.model.embeddedRelationProxies()) {
      const family = proxy.metadata.storeIn ?? proxy.name;

      for (const [embeddedId, payload] of Object.entries(proxy.updateHash())) {
        if (payload === null) {
          $unset[`${family}.${embeddedId}`] = 1;
        } else {
          $set[`${family}.${embeddedId}`] = payload;
        }
      }
    }

    const operations: UpdateOperations = {};

    if (Object.keys($set).length > 0) operations.$set = $set;
    if (Object.keys($unset).length > 0) operations.$unset = $unset;

    return operations;
  }

  /**
   * Priority: model `initialId`, then the `model.initialId` configuration, then 1.
   */
  private resolveInitialId(): number {
    return this.ctor.initialId ?? getDatabaseConfig("model")?.initialId ?? 1;
  }

  /**
   * Priority: model `incrementIdBy`, then the `model.autoIncrementBy` configuration, then 1.
   */
  private resolveIncrementBy(): number {
    return this.ctor.incrementIdBy ?? getDatabaseConfig("model")?.autoIncrementBy ?? 1;
  }
}
