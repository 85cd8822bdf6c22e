import { clone, get, merge, only, set, unset } from "@mongez/reinforcements";
import type { ObjectValidator } from "@warlock.js/seal";
import type {
  ColumnFamilies,
  RemoverOptions,
  RemoverResult,
  ScanOptions,
  StoredRow,
  WriterOptions,
} from "../contracts";
import type { DataSource } from "../data-source/data-source";
import { dataSourceRegistry } from "../data-source/data-source-registry";
import type { ModelEventListener, ModelEventName } from "../events/model-events";
import { ModelEvents, globalModelEvents } from "../events/model-events";
import { declareRelation } from "../relations/declare-relation";
import type { EmbedsManyProxy } from "../relations/proxies/embeds-many-proxy";
import type { ReferencesManyProxy } from "../relations/proxies/references-many-proxy";
import type { ReferencesOneProxy } from "../relations/proxies/references-one-proxy";
import { RelationMetadata } from "../relations/relation-metadata";
import { RelationProxyCache } from "../relations/relation-proxy-cache";
import { RelationRegistry } from "../relations/relation-registry";
import type {
  EmbedsManyOptions,
  ReferencesManyOptions,
  ReferencesOneOptions,
  RelationMutationResult,
  RelationProxy,
  RelationType,
  RelationValue,
} from "../relations/types";
import { DatabaseRemover } from "../remover/database-remover";
import { ColumnFamily } from "../schema/column-family";
import type { ModelDefaults, StrictMode } from "../types";
import { ModelValidator, type ModelValidationResult } from "../validation/model-validator";
import { DatabaseWriter } from "../writer/database-writer";
import { DirtyTracker, type AttributeChange } from "./dirty-tracker";
import {
  getRegisteredModelName,
  registerModelInRegistry,
  removeModelFromRegistry,
} from "./register-model";

export type ModelClass<TModel extends Model = Model> = (new (
  data?: Record<string, unknown>,
) => TModel) &
  Pick<
    typeof Model,
    | "table"
    | "primaryKey"
    | "dataSource"
    | "schema"
    | "strictMode"
    | "autoGenerateId"
    | "initialId"
    | "incrementIdBy"
    | "columnFamilies"
    | "defaultColumnFamily"
    | "getDataSource"
    | "getModelName"
    | "register"
    | "getRelationRegistry"
    | "columnFamilyOf"
    | "addFieldToColumnFamily"
    | "referencesOne"
    | "referencesMany"
    | "embedsMany"
    | "find"
    | "findMany"
    | "all"
    | "fromRow"
    | "create"
    | "events"
    | "on"
    | "once"
    | "off"
    | "$cleanup"
  >;

/**
 * Generic schema type representing the structure of model data.
 */
export type ModelSchema = Record<string, unknown>;

/**
 * Back reference from an embedded record to the owner holding it.
 */
export type EmbeddedOwnerLink = {
  owner: Model;
  relation: string;
};

/**
 * Sentinel value used to distinguish between undefined and missing fields.
 */
const MISSING_VALUE = Symbol("missing");

const DEFAULT_COLUMN_FAMILY = "base";

/**
 * Per model class state, keyed by the class itself.
 */
const modelEventsRegistry = new WeakMap<object, ModelEvents<Model>>();
const relationRegistries = new WeakMap<object, RelationRegistry>();
const defaultsApplied = new WeakSet<object>();

/**
 * Fill in model settings the class leaves undefined.
 *
 * Priority: model static property, then data source defaults, then driver defaults.
 */
function applyModelDefaults(model: ModelClass, defaults: Partial<ModelDefaults>): void {
  if (defaults.autoGenerateId !== undefined && model.autoGenerateId === undefined) {
    model.autoGenerateId = defaults.autoGenerateId;
  }
  if (defaults.initialId !== undefined && model.initialId === undefined) {
    model.initialId = defaults.initialId;
  }
  if (defaults.incrementIdBy !== undefined && model.incrementIdBy === undefined) {
    model.incrementIdBy = defaults.incrementIdBy;
  }
  if (defaults.strictMode !== undefined && model.strictMode === undefined) {
    model.strictMode = defaults.strictMode;
  }
  if (defaults.defaultColumnFamily !== undefined && model.defaultColumnFamily === undefined) {
    model.defaultColumnFamily = defaults.defaultColumnFamily;
  }
}

/**
 * Base class of every stored record.
 *
 * Provides:
 * - Attribute accessors with dot-notation support (get, set, has, unset, merge)
 * - Dirty tracking for partial updates of the stored row
 * - Lifecycle event hooks (saving, created, deleting, ...)
 * - Relation declarations (`referencesOne`, `referencesMany`, `embedsMany`) and
 *   per-instance relation proxies
 *
 * @example
 * ```typescript
 * class Person extends Model {
 *   public static table = "people";
 *   public static columnFamilies = [new ColumnFamily("info", ["name"])];
 * }
 *
 * Person.referencesMany("cars", { storeIn: "info" });
 * Person.register();
 *
 * const person = await Person.create({ name: "Alice" });
 * await person.referencesManyRelation("cars").add(car);
 * person.get("car_ids"); // [car.id]
 * ```
 */
export abstract class Model<TSchema extends ModelSchema = ModelSchema> {
  /**
   * Table the model's rows are stored in.
   */
  public static table: string;

  /**
   * Attribute holding the row id.
   */
  public static primaryKey = "id";

  /**
   * Data source name or instance; the default data source when omitted.
   */
  public static dataSource?: string | DataSource;

  /**
   * @warlock.js/seal schema the attributes are validated against before saving.
   *
   * @example
   * ```typescript
   * class Car extends Model {
   *   public static table = "cars";
   *   public static schema = v.object({
   *     name: v.string().required(),
   *   });
   * }
   * ```
   */
  public static schema?: ObjectValidator;

  /**
   * How attributes the schema does not declare are handled.
   *
   * @default "strip"
   */
  public static strictMode?: StrictMode;

  /**
   * Generate an id through the driver's id generator when a new record has none.
   *
   * @default true
   */
  public static autoGenerateId?: boolean;

  public static initialId?: number;

  public static incrementIdBy?: number;

  /**
   * Column families of the model's rows and the attributes each one holds.
   */
  public static columnFamilies: ColumnFamily[] = [];

  /**
   * Family receiving attributes no declared family claims.
   *
   * @default "base"
   */
  public static defaultColumnFamily?: string;

  /**
   * Whether this instance has not been written to the store yet.
   */
  public isNew = true;

  /**
   * Whether this instance was destroyed.
   */
  public isDestroyed = false;

  /**
   * The attributes backing this instance.
   */
  public data: TSchema;

  /**
   * The row's column families as last read from, or written to, the store.
   *
   * Families holding embedded relations are only available here.
   */
  public rawData: ColumnFamilies = {};

  public readonly dirtyTracker: DirtyTracker;

  /**
   * Model instance events.
   */
  public events: ModelEvents<Model> = new ModelEvents();

  /**
   * Set on records embedded in another record's row.
   */
  public embeddedIn?: EmbeddedOwnerLink;

  private relationProxyCache?: RelationProxyCache;

  public constructor(initialData: Partial<TSchema> = {}) {
    this.data = initialData as TSchema;
    this.dirtyTracker = new DirtyTracker(this.data);
  }

  /**
   * Record id, `undefined` until one is assigned.
   */
  public get id(): string | undefined {
    const id = this.get(this.self().primaryKey);

    return id === undefined || id === null ? undefined : String(id);
  }

  public get<TKey extends keyof TSchema & string>(field: TKey): TSchema[TKey];
  public get(field: string, defaultValue?: unknown): unknown;
  public get(field: string, defaultValue?: unknown): unknown {
    return get(this.data, field, defaultValue);
  }

  public only(fields: string[]): Record<string, unknown> {
    return only(this.data, fields);
  }

  /**
   * Sets a field value and marks it as dirty.
   *
   * @example
   * ```typescript
   * person.set("name", "Bob").set("address.city", "Oslo");
   * ```
   */
  public set<TKey extends keyof TSchema & string>(field: TKey, value: TSchema[TKey]): this;
  public set(field: string, value: unknown): this;
  public set(field: string, value: unknown): this {
    const path = String(field);
    set(this.data, path, value);

    const partial: Record<string, unknown> = {};
    set(partial, path, value);
    this.dirtyTracker.mergeChanges(partial);

    return this;
  }

  public has(field: string): boolean {
    return get(this.data, field, MISSING_VALUE) !== MISSING_VALUE;
  }

  /**
   * Removes one or more fields and marks them as removed.
   */
  public unset(...fields: string[]): this {
    this.assignData(unset(this.data, fields));
    this.dirtyTracker.unset(fields);

    return this;
  }

  /**
   * Deep merges new values and marks changed fields as dirty.
   */
  public merge(values: Record<string, unknown>): this {
    this.assignData(merge(this.data, values));
    this.dirtyTracker.mergeChanges(values);
    return this;
  }

  /**
   * Replace the attributes entirely, keeping the dirty baseline.
   *
   * Used by the writer after validation to store the casted values.
   */
  public replaceData(data: Record<string, unknown>): void {
    this.assignData(data);
    this.dirtyTracker.replaceCurrentData(data);
  }

  /**
   * Flag an attribute as changed, e.g. after mutating an id list in place.
   */
  public markAsChanged(field: string): this {
    this.dirtyTracker.touch(field);

    return this;
  }

  /**
   * Whether the record or one of its embedded relations has unsaved changes.
   */
  public hasChanges(): boolean {
    return (
      this.dirtyTracker.hasChanges() ||
      this.embeddedRelationProxies().some((proxy) => proxy.isChanged())
    );
  }

  public isDirty(column: string): boolean {
    return this.dirtyTracker.isDirty(column);
  }

  public getDirtyColumns(): string[] {
    return this.dirtyTracker.getDirtyColumns();
  }

  public getRemovedColumns(): string[] {
    return this.dirtyTracker.getRemovedColumns();
  }

  /**
   * Changed attributes with their previous and current values.
   */
  public changes(): Record<string, AttributeChange> {
    return this.dirtyTracker.getChanges();
  }

  /**
   * Whether the record exists in the store: saved and not destroyed.
   */
  public isPersisted(): boolean {
    return !this.isNew && !this.isDestroyed;
  }

  public markAsDestroyed(): this {
    this.isDestroyed = true;

    return this;
  }

  /**
   * Attributes to embed in an owner's row, without the primary key.
   */
  public attributesSnapshot(): Record<string, unknown> {
    const snapshot: Record<string, unknown> = clone(this.data);
    delete snapshot[this.self().primaryKey];

    return snapshot;
  }

  public async validate(): Promise<ModelValidationResult> {
    return new ModelValidator(this).validate();
  }

  public async isValid(): Promise<boolean> {
    return (await this.validate()).isValid;
  }

  /**
   * Return the record's id, generating one first if it has none.
   */
  public async ensureId(): Promise<string> {
    const id = this.id;

    if (id !== undefined) {
      return id;
    }

    return new DatabaseWriter(this).generateId();
  }

  /**
   * Save the record.
   *
   * An embedded record is saved through its owner, whose row holds it.
   *
   * @throws {DatabaseWriterValidationError} If validation fails
   */
  public async save(options?: WriterOptions & { merge?: Record<string, unknown> }): Promise<this> {
    if (options?.merge) {
      this.merge(options.merge);
    }

    if (this.embeddedIn) {
      await this.embeddedIn.owner.save(options);
      return this;
    }

    const writer = new DatabaseWriter(this);
    await writer.save(options);
    return this;
  }

  /**
   * Delete the record's row, or detach it from its owner when embedded.
   */
  public async destroy(options?: RemoverOptions): Promise<RemoverResult> {
    const remover = new DatabaseRemover(this);
    return await remover.destroy(options);
  }

  /**
   * Get the class constructor from an instance.
   */
  public self(): ModelClass<this> {
    return this.constructor as ModelClass<this>;
  }

  public toJSON(): Record<string, unknown> {
    return this.data;
  }

  // ============================================================================
  // RELATIONS
  // ============================================================================

  /**
   * This record's relation proxies, created on first access.
   */
  public get relationProxies(): RelationProxyCache {
    if (!this.relationProxyCache) {
      this.relationProxyCache = new RelationProxyCache(this, this.self().getRelationRegistry());
    }

    return this.relationProxyCache;
  }

  /**
   * Proxy of the given relation, `undefined` when the model declares no such relation.
   */
  public relation(name: string): RelationProxy | undefined {
    return this.relationProxies.get(name);
  }

  public referencesOneRelation(name: string): ReferencesOneProxy {
    const proxy = this.relation(name);

    if (!proxy || proxy.kind !== "referencesOne") {
      throw this.undeclaredRelationError(name, "referencesOne");
    }

    return proxy;
  }

  public referencesManyRelation(name: string): ReferencesManyProxy {
    const proxy = this.relation(name);

    if (!proxy || proxy.kind !== "referencesMany") {
      throw this.undeclaredRelationError(name, "referencesMany");
    }

    return proxy;
  }

  public embedsManyRelation(name: string): EmbedsManyProxy {
    const proxy = this.relation(name);

    if (!proxy || proxy.kind !== "embedsMany") {
      throw this.undeclaredRelationError(name, "embedsMany");
    }

    return proxy;
  }

  /**
   * Read a relation through the model's accessor table.
   *
   * References-one relations resolve to a record or `null`, collections to a list.
   */
  public async related(name: string): Promise<RelationValue> {
    return this.relationAccessor(name).get(this);
  }

  /**
   * Assign a relation through the model's accessor table.
   *
   * @example
   * ```typescript
   * await person.assign("boss", boss);
   * await person.assign("cars", [car1, car2]);
   * await person.assign("cars", null); // clears the relation
   * ```
   */
  public async assign(name: string, value: RelationValue): Promise<RelationMutationResult> {
    return this.relationAccessor(name).set(this, value);
  }

  /**
   * Cached embeds-many proxies, which the writer flushes with the owner.
   */
  public embeddedRelationProxies(): EmbedsManyProxy[] {
    return this.relationProxyCache ? this.relationProxyCache.embedded() : [];
  }

  // ============================================================================
  // EVENTS
  // ============================================================================

  /**
   * Emits a lifecycle event to instance, class and global listeners.
   */
  public async emitEvent<TContext = unknown>(
    event: ModelEventName,
    context?: TContext,
  ): Promise<void> {
    await this.events.emit(event, this, context);
    await this.self().events().emit(event, this, context);
    await globalModelEvents.emit(event, this, context);
  }

  public on<TContext = unknown>(
    event: ModelEventName,
    listener: ModelEventListener<Model, TContext>,
  ): () => void {
    return this.events.on(event, listener);
  }

  public once<TContext = unknown>(
    event: ModelEventName,
    listener: ModelEventListener<Model, TContext>,
  ): () => void {
    return this.events.once(event, listener);
  }

  public off<TContext = unknown>(
    event: ModelEventName,
    listener: ModelEventListener<Model, TContext>,
  ): void {
    this.events.off(event, listener);
  }

  private assignData(data: Record<string, unknown>): void {
    this.data = data as TSchema;
  }

  private relationAccessor(name: string) {
    const accessor = this.self().getRelationRegistry().accessor(name);

    if (!accessor) {
      throw new Error(`${this.self().getModelName()} has no relation named "${name}".`);
    }

    return accessor;
  }

  private undeclaredRelationError(name: string, expected: RelationType): Error {
    const metadata = this.self().getRelationRegistry().get(name);
    const modelName = this.self().getModelName();

    if (!metadata) {
      return new Error(`${modelName} has no relation named "${name}".`);
    }

    return new Error(
      `Relation "${name}" on ${modelName} is a ${metadata.relationType} relation, not ${expected}.`,
    );
  }

  // ============================================================================
  // STATIC API
  // ============================================================================

  /**
   * Name the model is registered under, its class name otherwise.
   */
  public static getModelName(this: ModelClass): string {
    return getRegisteredModelName(this) ?? this.name;
  }

  /**
   * Register the model so relations and polymorphic type columns can resolve it by name.
   */
  public static register(this: ModelClass, name?: string): string {
    return registerModelInRegistry(this, name);
  }

  /**
   * Resolves the data source associated with this model.
   *
   * Resolution order:
   * 1. If `dataSource` is a string, looks it up in the data-source registry
   * 2. If `dataSource` is a DataSource instance, returns it directly
   * 3. Otherwise, returns the default data source from the registry
   *
   * @throws {MissingDataSourceError} If no data source is found
   */
  public static getDataSource(this: ModelClass): DataSource {
    const ref = this.dataSource;
    let dataSource: DataSource;

    if (typeof ref === "string") {
      dataSource = dataSourceRegistry.get(ref);
    } else if (ref) {
      dataSource = ref;
    } else {
      dataSource = dataSourceRegistry.get();
    }

    if (!defaultsApplied.has(this)) {
      applyModelDefaults(this, {
        ...dataSource.driver.modelDefaults,
        ...dataSource.modelDefaults,
      });

      defaultsApplied.add(this);
    }

    return dataSource;
  }

  /**
   * The model's relation registry; a subclass starts from a copy of its parent's.
   */
  public static getRelationRegistry(this: ModelClass): RelationRegistry {
    let registry = relationRegistries.get(this);

    if (!registry) {
      const parent: unknown = Object.getPrototypeOf(this);
      const inherited = typeof parent === "function" ? relationRegistries.get(parent) : undefined;

      registry = new RelationRegistry(this.getModelName(), inherited);
      relationRegistries.set(this, registry);
    }

    return registry;
  }

  /**
   * Column family storing the given attribute.
   */
  public static columnFamilyOf(this: ModelClass, attribute: string): string {
    const family = this.columnFamilies.find((columnFamily) => columnFamily.hasField(attribute));

    return family?.name ?? this.defaultColumnFamily ?? DEFAULT_COLUMN_FAMILY;
  }

  /**
   * Add a field to one of the model's column families, declaring the family if needed.
   */
  public static addFieldToColumnFamily(this: ModelClass, familyName: string, field: string): void {
    if (!Object.prototype.hasOwnProperty.call(this, "columnFamilies")) {
      this.columnFamilies = this.columnFamilies.map((family) => family.clone());
    }

    let family = this.columnFamilies.find((columnFamily) => columnFamily.name === familyName);

    if (!family) {
      family = new ColumnFamily(familyName);
      this.columnFamilies = [...this.columnFamilies, family];
    }

    family.addField(field);
  }

  /**
   * Declare a relation to a single record.
   *
   * @example
   * ```typescript
   * Person.referencesOne("boss", { className: "Person", storeIn: "info" });
   * Person.referencesOne("attachable", { polymorphic: true, storeIn: "info" });
   * ```
   */
  public static referencesOne(
    this: ModelClass,
    name: string,
    options: ReferencesOneOptions = {},
  ): RelationMetadata {
    return declareRelation(this, new RelationMetadata(name, "referencesOne", options));
  }

  /**
   * Declare a relation to a list of records whose ids are stored on the owner.
   *
   * @example
   * ```typescript
   * Person.referencesMany("cars", { storeIn: "info" }); // ids in `car_ids`
   * Person.referencesMany("tests", { startsWith: "id", findWith: findTestsOfPerson });
   * ```
   */
  public static referencesMany(
    this: ModelClass,
    name: string,
    options: ReferencesManyOptions = {},
  ): RelationMetadata {
    return declareRelation(this, new RelationMetadata(name, "referencesMany", options));
  }

  /**
   * Declare a list of records serialized inside the owner's row.
   *
   * @example
   * ```typescript
   * Person.embedsMany("addresses"); // stored in the `addresses` family
   * ```
   */
  public static embedsMany(
    this: ModelClass,
    name: string,
    options: EmbedsManyOptions = {},
  ): RelationMetadata {
    return declareRelation(this, new RelationMetadata(name, "embedsMany", options));
  }

  /**
   * Find a record by id, `null` when there is none.
   */
  public static async find<TModel extends Model>(
    this: ModelClass<TModel>,
    id: string,
  ): Promise<TModel | null> {
    const row = await this.getDataSource().driver.find(this.table, id);

    return row ? this.fromRow(row) : null;
  }

  /**
   * Find several records in one call; missing ids are skipped.
   */
  public static async findMany<TModel extends Model>(
    this: ModelClass<TModel>,
    ids: string[],
  ): Promise<TModel[]> {
    if (ids.length === 0) {
      return [];
    }

    const rows = await this.getDataSource().driver.findMany(this.table, ids);

    return rows.map((row) => this.fromRow(row));
  }

  /**
   * Scan the model's table, optionally restricted to an id prefix.
   */
  public static async all<TModel extends Model>(
    this: ModelClass<TModel>,
    options: ScanOptions = {},
  ): Promise<TModel[]> {
    const rows = await this.getDataSource().driver.scan(this.table, options);

    return rows.map((row) => this.fromRow(row));
  }

  /**
   * Hydrate a record from a stored row.
   *
   * Columns of every family are merged into the attributes, except the
   * families holding embedded relations which stay in `rawData`.
   */
  public static fromRow<TModel extends Model>(this: ModelClass<TModel>, row: StoredRow): TModel {
    const embeddedFamilies = new Set(this.getRelationRegistry().embeddedFamilies());
    const attributes: Record<string, unknown> = {};

    for (const [family, columns] of Object.entries(row.families)) {
      if (embeddedFamilies.has(family)) continue;

      Object.assign(attributes, columns);
    }

    attributes[this.primaryKey] = row.id;

    const model = new this(attributes);
    model.isNew = false;
    model.rawData = clone(row.families);

    return model;
  }

  public static async create<TModel extends Model>(
    this: ModelClass<TModel>,
    data: Record<string, unknown>,
  ): Promise<TModel> {
    const model = new this(data);
    await model.save();
    return model;
  }

  /**
   * Class level event emitter.
   *
   * @example
   * ```typescript
   * Person.events().onSaving((person) => {
   *   person.set("updatedAt", Date.now());
   * });
   * ```
   */
  public static events(this: ModelClass): ModelEvents<Model> {
    let events = modelEventsRegistry.get(this);
    if (!events) {
      events = new ModelEvents<Model>();
      modelEventsRegistry.set(this, events);
    }

    return events;
  }

  public static on<TContext = unknown>(
    this: ModelClass,
    event: ModelEventName,
    listener: ModelEventListener<Model, TContext>,
  ): () => void {
    return this.events().on(event, listener);
  }

  public static once<TContext = unknown>(
    this: ModelClass,
    event: ModelEventName,
    listener: ModelEventListener<Model, TContext>,
  ): () => void {
    return this.events().once(event, listener);
  }

  public static off<TContext = unknown>(
    this: ModelClass,
    event: ModelEventName,
    listener: ModelEventListener<Model, TContext>,
  ): void {
    this.events().off(event, listener);
  }

  /**
   * Drop the model's events, relations, applied defaults and registry entry.
   */
  public static $cleanup(this: ModelClass): void {
    modelEventsRegistry.delete(this);
    relationRegistries.delete(this);
    defaultsApplied.delete(this);
    removeModelFromRegistry(this.getModelName());
  }
}
