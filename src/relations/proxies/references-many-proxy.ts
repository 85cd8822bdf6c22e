import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { getRelationsBatchSize, shouldLog } from "../../config";
import { RecordNotFoundError } from "../../errors/record-not-found.error";
import { UnsupportedFinderOptionError } from "../../errors/unsupported-finder-option.error";
import type { Model } from "../../model/model";
import { chunk } from "../../utils/array";
import type { AllOptions, BatchOptions, RelationMutationResult } from "../types";
import { CollectionRelationProxy } from "./collection-relation-proxy";

/**
 * Proxy of a relation whose target ids are an ordered list stored on the owner.
 *
 * Reads pick the cheapest path: the in-memory members when loaded, the
 * custom finder when one is set, otherwise the owner's id list, fetched in a
 * single batch lookup. Counting, `limit()` and batched iteration work on the
 * id list directly and never load the whole relation.
 *
 * @example
 * ```typescript
 * const cars = person.referencesManyRelation("cars");
 *
 * await cars.add(volvo, saab); // person.car_ids → [volvo.id, saab.id]
 * await cars.length(); // 2, without fetching a car
 *
 * for await (const batch of cars.findInBatches({ batchSize: 100 })) {
 *   // ...
 * }
 * ```
 */
export class ReferencesManyProxy extends CollectionRelationProxy {
  public readonly kind = "referencesMany" as const;

  /**
   * The owner's foreign-key id list.
   */
  public foreignKeys(): string[] {
    const value = this.owner.get(this.metadata.foreignKeyColumn());

    return Array.isArray(value) ? value.map((id) => String(id)) : [];
  }

  /**
   * Members, or a subset of them.
   *
   * Loaded members are filtered in memory. Otherwise a custom finder gets
   * the options; without one they are emulated over the id list:
   * `startsWith` filters the ids and `limit` keeps the first ones.
   *
   * @throws {UnsupportedFinderOptionError} When `offset` is given and the ids are stored on the owner
   */
  public async all(options: AllOptions = {}): Promise<Model[]> {
    const { limit, offset, startsWith } = options;

    if (limit === undefined && offset === undefined && startsWith === undefined) {
      return [...(await this.load())];
    }

    if (offset !== undefined && !this.metadata.findWith) {
      if (shouldLog("warn")) {
        log.warn(
          "relations",
          "all",
          `${colors.cyan(this.owner.self().getModelName())}.${this.name} does not support ${colors.yellow(
            "offset",
          )}`,
        );
      }

      throw new UnsupportedFinderOptionError(["offset"], this.metadata.targetTypeName);
    }

    if (this.isLoaded()) {
      const members = this.proxyTarget
        .filter((record) => hasPrefix(record.id, startsWith))
        .slice(offset ?? 0);

      return limit === undefined ? members : members.slice(0, limit);
    }

    if (this.metadata.findWith) {
      return this.normalizeFound(await this.metadata.findWith(this.owner, options));
    }

    const ids = this.foreignKeys().filter((id) => hasPrefix(id, startsWith));

    return this.metadata.targetClass().findMany(limit === undefined ? ids : ids.slice(0, limit));
  }

  /**
   * Add records to the relation.
   *
   * The batch is rejected as a whole when a record fails validation. Each
   * new member's id is appended to the owner's id list; when the owner is
   * persisted the records are saved, then the owner once.
   *
   * @throws {RelationTypeMismatchError} When a record is not of the target type
   */
  public async add(...records: Model[]): Promise<RelationMutationResult> {
    this.assertTargetType(records);

    if (!(await this.acceptsBatch(records))) {
      return this.mutationResult(false);
    }

    const addedIds: string[] = [];
    const managesForeignKeys = this.managesForeignKeys();

    for (const record of records) {
      if (this.contains(record)) continue;

      const id = await record.ensureId();

      if (managesForeignKeys) {
        this.writeForeignKeys([...this.foreignKeys(), id]);
        addedIds.push(id);
      }

      this.proxyTarget.push(record);

      if (this.owner.isPersisted()) {
        await record.save();
      }
    }

    if (this.owner.isPersisted()) {
      await this.owner.save();
    }

    await this.synced(addedIds, []);

    return this.mutationResult(true, addedIds);
  }

  /**
   * Remove records from the relation, keeping them in the store.
   */
  public async delete(...records: Model[]): Promise<RelationMutationResult> {
    return this.remove(records, false);
  }

  /**
   * Remove records from the relation and destroy them.
   */
  public async destroy(...records: Model[]): Promise<RelationMutationResult> {
    return this.remove(records, true);
  }

  /**
   * Empty the id list without fetching the members.
   */
  public async clear(): Promise<RelationMutationResult> {
    const removedIds = this.managesForeignKeys() ? this.foreignKeys() : [];

    if (this.managesForeignKeys()) {
      this.writeForeignKeys([]);
    }

    this.markLoadedEmpty();

    if (this.owner.isPersisted()) {
      await this.owner.save();
    }

    await this.synced([], removedIds);

    return this.mutationResult(true, [], removedIds);
  }

  /**
   * Whether the record, or the id, belongs to the relation. Never throws on a miss.
   */
  public async include(recordOrId: Model | string): Promise<boolean> {
    const id = typeof recordOrId === "string" ? recordOrId : recordOrId.id;

    if (id === undefined) {
      return typeof recordOrId !== "string" && this.holds(recordOrId);
    }

    try {
      await this.find(id);
      return true;
    } catch (error) {
      if (error instanceof RecordNotFoundError) {
        return false;
      }

      throw error;
    }
  }

  /**
   * Number of members; counts the id list unless loaded or finder driven.
   */
  public async length(): Promise<number> {
    if (this.isLoaded()) {
      return this.proxyTarget.length;
    }

    if (this.metadata.hasFinder) {
      return (await this.load()).length;
    }

    return this.foreignKeys().length;
  }

  /**
   * Find a member by id.
   *
   * Unloaded, the id must be in the owner's id list, or match the id prefix
   * of a finder driven relation, before the target is looked up.
   *
   * @throws {RecordNotFoundError}
   */
  public async find(id: string): Promise<Model> {
    if (this.isLoaded()) {
      return this.findLoaded(id);
    }

    if (this.metadata.hasFinder) {
      const prefix = this.idPrefix();

      if (prefix === undefined) {
        await this.load();
        return this.findLoaded(id);
      }

      if (!id.startsWith(prefix)) {
        throw this.notFound(id);
      }
    } else if (!this.foreignKeys().includes(id)) {
      throw this.notFound(id);
    }

    const record = await this.metadata.targetClass().find(id);

    if (!record) {
      throw this.notFound(id);
    }

    return record;
  }

  /**
   * The first `count` members, fetched in one lookup without loading the relation.
   */
  public async limit(count: number): Promise<Model[]> {
    if (this.isLoaded()) {
      return this.proxyTarget.slice(0, count);
    }

    if (this.metadata.findWith) {
      return this.normalizeFound(await this.metadata.findWith(this.owner, { limit: count }));
    }

    return this.metadata.targetClass().findMany(this.foreignKeys().slice(0, count));
  }

  /**
   * Yield the members in batches, fetching one batch at a time.
   *
   * Each call starts over from the first batch.
   */
  public async *findInBatches(options: BatchOptions = {}): AsyncGenerator<Model[], void, undefined> {
    const batchSize = options.batchSize ?? getRelationsBatchSize();
    const { startsWith } = options;

    if (this.isLoaded() || this.metadata.hasFinder) {
      const members = (await this.load()).filter((record) => hasPrefix(record.id, startsWith));

      yield* chunk(members, batchSize);
      return;
    }

    const ids = this.foreignKeys().filter((id) => hasPrefix(id, startsWith));
    const targetClass = this.metadata.targetClass();

    for (const batch of chunk(ids, batchSize)) {
      yield await targetClass.findMany(batch);
    }
  }

  /**
   * Yield the members one by one, fetched in batches.
   */
  public async *findEach(options: BatchOptions = {}): AsyncGenerator<Model, void, undefined> {
    for await (const batch of this.findInBatches(options)) {
      yield* batch;
    }
  }

  protected canFindTarget(): boolean {
    return this.foreignKeys().length > 0;
  }

  protected async findTarget(): Promise<Model[]> {
    return this.metadata.targetClass().findMany(this.foreignKeys());
  }

  /**
   * Union with the in-memory members, ordered like the id list.
   */
  protected mergeLoaded(found: Model[]): Model[] {
    const order = new Map(this.foreignKeys().map((id, index) => [id, index]));
    const rank = (record: Model) => {
      const index = record.id === undefined ? undefined : order.get(record.id);

      return index ?? Number.MAX_SAFE_INTEGER;
    };

    return super
      .mergeLoaded(found)
      .map((record, position) => ({ record, position }))
      .sort((left, right) => rank(left.record) - rank(right.record) || left.position - right.position)
      .map(({ record }) => record);
  }

  private async remove(records: Model[], destroy: boolean): Promise<RelationMutationResult> {
    const removedIds: string[] = [];
    const managesForeignKeys = this.managesForeignKeys();

    for (const record of records) {
      if (!this.contains(record)) continue;

      const id = record.id;

      if (managesForeignKeys && id !== undefined && this.foreignKeys().includes(id)) {
        this.writeForeignKeys(this.foreignKeys().filter((foreignKey) => foreignKey !== id));
        removedIds.push(id);
      }

      this.detach(record);

      if (destroy && record.isPersisted()) {
        await record.destroy();
      }
    }

    if (this.owner.isPersisted()) {
      await this.owner.save();
    }

    await this.synced([], removedIds);

    return this.mutationResult(true, [], removedIds);
  }

  private contains(record: Model): boolean {
    if (this.holds(record)) return true;

    const id = record.id;

    return id !== undefined && this.foreignKeys().includes(id);
  }

  private writeForeignKeys(ids: string[]): void {
    const foreignKey = this.metadata.foreignKeyColumn();

    this.owner.set(foreignKey, ids);
    this.owner.markAsChanged(foreignKey);
  }

  private idPrefix(): string | undefined {
    if (!this.metadata.startsWith) return undefined;

    const value = this.owner.get(this.metadata.startsWith);

    return value === undefined || value === null ? undefined : String(value);
  }

  private findLoaded(id: string): Model {
    const record = this.proxyTarget.find((member) => member.id === id);

    if (!record) {
      throw this.notFound(id);
    }

    return record;
  }

  private notFound(id: string): RecordNotFoundError {
    return new RecordNotFoundError(this.metadata.targetTypeName, id);
  }
}

function hasPrefix(id: string | undefined, prefix: string | undefined): boolean {
  return prefix === undefined || (id !== undefined && id.startsWith(prefix));
}

