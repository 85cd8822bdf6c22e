import { RecordNotFoundError } from "../../errors/record-not-found.error";
import type { AttributeChange } from "../../model/dirty-tracker";
import type { Model, ModelClass } from "../../model/model";
import type { RelationMutationResult } from "../types";
import { CollectionRelationProxy } from "./collection-relation-proxy";

/**
 * Serialized form of one embedded record in its owner's update, `null` removes it.
 */
export type EmbeddedUpdateHash = Record<string, string | null>;

/**
 * Proxy of records serialized inside their owner's row.
 *
 * The owner's `storeIn` family maps each record id to its encoded
 * attributes. Mutations only touch the in-memory collection; the owner's
 * next save writes the update hash (new and changed records, plus `null`
 * for removed ones) and then calls `flushed()`.
 *
 * @example
 * ```typescript
 * const addresses = person.embedsManyRelation("addresses");
 * await addresses.add(new Address({ street: "Main" }));
 * await person.save(); // writes addresses.<id> = '{"street":"Main"}'
 * ```
 */
export class EmbedsManyProxy extends CollectionRelationProxy {
  public readonly kind = "embedsMany" as const;

  /**
   * Removed members still present in the owner's row, by id.
   */
  private readonly removed = new Map<string, Model>();

  /**
   * Add records to the owner; the batch is rejected as a whole when a record
   * fails validation. A persisted owner is saved right away.
   *
   * @throws {RelationTypeMismatchError} When a record is not of the target type
   */
  public async add(...records: Model[]): Promise<RelationMutationResult> {
    this.assertTargetType(records);

    if (!(await this.acceptsBatch(records))) {
      return this.mutationResult(false);
    }

    const addedIds: string[] = [];

    for (const record of records) {
      if (this.holds(record)) continue;

      const id = await record.ensureId();

      this.removed.delete(id);
      record.embeddedIn = { owner: this.owner, relation: this.name };
      this.proxyTarget.push(record);
      addedIds.push(id);
    }

    if (this.owner.isPersisted()) {
      await this.owner.save();
    }

    return this.mutationResult(true, addedIds);
  }

  /**
   * Detach records; they are removed from the owner's row on its next save.
   */
  public async delete(...records: Model[]): Promise<RelationMutationResult> {
    return this.remove(records, false);
  }

  /**
   * Detach records and mark them destroyed.
   */
  public async destroy(...records: Model[]): Promise<RelationMutationResult> {
    return this.remove(records, true);
  }

  public async clear(): Promise<RelationMutationResult> {
    return this.deleteAll();
  }

  public async include(recordOrId: Model | string): Promise<boolean> {
    const members = await this.load();

    if (typeof recordOrId === "string") {
      return members.some((member) => member.id === recordOrId);
    }

    return this.holds(recordOrId);
  }

  public async length(): Promise<number> {
    return (await this.load()).length;
  }

  /**
   * @throws {RecordNotFoundError} When no member has the id
   */
  public async find(id: string): Promise<Model> {
    const record = (await this.load()).find((member) => member.id === id);

    if (!record) {
      throw new RecordNotFoundError(this.metadata.targetTypeName, id);
    }

    return record;
  }

  public async limit(count: number): Promise<Model[]> {
    return (await this.load()).slice(0, count);
  }

  /**
   * Whether a member is new, changed or was removed since the owner was last written.
   */
  public isChanged(): boolean {
    return (
      this.removed.size > 0 ||
      this.proxyTarget.some((record) => record.isNew || record.isDestroyed || record.hasChanges())
    );
  }

  /**
   * Per-id payload the owner's save writes into the `storeIn` family.
   */
  public updateHash(): EmbeddedUpdateHash {
    const coder = this.owner.self().getDataSource().coder;
    const hash: EmbeddedUpdateHash = {};

    for (const record of this.proxyTarget) {
      const id = record.id;

      if (id === undefined || !(record.isNew || record.hasChanges())) continue;

      hash[id] = coder.dump(record.attributesSnapshot());
    }

    for (const id of this.removed.keys()) {
      hash[id] = null;
    }

    return hash;
  }

  /**
   * Changes of the persisted members, by id.
   */
  public changes(): Record<string, Record<string, AttributeChange>> {
    const changes: Record<string, Record<string, AttributeChange>> = {};

    for (const record of this.proxyTarget) {
      if (record.id === undefined || record.isNew || !record.hasChanges()) continue;

      changes[record.id] = record.changes();
    }

    return changes;
  }

  /**
   * Commit after the owner's row was written: members become persisted and clean.
   */
  public flushed(): void {
    for (const record of this.proxyTarget) {
      record.isNew = false;
      record.dirtyTracker.reset();
    }

    this.removed.clear();
  }

  /**
   * Drop the in-memory members and pending removals.
   */
  public reset(): this {
    this.removed.clear();

    return super.reset();
  }

  /**
   * Encoded entries of the owner's row.
   */
  public storedEntries(): Record<string, unknown> {
    return this.owner.rawData[this.storeIn] ?? {};
  }

  protected canFindTarget(): boolean {
    return Object.keys(this.storedEntries()).length > 0;
  }

  protected async findTarget(): Promise<Model[]> {
    const targetClass = this.metadata.targetClass();
    const coder = this.owner.self().getDataSource().coder;
    const records: Model[] = [];

    for (const [id, payload] of Object.entries(this.storedEntries())) {
      if (typeof payload !== "string") continue;

      records.push(this.hydrate(targetClass, id, coder.load(payload)));
    }

    return records;
  }

  /**
   * Union with the in-memory members, leaving out pending removals.
   */
  protected mergeLoaded(found: Model[]): Model[] {
    return super.mergeLoaded(
      found.filter((record) => record.id === undefined || !this.removed.has(record.id)),
    );
  }

  private get storeIn(): string {
    return this.metadata.storeIn ?? this.name;
  }

  private hydrate(targetClass: ModelClass, id: string, attributes: Record<string, unknown>): Model {
    const record = new targetClass({ ...attributes, [targetClass.primaryKey]: id });

    record.isNew = false;
    record.embeddedIn = { owner: this.owner, relation: this.name };

    return record;
  }

  private async remove(records: Model[], destroy: boolean): Promise<RelationMutationResult> {
    const removedIds: string[] = [];
    const stored = this.storedEntries();

    for (const record of records) {
      if (!this.holds(record)) continue;

      this.detach(record);
      record.embeddedIn = undefined;

      const id = record.id;

      if (id !== undefined) {
        removedIds.push(id);

        if (id in stored) {
          this.removed.set(id, record);
        }
      }

      if (destroy) {
        record.markAsDestroyed();
      }
    }

    return this.mutationResult(true, [], removedIds);
  }
}
