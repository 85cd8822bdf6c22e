import { colors } from "@mongez/copper";
import { log } from "@warlock.js/logger";
import { shouldLog } from "../../config";
import { RelationTypeMismatchError } from "../../errors/relation-type-mismatch.error";
import type { Model } from "../../model/model";
import { compact, uniqueBy } from "../../utils/array";
import type { RelationFinderResult, RelationMutationResult } from "../types";
import { BaseRelationProxy } from "./base-relation-proxy";

export function sameRecord(left: Model, right: Model): boolean {
  return left === right || (left.id !== undefined && left.id === right.id);
}

/**
 * Shared behaviour of the collection proxies: dedup by identity, full
 * replacement and bulk removal.
 */
export abstract class CollectionRelationProxy extends BaseRelationProxy<Model[]> {
  public abstract add(...records: Model[]): Promise<RelationMutationResult>;

  public abstract delete(...records: Model[]): Promise<RelationMutationResult>;

  public abstract destroy(...records: Model[]): Promise<RelationMutationResult>;

  /**
   * Remove every member without loading them.
   */
  public abstract clear(): Promise<RelationMutationResult>;

  public abstract length(): Promise<number>;

  public abstract limit(count: number): Promise<Model[]>;

  /**
   * @throws {RecordNotFoundError} When the id is not part of the relation
   */
  public abstract find(id: string): Promise<Model>;

  public abstract include(recordOrId: Model | string): Promise<boolean>;

  /**
   * Every member, loading the relation if needed.
   */
  public async all(): Promise<Model[]> {
    return [...(await this.load())];
  }

  /**
   * Replace the members with the given records.
   *
   * A single `null` clears the relation; otherwise every current member is
   * removed before the new records are added. A rejected batch leaves the
   * relation untouched.
   *
   * @throws {RelationTypeMismatchError} When a record is not of the target type
   */
  public async replace(...records: (Model | null)[]): Promise<RelationMutationResult> {
    if (records.length === 1 && records[0] === null) {
      return this.clear();
    }

    const candidates = compact(records);

    this.assertTargetType(candidates);

    if (!(await this.acceptsBatch(candidates))) {
      return this.mutationResult(false);
    }

    const removed = await this.deleteAll();
    const added = await this.add(...candidates);

    return this.mutationResult(added.success, added.addedIds, removed.removedIds);
  }

  /**
   * Load every member, then delete them all.
   */
  public async deleteAll(): Promise<RelationMutationResult> {
    const members = await this.load();
    const result = await this.delete(...members);
    this.markLoadedEmpty();

    return result;
  }

  /**
   * Load every member, then destroy them all.
   */
  public async destroyAll(): Promise<RelationMutationResult> {
    const members = await this.load();
    const result = await this.destroy(...members);
    this.markLoadedEmpty();

    return result;
  }

  public async isEmpty(): Promise<boolean> {
    return (await this.length()) === 0;
  }

  public async first(): Promise<Model | null> {
    const [record] = await this.limit(1);

    return record ?? null;
  }

  /**
   * Whether the record is already held in memory.
   */
  public holds(record: Model): boolean {
    return this.proxyTarget.some((member) => sameRecord(member, record));
  }

  protected emptyTarget(): Model[] {
    return [];
  }

  protected normalizeFound(result: RelationFinderResult): Model[] {
    if (result === null || result === undefined) return [];

    return Array.isArray(result) ? compact(result) : [result];
  }

  /**
   * Union of the in-memory members and the found ones; in-memory copies win.
   */
  protected mergeLoaded(found: Model[]): Model[] {
    return uniqueBy([...this.proxyTarget, ...found], (record) => record.id);
  }

  protected markLoadedEmpty(): void {
    this.proxyTarget = this.emptyTarget();
    this.markLoaded();
  }

  protected detach(record: Model): void {
    this.proxyTarget = this.proxyTarget.filter((member) => !sameRecord(member, record));
  }

  /**
   * @throws {RelationTypeMismatchError} When a record is not of the target type
   */
  protected assertTargetType(records: Model[]): void {
    const targetClass = this.metadata.targetClass();

    for (const record of records) {
      if (!(record instanceof targetClass)) {
        throw new RelationTypeMismatchError(
          this.name,
          this.metadata.targetTypeName,
          record.self().getModelName(),
        );
      }
    }
  }

  /**
   * Whether every candidate passes validation; logs the rejection otherwise.
   */
  protected async acceptsBatch(records: Model[]): Promise<boolean> {
    for (const record of records) {
      if (await record.isValid()) continue;

      if (shouldLog("warn")) {
        log.warn(
          "relations",
          "add",
          `Rejected ${colors.yellow(String(records.length))} record(s) for ${colors.cyan(
            this.owner.self().getModelName(),
          )}.${this.name}: a record failed validation`,
        );
      }

      return false;
    }

    return true;
  }
}
